// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { IconImage, ImageDimensions, ImageOverlay, ImageProcessor, RasterizedText } from '../../../@types';
import { config } from '../../../config';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Decodes an image header and returns its size. Rejects when the file is
     * missing or is not an image sharp can read.
     */
    public async readDimensions(imagePath: string): Promise<ImageDimensions> {
        const { width, height } = await sharp(imagePath).metadata();
        if (!width || !height) {
            throw new Error(`Could not read image size of ${imagePath}`);
        }
        return { width, height };
    }

    /**
     * Writes raw RGB image data to a file in PNG format.
     *
     * @param image - Raw pixels and their geometry.
     * @param outputPngPath - The path where the PNG file will be saved.
     */
    public async writeImageData(image: IconImage, outputPngPath: string): Promise<void> {
        await sharp(image.data, {
            raw: {
                width: image.info.width,
                height: image.info.height,
                channels: image.info.channels,
            },
        })
            .png({
                compressionLevel: config.imageCompression.compressionLevel,
                adaptiveFiltering: config.imageCompression.adaptiveFiltering,
                palette: false,
            })
            .toFile(outputPngPath);
    }

    /**
     * Resamples an image file to a `dimension` square with the Lanczos-3 kernel.
     * Transparent areas are flattened onto the background colour.
     */
    public async resizeImage(sourcePath: string, dimension: number): Promise<IconImage> {
        const { data, info } = await sharp(sourcePath)
            .resize(dimension, dimension, { kernel: 'lanczos3', fit: 'fill' })
            .flatten({ background: config.palette.background })
            .toColourspace('srgb')
            .raw()
            .toBuffer({ resolveWithObject: true });
        return toIconImage(data, info);
    }

    /**
     * Rasterises an SVG document into a transparent PNG of its own size.
     */
    public async rasterizeSvg(svg: string): Promise<RasterizedText> {
        const { data, info } = await sharp(Buffer.from(svg)).png().toBuffer({ resolveWithObject: true });
        return { data, width: info.width, height: info.height };
    }

    /**
     * Draws PNG overlays onto an RGB image and returns the flattened RGB result.
     */
    public async composite(image: IconImage, overlays: ImageOverlay[]): Promise<IconImage> {
        if (overlays.length === 0) {
            return image;
        }
        const composited = await sharp(image.data, { raw: image.info })
            .composite(overlays.map(({ data, left, top }) => ({ input: data, left, top })))
            .raw()
            .toBuffer({ resolveWithObject: true });
        const { data, info } = await sharp(composited.data, { raw: composited.info })
            .flatten({ background: config.palette.background })
            .raw()
            .toBuffer({ resolveWithObject: true });
        return toIconImage(data, info);
    }
}

function toIconImage(data: Buffer, info: sharp.OutputInfo): IconImage {
    if (info.channels !== 3) {
        throw new Error(`Expected 3 colour channels, got ${info.channels}`);
    }
    return { data, info: { width: info.width, height: info.height, channels: 3 } };
}
