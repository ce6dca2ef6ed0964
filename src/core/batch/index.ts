// src/core/batch/index.ts

import path from 'node:path';
import type { BatchReport, IBatchOptions, IconSource, ImageProcessor, RenderOptions, ReportEntry } from '../../@types';
import { config } from '../../config';
import { describeError, IconWriteError, MissingSourceAssetError } from '../../errors';
import { ensureOutputDirectory, isReadableFile, writeTextFile } from '../../utils/storage/storageUtils';
import { nameFor } from '../catalog/fileNamer';
import { buildManifest, serializeManifest } from '../catalog/manifest';
import { ICON_SIZES } from '../catalog/sizeTable';
import { RenderIconSource, ResizeIconSource } from '../iconSources/iconSourceStrategies';
import { getImageProcessor } from '../imageProcessing/processor';

/**
 * Draws every icon of the size table and writes them into `outputDirectory`,
 * creating it when missing and overwriting existing files.
 */
export async function generateAll(
    outputDirectory: string,
    options: IBatchOptions & RenderOptions,
    processor: ImageProcessor = getImageProcessor(),
): Promise<BatchReport> {
    const source = new RenderIconSource({ fontFile: options.fontFile }, processor, options.logger);
    return runBatch(source, outputDirectory, options, processor, false);
}

/**
 * Resizes `sourcePath` to every size of the table. The source is checked
 * before anything is written; after that a failing icon is reported and the
 * remaining ones are still produced.
 *
 * @throws {MissingSourceAssetError} when the source is absent or not an image.
 */
export async function resizeAll(
    sourcePath: string,
    outputDirectory: string,
    options: IBatchOptions,
    processor: ImageProcessor = getImageProcessor(),
): Promise<BatchReport> {
    const { logger } = options;
    if (!(await isReadableFile(sourcePath))) {
        throw new MissingSourceAssetError(sourcePath);
    }
    try {
        const { width, height } = await processor.readDimensions(sourcePath);
        logger.debug(`Source icon ${sourcePath} is ${width}x${height}`);
        if (width !== height) {
            logger.warn(`Source icon is not square (${width}x${height}), it will be stretched`);
        }
    } catch (error) {
        throw new MissingSourceAssetError(sourcePath, error);
    }

    const source = new ResizeIconSource(sourcePath, processor);
    return runBatch(source, outputDirectory, options, processor, true);
}

async function runBatch(
    source: IconSource,
    outputDirectory: string,
    options: IBatchOptions,
    processor: ImageProcessor,
    continueOnError: boolean,
): Promise<BatchReport> {
    const { logger, progressBar } = options;
    const sizes = options.sizes ?? ICON_SIZES;

    await ensureOutputDirectory(outputDirectory);
    logger.info(`Generating ${sizes.length} icons (${source.name}) into ${outputDirectory}`);

    const entries: ReportEntry[] = [];
    progressBar?.start(sizes.length, 0, { file: '' });
    try {
        for (const spec of sizes) {
            const file = nameFor(spec.pixels, spec.scale, sizes);
            try {
                const image = await source.produce(spec);
                await processor.writeImageData(image, path.join(outputDirectory, file));
                entries.push({ file, pixels: spec.pixels, status: 'success' });
                if (!progressBar) {
                    logger.success(`Generated: ${file} (${spec.pixels}x${spec.pixels})`);
                }
            } catch (error) {
                if (!continueOnError) {
                    throw error;
                }
                const failure = new IconWriteError(file, spec.pixels, error);
                logger.error(failure.message);
                entries.push({ file, pixels: spec.pixels, status: 'failed', reason: describeError(error) });
            }
            progressBar?.increment(1, { file });
        }
    } finally {
        progressBar?.stop();
    }

    if (options.manifest) {
        const manifestPath = path.join(outputDirectory, config.paths.manifestFile);
        await writeTextFile(manifestPath, serializeManifest(buildManifest(sizes)));
        logger.info(`Wrote ${manifestPath}`);
    }

    const failed = entries.filter(entry => entry.status === 'failed').length;
    const written = entries.length - failed;
    if (failed > 0) {
        logger.warn(`Icon generation finished with errors: ${written} written, ${failed} failed`);
    } else {
        logger.success(`Icon generation complete: ${written} icons written to ${outputDirectory}`);
    }
    return { outputDirectory, entries, written, failed };
}
