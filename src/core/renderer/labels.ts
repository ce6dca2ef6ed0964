// src/core/renderer/labels.ts

import type { Font } from 'opentype.js';
import type { IconImage, IconLayout, ILogger, ImageOverlay, ImageProcessor, RasterizedText } from '../../@types';
import { config } from '../../config';
import { describeError } from '../../errors';
import { labelSvg, loadLabelFont } from './fonts';

/**
 * Outlines the block labels with the given font file and draws them onto the
 * icon. A font that cannot be read or parsed leaves every label out; a label
 * that cannot be outlined or does not fit is left out on its own.
 */
export async function drawLabels(
    image: IconImage,
    layout: IconLayout,
    fontFile: string,
    processor: ImageProcessor,
    logger?: ILogger,
): Promise<IconImage> {
    if (layout.labels.length === 0) {
        return image;
    }
    let font: Font;
    try {
        font = await loadLabelFont(fontFile);
    } catch (error) {
        logger?.debug(
            `Label font "${fontFile}" is unusable (${describeError(error)}), drawing ${layout.dimension}px icon without labels`,
        );
        return image;
    }

    const overlays: ImageOverlay[] = [];
    for (const label of layout.labels) {
        let text: RasterizedText;
        try {
            text = await processor.rasterizeSvg(labelSvg(font, label.text, label.fontSize, config.palette.label));
        } catch (error) {
            logger?.debug(`Skipping label "${label.text}" at ${layout.dimension}px: ${describeError(error)}`);
            continue;
        }
        const left = label.centerX - Math.floor(text.width / 2);
        const fits =
            left >= 0 &&
            label.top >= 0 &&
            left + text.width <= layout.dimension &&
            label.top + text.height <= layout.dimension;
        if (!fits) {
            logger?.debug(`Label "${label.text}" does not fit a ${layout.dimension}px icon`);
            continue;
        }
        overlays.push({ ...text, left, top: label.top });
    }
    return processor.composite(image, overlays);
}
