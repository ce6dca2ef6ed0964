// src/core/renderer/index.ts

import type { IconImage, IconLayout, ILogger, ImageProcessor, RenderOptions } from '../../@types';
import { config } from '../../config';
import { getImageProcessor } from '../imageProcessing/processor';
import { createCanvas, drawCell, hexToRgb, strokeRoundedRect } from './drawing';
import { drawLabels } from './labels';
import { computeLayout } from './layout';

export { computeLayout } from './layout';

/**
 * Draws the base-10 blocks artwork (without labels) for a square icon.
 * Pure and synchronous: the same dimension always yields the same pixels.
 */
export function drawIcon(dimension: number): { image: IconImage; layout: IconLayout } {
    const layout = computeLayout(dimension);
    const { palette } = config;
    const image = createCanvas(dimension, palette.background);
    const outline = hexToRgb(palette.cellBorder);

    for (const block of layout.blocks) {
        const fill = hexToRgb(block.fill);
        for (const cell of block.cells) {
            drawCell(image, cell, fill, outline, block.borderWidth);
        }
    }

    if (layout.frame) {
        strokeRoundedRect(image, layout.frame.bounds, layout.frame.radius, 1, hexToRgb(palette.frame));
    }

    return { image, layout };
}

/**
 * Renders the icon at `dimension` pixels, with block labels when a font file is
 * configured and the icon is large enough for them to be legible.
 */
export async function render(
    dimension: number,
    options: RenderOptions = {},
    logger?: ILogger,
    processor: ImageProcessor = getImageProcessor(),
): Promise<IconImage> {
    const { image, layout } = drawIcon(dimension);
    if (!options.fontFile) {
        return image;
    }
    return drawLabels(image, layout, options.fontFile, processor, logger);
}
