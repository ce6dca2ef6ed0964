// src/core/renderer/layout.ts

import type { BlockLayout, IconLayout, LabelPlacement, Rect } from '../../@types';
import { config } from '../../config';
import { InvalidDimensionError } from '../../errors';

/**
 * Lays out the hundred grid, the ten strip and the one cell for a square icon
 * of the given dimension, stacked top to bottom and centred horizontally.
 * Blocks whose cells would be smaller than one pixel are left out.
 */
export function computeLayout(dimension: number): IconLayout {
    if (!Number.isInteger(dimension) || dimension < 1) {
        throw new InvalidDimensionError(dimension);
    }
    const { geometry, palette } = config;

    const margin = Math.max(geometry.minMargin, Math.floor(dimension / geometry.marginDivisor));
    const content = dimension - 2 * margin;
    const spacing = Math.max(2, Math.floor(content / 20));
    const outlined = dimension >= geometry.outlineThreshold;
    const centred = (width: number) => margin + Math.floor((content - width) / 2);

    const blocks: BlockLayout[] = [];

    // 10x10 grid
    const hundredSize = Math.min(Math.floor(content / 3), content - 2 * spacing);
    const cell = Math.floor(hundredSize / 10);
    if (cell >= 1) {
        const bounds: Rect = { x: centred(cell * 10), y: margin, width: cell * 10, height: cell * 10 };
        const cells: Rect[] = [];
        for (let row = 0; row < 10; row++) {
            for (let col = 0; col < 10; col++) {
                cells.push({ x: bounds.x + col * cell, y: bounds.y + row * cell, width: cell, height: cell });
            }
        }
        blocks.push({ place: 'hundred', label: '100', bounds, cells, fill: palette.hundred, borderWidth: outlined ? 1 : 0 });
    }

    // Strip of ten
    const tenTop = margin + hundredSize + spacing;
    const tenHeight = Math.max(2, Math.floor(content / 15));
    const tenCell = Math.floor(Math.min(Math.floor((content * 3) / 4), hundredSize) / 10);
    if (tenCell >= 1) {
        const bounds: Rect = { x: centred(tenCell * 10), y: tenTop, width: tenCell * 10, height: tenHeight };
        const cells: Rect[] = [];
        for (let i = 0; i < 10; i++) {
            cells.push({ x: bounds.x + i * tenCell, y: tenTop, width: tenCell, height: tenHeight });
        }
        blocks.push({ place: 'ten', label: '10', bounds, cells, fill: palette.ten, borderWidth: outlined ? 1 : 0 });
    }

    // Single unit
    const oneSize = Math.max(4, Math.min(Math.floor(content / 8), Math.floor(hundredSize / 4)));
    const oneBounds: Rect = { x: centred(oneSize), y: tenTop + tenHeight + spacing, width: oneSize, height: oneSize };
    if (clipsToImage(oneBounds, dimension)) {
        blocks.push({
            place: 'one',
            label: '1',
            bounds: oneBounds,
            cells: [oneBounds],
            fill: palette.one,
            borderWidth: outlined ? 2 : 1,
        });
    }

    const labels: LabelPlacement[] = [];
    if (dimension >= geometry.labelThreshold) {
        const fontSize = Math.max(geometry.minLabelFontSize, Math.floor(dimension / geometry.labelFontDivisor));
        for (const block of blocks) {
            labels.push({
                text: block.label,
                centerX: block.bounds.x + Math.floor(block.bounds.width / 2),
                top: block.bounds.y + block.bounds.height + geometry.labelGap,
                fontSize,
            });
        }
    }

    const frame =
        dimension >= geometry.frameThreshold
            ? {
                  bounds: { x: 1, y: 1, width: dimension - 2, height: dimension - 2 },
                  radius: Math.floor(dimension / geometry.frameRadiusDivisor),
              }
            : null;

    return { dimension, margin, blocks, labels, frame };
}

function clipsToImage(rect: Rect, dimension: number): boolean {
    const x0 = Math.max(0, rect.x);
    const y0 = Math.max(0, rect.y);
    const x1 = Math.min(dimension, rect.x + rect.width);
    const y1 = Math.min(dimension, rect.y + rect.height);
    return x1 > x0 && y1 > y0;
}
