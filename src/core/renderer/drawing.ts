// src/core/renderer/drawing.ts

import type { IconImage, Rect, RGB } from '../../@types';

const CHANNELS = 3;

/**
 * Parses a `#RRGGBB` colour.
 */
export function hexToRgb(hex: string): RGB {
    const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
    if (!match) {
        throw new Error(`Invalid colour: ${hex}`);
    }
    return {
        R: parseInt(match[1], 16),
        G: parseInt(match[2], 16),
        B: parseInt(match[3], 16),
    };
}

/**
 * Allocates a square RGB canvas filled with a solid colour.
 */
export function createCanvas(dimension: number, background: string): IconImage {
    const { R, G, B } = hexToRgb(background);
    const data = Buffer.alloc(dimension * dimension * CHANNELS);
    for (let idx = 0; idx < data.length; idx += CHANNELS) {
        data[idx] = R;
        data[idx + 1] = G;
        data[idx + 2] = B;
    }
    return { data, info: { width: dimension, height: dimension, channels: CHANNELS } };
}

export function setPixel(image: IconImage, x: number, y: number, color: RGB): void {
    const { width, height } = image.info;
    if (x < 0 || y < 0 || x >= width || y >= height) return;
    const idx = (y * width + x) * CHANNELS;
    image.data[idx] = color.R;
    image.data[idx + 1] = color.G;
    image.data[idx + 2] = color.B;
}

export function getPixel(image: IconImage, x: number, y: number): RGB {
    const idx = (y * image.info.width + x) * CHANNELS;
    return { R: image.data[idx], G: image.data[idx + 1], B: image.data[idx + 2] };
}

/**
 * Intersects a rectangle with the image bounds. Returns null when nothing of
 * it is left to draw.
 */
export function clipRect(image: IconImage, rect: Rect): Rect | null {
    const x0 = Math.max(0, rect.x);
    const y0 = Math.max(0, rect.y);
    const x1 = Math.min(image.info.width, rect.x + rect.width);
    const y1 = Math.min(image.info.height, rect.y + rect.height);
    if (x1 <= x0 || y1 <= y0) {
        return null;
    }
    return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}

export function fillRect(image: IconImage, rect: Rect, color: RGB): boolean {
    const clipped = clipRect(image, rect);
    if (!clipped) return false;
    for (let y = clipped.y; y < clipped.y + clipped.height; y++) {
        for (let x = clipped.x; x < clipped.x + clipped.width; x++) {
            setPixel(image, x, y, color);
        }
    }
    return true;
}

/**
 * Fills a rectangle and draws its outline inside the box. The outline is left
 * out when the box is too small to keep any fill inside it.
 *
 * @returns false when the rectangle had no drawable area.
 */
export function drawCell(image: IconImage, rect: Rect, fill: RGB, outline: RGB, borderWidth: number): boolean {
    if (rect.width <= 0 || rect.height <= 0) {
        return false;
    }
    const outlined = borderWidth > 0 && rect.width > 2 * borderWidth && rect.height > 2 * borderWidth;
    if (!outlined) {
        return fillRect(image, rect, fill);
    }
    if (!fillRect(image, rect, outline)) {
        return false;
    }
    fillRect(
        image,
        {
            x: rect.x + borderWidth,
            y: rect.y + borderWidth,
            width: rect.width - 2 * borderWidth,
            height: rect.height - 2 * borderWidth,
        },
        fill,
    );
    return true;
}

function insideRoundedRect(px: number, py: number, rect: Rect, radius: number): boolean {
    const right = rect.x + rect.width;
    const bottom = rect.y + rect.height;
    if (px < rect.x || py < rect.y || px >= right || py >= bottom) {
        return false;
    }
    const r = Math.min(radius, rect.width / 2, rect.height / 2);
    if (r <= 0) {
        return true;
    }
    // Sample at the pixel centre against the nearest corner circle
    const sx = px + 0.5;
    const sy = py + 0.5;
    const cx = sx < rect.x + r ? rect.x + r : sx > right - r ? right - r : sx;
    const cy = sy < rect.y + r ? rect.y + r : sy > bottom - r ? bottom - r : sy;
    const dx = sx - cx;
    const dy = sy - cy;
    return dx * dx + dy * dy <= r * r;
}

/**
 * Draws the outline of a rounded rectangle, `lineWidth` pixels thick, on the
 * inside of `rect`.
 */
export function strokeRoundedRect(image: IconImage, rect: Rect, radius: number, lineWidth: number, color: RGB): boolean {
    const clipped = clipRect(image, rect);
    if (!clipped || lineWidth <= 0) return false;
    const inner: Rect = {
        x: rect.x + lineWidth,
        y: rect.y + lineWidth,
        width: rect.width - 2 * lineWidth,
        height: rect.height - 2 * lineWidth,
    };
    const innerRadius = Math.max(0, radius - lineWidth);
    for (let y = clipped.y; y < clipped.y + clipped.height; y++) {
        for (let x = clipped.x; x < clipped.x + clipped.width; x++) {
            if (insideRoundedRect(x, y, rect, radius) && !insideRoundedRect(x, y, inner, innerRadius)) {
                setPixel(image, x, y, color);
            }
        }
    }
    return true;
}
