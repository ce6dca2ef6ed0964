// src/core/renderer/fonts.ts

import fs from 'node:fs';
import * as opentype from 'opentype.js';

/**
 * Reads and parses a TrueType/OpenType file. Rejects when the file is missing
 * or is not a font.
 */
export async function loadLabelFont(fontFile: string): Promise<opentype.Font> {
    const data = await fs.promises.readFile(fontFile);
    const buffer = new ArrayBuffer(data.byteLength);
    new Uint8Array(buffer).set(data);
    return opentype.parse(buffer);
}

/**
 * Outlines `text` with the font's own glyphs and wraps the path in an SVG
 * cropped to the ink, so the label's top-left corner sits at (0, 0).
 *
 * @throws when the font has no glyph for one of the characters.
 */
export function labelSvg(font: opentype.Font, text: string, fontSize: number, color: string): string {
    for (const char of text) {
        if (font.charToGlyphIndex(char) === 0) {
            throw new Error(`Font has no glyph for "${char}"`);
        }
    }
    const box = font.getPath(text, 0, 0, fontSize).getBoundingBox();
    const width = Math.ceil(box.x2 - box.x1);
    const height = Math.ceil(box.y2 - box.y1);
    if (width <= 0 || height <= 0) {
        throw new Error(`Label "${text}" has no visible outline`);
    }
    const outline = font.getPath(text, -box.x1, -box.y1, fontSize).toPathData(2);
    return (
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
        `<path d="${outline}" fill="${color}"/></svg>`
    );
}
