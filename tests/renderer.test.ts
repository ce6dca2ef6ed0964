// tests/renderer.test.ts

import type { IconImage, RGB } from '../src/@types';
import { ICON_SIZES } from '../src/core/catalog/sizeTable';
import { getPixel, hexToRgb } from '../src/core/renderer/drawing';
import { computeLayout, drawIcon, render } from '../src/core/renderer';
import { InvalidDimensionError } from '../src/errors';

const hundred = hexToRgb('#1E88E5');
const ten = hexToRgb('#FF7043');
const one = hexToRgb('#66BB6A');
const border = hexToRgb('#424242');
const frame = hexToRgb('#E0E0E0');
const white = hexToRgb('#FFFFFF');

function countPixels(image: IconImage, color: RGB): number {
    let count = 0;
    for (let y = 0; y < image.info.height; y++) {
        for (let x = 0; x < image.info.width; x++) {
            const pixel = getPixel(image, x, y);
            if (pixel.R === color.R && pixel.G === color.G && pixel.B === color.B) count++;
        }
    }
    return count;
}

describe('Icon layout', () => {
    it('should place the blocks of a 1024px icon', () => {
        const layout = computeLayout(1024);
        expect(layout.margin).toBe(51);
        expect(layout.blocks.map(block => [block.place, block.bounds])).toEqual([
            ['hundred', { x: 362, y: 51, width: 300, height: 300 }],
            ['ten', { x: 362, y: 404, width: 300, height: 61 }],
            ['one', { x: 474, y: 511, width: 76, height: 76 }],
        ]);
        expect(layout.blocks.map(block => block.borderWidth)).toEqual([1, 1, 2]);
        expect(layout.frame).toEqual({ bounds: { x: 1, y: 1, width: 1022, height: 1022 }, radius: 40 });
    });

    it('should put the labels centred under their blocks', () => {
        expect(computeLayout(1024).labels).toEqual([
            { text: '100', centerX: 512, top: 353, fontSize: 40 },
            { text: '10', centerX: 512, top: 467, fontSize: 40 },
            { text: '1', centerX: 512, top: 589, fontSize: 40 },
        ]);
        expect(computeLayout(58).labels).toEqual([]);
        expect(computeLayout(60).labels.map(label => label.fontSize)).toEqual([8, 8, 8]);
    });

    it('should lay the hundred block out as a 10x10 grid', () => {
        const grid = computeLayout(180).blocks[0];
        expect(grid.place).toBe('hundred');
        expect(grid.cells).toHaveLength(100);
        expect(new Set(grid.cells.map(cell => `${cell.x},${cell.y}`)).size).toBe(100);
        expect(grid.cells.every(cell => cell.width === 5 && cell.height === 5)).toBe(true);
    });

    it('should drop blocks whose cells round down to nothing', () => {
        expect(computeLayout(20).blocks.map(block => block.place)).toEqual(['one']);
        expect(computeLayout(29).blocks.map(block => block.place)).toEqual(['one']);
        expect(computeLayout(40).blocks.map(block => block.place)).toEqual(['hundred', 'ten', 'one']);
        expect(computeLayout(1).blocks).toEqual([]);
    });

    it('should only frame large icons', () => {
        expect(computeLayout(87).frame).toBeNull();
        expect(computeLayout(120).frame).toEqual({ bounds: { x: 1, y: 1, width: 118, height: 118 }, radius: 4 });
    });

    it('should reject dimensions that are not positive integers', () => {
        for (const dimension of [0, -5, 2.5, Number.NaN]) {
            expect(() => computeLayout(dimension)).toThrow(InvalidDimensionError);
        }
    });
});

describe('Icon renderer', () => {
    it('should produce square RGB images for every catalog size', async () => {
        for (const spec of ICON_SIZES) {
            const image = await render(spec.pixels);
            expect(image.info).toEqual({ width: spec.pixels, height: spec.pixels, channels: 3 });
            expect(image.data.length).toBe(spec.pixels * spec.pixels * 3);
        }
    });

    it('should paint the blocks of a 1024px icon', () => {
        const { image } = drawIcon(1024);
        expect(getPixel(image, 362, 51)).toEqual(border);
        expect(getPixel(image, 363, 52)).toEqual(hundred);
        expect(getPixel(image, 362, 404)).toEqual(border);
        expect(getPixel(image, 377, 434)).toEqual(ten);
        expect(getPixel(image, 475, 512)).toEqual(border);
        expect(getPixel(image, 476, 513)).toEqual(one);
        expect(getPixel(image, 5, 5)).toEqual(white);
    });

    it('should fill every one of the hundred cells', () => {
        for (const dimension of [40, 87, 180, 1024]) {
            const { image, layout } = drawIcon(dimension);
            const grid = layout.blocks[0];
            expect(grid.cells).toHaveLength(100);
            for (const cell of grid.cells) {
                const centre = getPixel(image, cell.x + Math.floor(cell.width / 2), cell.y + Math.floor(cell.height / 2));
                expect(centre).toEqual(hundred);
            }
        }
    });

    it('should draw one-pixel cells without outlines on small icons', () => {
        const { image } = drawIcon(40);
        expect(countPixels(image, hundred)).toBe(100);
        expect(countPixels(image, ten)).toBe(20);
        // 4x4 unit cell with a one-pixel outline
        expect(countPixels(image, one)).toBe(4);
        expect(countPixels(image, border)).toBe(12);
    });

    it('should draw the rounded frame on large icons only', () => {
        const large = drawIcon(1024).image;
        expect(getPixel(large, 1, 512)).toEqual(frame);
        expect(getPixel(large, 0, 512)).toEqual(white);
        expect(getPixel(large, 2, 512)).toEqual(white);
        expect(getPixel(large, 1, 1)).toEqual(white);

        const small = drawIcon(87).image;
        expect(countPixels(small, frame)).toBe(0);
    });

    it('should not fail on degenerate sizes', () => {
        for (const dimension of [1, 2, 3, 5, 10, 20]) {
            const { image } = drawIcon(dimension);
            expect(image.info.width).toBe(dimension);
            expect(image.info.height).toBe(dimension);
        }
        expect(countPixels(drawIcon(1).image, white)).toBe(1);
    });

    it('should be deterministic', () => {
        expect(drawIcon(167).image.data.equals(drawIcon(167).image.data)).toBe(true);
    });

    it('should omit labels when the font file is missing', async () => {
        const plain = drawIcon(180).image;
        const rendered = await render(180, { fontFile: '/nonexistent/fonts/Label.ttf' });
        expect(rendered.data.equals(plain.data)).toBe(true);
    });
});
