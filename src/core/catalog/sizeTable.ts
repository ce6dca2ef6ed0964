// src/core/catalog/sizeTable.ts

import type { Idiom, Scale, SizeSpec } from '../../@types';

const entry = (pixels: number, scale: Scale, ...idioms: Idiom[]): SizeSpec =>
    Object.freeze({ pixels, scale, idioms: Object.freeze(idioms) });

/**
 * Every (pixel size, scale) pair an iOS AppIcon.appiconset needs, grouped by
 * nominal point size: 20, 29, 40, 60, 76, 83.5 and the 1024 store icon.
 */
export const ICON_SIZES: readonly SizeSpec[] = Object.freeze([
    entry(20, '@1x', 'ipad'),
    entry(40, '@2x', 'iphone', 'ipad'),
    entry(60, '@3x', 'iphone'),
    entry(29, '@1x', 'iphone', 'ipad'),
    entry(58, '@2x', 'iphone', 'ipad'),
    entry(87, '@3x', 'iphone'),
    entry(40, '@1x', 'ipad'),
    entry(80, '@2x', 'iphone', 'ipad'),
    entry(120, '@3x', 'iphone'),
    entry(120, '@2x', 'iphone'),
    entry(180, '@3x', 'iphone'),
    entry(76, '@1x', 'ipad'),
    entry(152, '@2x', 'ipad'),
    entry(167, '@2x', 'ipad'),
    entry(1024, '@1x', 'ios-marketing'),
]);

export const STORE_ICON_PIXELS = 1024;

const scaleFactors: Record<Scale, number> = {
    '@1x': 1,
    '@2x': 2,
    '@3x': 3,
};

export function isScale(value: string): value is Scale {
    return Object.prototype.hasOwnProperty.call(scaleFactors, value);
}

export function scaleFactor(scale: Scale): number {
    return scaleFactors[scale];
}

/**
 * Nominal size in points of a table entry, e.g. 167px at @2x is 83.5pt.
 */
export function pointSize(spec: Pick<SizeSpec, 'pixels' | 'scale'>): number {
    return spec.pixels / scaleFactor(spec.scale);
}

export function findSizeSpec(pixels: number, scale: Scale, sizes: readonly SizeSpec[] = ICON_SIZES): SizeSpec | undefined {
    return sizes.find(spec => spec.pixels === pixels && spec.scale === scale);
}
