// src/core/catalog/fileNamer.ts

import type { SizeSpec } from '../../@types';
import { UnknownIconSizeError } from '../../errors';
import { findSizeSpec, ICON_SIZES, isScale, pointSize, STORE_ICON_PIXELS } from './sizeTable';

export const STORE_ICON_FILENAME = `Icon-App-${STORE_ICON_PIXELS}x${STORE_ICON_PIXELS}@1x.png`;

/**
 * Maps a size-table entry to its file name inside the icon set, e.g.
 * `Icon-App-20x20@2x.png` for 40px at @2x. The store icon always maps to
 * `Icon-App-1024x1024@1x.png`.
 *
 * @throws {UnknownIconSizeError} when the combination is not in the table.
 */
export function nameFor(pixels: number, scale: string, sizes: readonly SizeSpec[] = ICON_SIZES): string {
    if (pixels === STORE_ICON_PIXELS) {
        return STORE_ICON_FILENAME;
    }
    const spec = isScale(scale) ? findSizeSpec(pixels, scale, sizes) : undefined;
    if (!spec) {
        throw new UnknownIconSizeError(pixels, scale);
    }
    const points = pointSize(spec);
    return `Icon-App-${points}x${points}${spec.scale}.png`;
}
