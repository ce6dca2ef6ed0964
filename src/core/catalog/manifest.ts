// src/core/catalog/manifest.ts

import type { CatalogManifest, ManifestImage, SizeSpec } from '../../@types';
import { nameFor } from './fileNamer';
import { ICON_SIZES, pointSize } from './sizeTable';

/**
 * Builds the asset-catalog `Contents.json` describing every icon of the table,
 * one image entry per idiom that uses the file.
 */
export function buildManifest(sizes: readonly SizeSpec[] = ICON_SIZES): CatalogManifest {
    const images: ManifestImage[] = [];
    for (const spec of sizes) {
        const points = pointSize(spec);
        const filename = nameFor(spec.pixels, spec.scale, sizes);
        for (const idiom of spec.idioms) {
            images.push({
                size: `${points}x${points}`,
                idiom,
                filename,
                scale: spec.scale.slice(1),
            });
        }
    }
    return { images, info: { version: 1, author: 'xcode' } };
}

export function serializeManifest(manifest: CatalogManifest): string {
    return `${JSON.stringify(manifest, null, 2)}\n`;
}
