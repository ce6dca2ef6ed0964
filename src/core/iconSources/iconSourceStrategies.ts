// src/core/iconSources/iconSourceStrategies.ts

import type { IconImage, IconSource, ILogger, ImageProcessor, RenderOptions, SizeSpec } from '../../@types';
import { render } from '../renderer';

/**
 * Ways of producing the icon for a size-table entry.
 */
export enum SupportedIconSources {
    Render = 'render',
    Resize = 'resize',
}

/**
 * Draws every icon from scratch at its exact pixel size.
 */
export class RenderIconSource implements IconSource {
    readonly name = SupportedIconSources.Render;

    constructor(
        private readonly options: RenderOptions,
        private readonly processor: ImageProcessor,
        private readonly logger?: ILogger,
    ) {}

    produce(spec: SizeSpec): Promise<IconImage> {
        return render(spec.pixels, this.options, this.logger, this.processor);
    }
}

/**
 * Resamples one existing source image down (or up) to every size.
 */
export class ResizeIconSource implements IconSource {
    readonly name = SupportedIconSources.Resize;

    constructor(
        readonly sourcePath: string,
        private readonly processor: ImageProcessor,
    ) {}

    produce(spec: SizeSpec): Promise<IconImage> {
        return this.processor.resizeImage(this.sourcePath, spec.pixels);
    }
}
