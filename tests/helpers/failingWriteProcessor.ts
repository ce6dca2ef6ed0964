// tests/helpers/failingWriteProcessor.ts

import path from 'node:path';
import type { IconImage } from '../../src/@types';
import { SharpImageProcessor } from '../../src/core/imageProcessing/strategies/SharpImageProcessor';

/**
 * Fails to save one chosen icon, as a full disk or a read-only file would.
 */
export class FailingWriteProcessor extends SharpImageProcessor {
    constructor(private readonly failingFile: string) {
        super();
    }

    async writeImageData(image: IconImage, outputPngPath: string): Promise<void> {
        if (path.basename(outputPngPath) === this.failingFile) {
            throw new Error('disk full');
        }
        await super.writeImageData(image, outputPngPath);
    }
}
