// src/core/imageProcessing/processor.ts

import type { ImageProcessor } from '../../@types';
import { SharpImageProcessor } from './strategies/SharpImageProcessor';

const defaultProcessor: ImageProcessor = new SharpImageProcessor();

/**
 * Returns the shared sharp-backed image processor.
 */
export function getImageProcessor(): ImageProcessor {
    return defaultProcessor;
}
