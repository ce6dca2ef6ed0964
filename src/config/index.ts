// src/config/index.ts

import type { IRenderPalette } from '../@types';

const palette: IRenderPalette = Object.freeze({
    background: '#FFFFFF',
    hundred: '#1E88E5',
    ten: '#FF7043',
    one: '#66BB6A',
    cellBorder: '#424242',
    label: '#263238',
    frame: '#E0E0E0',
});

export const config = Object.freeze({
    palette,
    imageCompression: Object.freeze({
        compressionLevel: 9,
        adaptiveFiltering: false,
    }),
    geometry: Object.freeze({
        minMargin: 2, // Margin is max(minMargin, d / marginDivisor)
        marginDivisor: 20,
        outlineThreshold: 60, // Thicker cell outlines from this dimension on
        labelThreshold: 60, // Labels are legible from this dimension on
        labelGap: 2, // Pixels between a block and its label
        labelFontDivisor: 25,
        minLabelFontSize: 8,
        frameThreshold: 120, // Rounded frame drawn from this dimension on
        frameRadiusDivisor: 25,
    }),
    paths: Object.freeze({
        outputDirectory: 'ios/Runner/Assets.xcassets/AppIcon.appiconset',
        sourceIcon: 'icon/app_icon_source.png',
        manifestFile: 'Contents.json',
    }),
    // Label font file, read when no --font option is given
    fontEnvVariable: 'ICON_SET_FONT',
});
