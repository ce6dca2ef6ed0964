// src/errors/index.ts

export class IconSetError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidDimensionError extends IconSetError {
    constructor(readonly dimension: number) {
        super(`Icon dimension must be a positive integer, got ${dimension}`);
    }
}

export class UnknownIconSizeError extends IconSetError {
    constructor(
        readonly pixels: number,
        readonly scale: string,
    ) {
        super(`No icon catalog entry for ${pixels}px at ${scale}`);
    }
}

export class MissingSourceAssetError extends IconSetError {
    constructor(
        readonly sourcePath: string,
        cause?: unknown,
    ) {
        super(`Source icon not found or not readable as an image: ${sourcePath}`, { cause });
    }
}

export class IconWriteError extends IconSetError {
    constructor(
        readonly file: string,
        readonly pixels: number,
        cause: unknown,
    ) {
        super(`Error creating ${file} (${pixels}x${pixels}): ${describeError(cause)}`, { cause });
    }
}

/**
 * Message of an unknown thrown value, for log lines and reports.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

