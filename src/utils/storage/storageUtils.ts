// src/utils/storage/storageUtils.ts

import fs from 'node:fs';

/**
 * Ensures that the specified output directory exists. If the directory
 * does not exist, it creates the directory and any necessary subdirectories.
 *
 * @param outputFolder - The path of the output directory to ensure.
 */
export async function ensureOutputDirectory(outputFolder: string): Promise<void> {
    await fs.promises.mkdir(outputFolder, { recursive: true });
}

/**
 * Whether a regular file exists and can be read.
 */
export async function isReadableFile(filePath: string): Promise<boolean> {
    try {
        await fs.promises.access(filePath, fs.constants.R_OK);
        return (await fs.promises.stat(filePath)).isFile();
    } catch {
        return false;
    }
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
    await fs.promises.writeFile(filePath, content, 'utf8');
}
