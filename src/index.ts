#!/usr/bin/env node
// src/index.ts

import { Command, CommanderError } from 'commander';
import cliProgress from 'cli-progress';
import path from 'node:path';
import process from 'node:process';
import type { BatchReport, IBatchOptions, ImageProcessor, IProgressBar } from './@types';
import { config } from './config';
import { generateAll, resizeAll } from './core/batch';
import { getImageProcessor } from './core/imageProcessing/processor';
import { describeError } from './errors';
import { getLogger, NoopLogFacility } from './utils/logging/logUtils';

interface ICommonOptions {
    output: string;
    manifest?: boolean;
    verbose?: boolean;
    progress?: boolean;
}

interface IRenderOptions extends ICommonOptions {
    font?: string;
}

interface IResizeOptions extends ICommonOptions {
    source: string;
}

/**
 * Builds the batch options shared by both commands: logger and optional
 * progress bar.
 */
function batchOptions(name: string, options: ICommonOptions): IBatchOptions {
    const logger = getLogger(name, options.progress ? NoopLogFacility : console, options.verbose ?? false);
    let progressBar: IProgressBar | undefined;
    if (options.progress) {
        progressBar = new cliProgress.SingleBar(
            {
                format: 'Processing |{bar}| {percentage}% || {value}/{total} icons {file}',
                barCompleteChar: '█',
                barIncompleteChar: '░',
                hideCursor: true,
            },
            cliProgress.Presets.shades_grey,
        );
    }
    return {
        logger,
        progressBar,
        manifest: options.manifest ?? false,
    };
}

function addCommonOptions(command: Command): Command {
    return command
        .option('-o, --output <folder>', 'Icon set folder to write', config.paths.outputDirectory)
        .option('--manifest', `Also write ${config.paths.manifestFile}`)
        .option('--progress', 'Show a progress bar instead of one line per icon')
        .option('-v, --verbose', 'Enable verbose logging')
        .showHelpAfterError();
}

function exitCodeFor(report: BatchReport, options: IBatchOptions): number {
    if (report.failed > 0) {
        // Logged lines are hidden behind the progress bar
        console.error(`${report.failed} icon(s) could not be created`);
        return 1;
    }
    if (options.progressBar) {
        console.log(`${report.written} icons written to ${report.outputDirectory}`);
    }
    return 0;
}

/**
 * Parses `argv` (node, script, then arguments) and runs the chosen command.
 * Resolves with the process exit status: 0 when every icon was written, 1 when
 * the source is missing, an icon failed or the command could not run.
 */
export async function run(argv: readonly string[], processor: ImageProcessor = getImageProcessor()): Promise<number> {
    let exitCode = 0;
    const program = new Command();

    program
        .name('icon-set')
        .description('Draws the base-10 blocks app icon into every size of an iOS AppIcon.appiconset')
        .version('1.0.0')
        .exitOverride();

    addCommonOptions(
        program.command('render', { isDefault: true }).description('Draw the icon at every catalog size'),
    )
        .option('--font <file>', `Font file for the block labels (Default: $${config.fontEnvVariable})`)
        .action(async (options: IRenderOptions) => {
            // Label font: option first, then the environment
            const batch = { ...batchOptions('render', options), fontFile: options.font ?? process.env[config.fontEnvVariable] };
            try {
                exitCode = exitCodeFor(await generateAll(path.resolve(options.output), batch, processor), batch);
            } catch (error) {
                batch.logger.error(`Rendering failed: ${describeError(error)}`);
                exitCode = 1;
            }
        });

    addCommonOptions(
        program.command('resize').description('Resize an existing source icon to every catalog size'),
    )
        .option('-s, --source <file>', 'Source icon to resize', config.paths.sourceIcon)
        .action(async (options: IResizeOptions) => {
            const batch = batchOptions('resize', options);
            try {
                exitCode = exitCodeFor(
                    await resizeAll(path.resolve(options.source), path.resolve(options.output), batch, processor),
                    batch,
                );
            } catch (error) {
                batch.logger.error(`Resizing failed: ${describeError(error)}`);
                exitCode = 1;
            }
        });

    try {
        await program.parseAsync([...argv]);
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        console.error(describeError(error));
        return 1;
    }
    return exitCode;
}

if (require.main === module) {
    run(process.argv).then(
        code => {
            process.exitCode = code;
        },
        (error: unknown) => {
            console.error(describeError(error));
            process.exitCode = 1;
        },
    );
}
