#!/usr/bin/env node
/**
 * Main entry point for the mdmerge CLI
 * Subcommand-based CLI structure using yargs
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as path from 'path';
import { promises as fs } from 'fs';
import logger, { setLogLevel } from './lib/logger';
import { isMergeError } from './lib/errors';
import { createProgressTracker, formatSummary, printMessage, printResult } from './lib/ui';
import pipelineService from './services/pipeline.service';
import { DEFAULT_OUTPUT_DIR, DEFAULT_PROGRESS_STYLE, PROGRESS_STYLES } from './config';

yargs(hideBin(process.argv))
    .scriptName('mdmerge')
    .usage('$0 <command> [options]')
    .command(
        'merge <zip>',
        'Strip frontmatter from the Markdown files in a ZIP and merge large collections',
        (y) => y
            .positional('zip', {
                describe: 'ZIP archive of Markdown files',
                type: 'string',
                demandOption: true,
            })
            .option('output', {
                describe: 'Directory to write the result archive to',
                type: 'string',
                default: DEFAULT_OUTPUT_DIR,
            })
            .option('progress', {
                describe: 'Progress display style',
                choices: PROGRESS_STYLES,
                default: DEFAULT_PROGRESS_STYLE,
            })
            .option('debug', {
                describe: 'Enable debug logging',
                type: 'boolean',
                default: false,
            })
            .example('$0 merge notes.zip', 'Process notes.zip into ./results')
            .example('$0 merge notes.zip --output out --progress bar', 'Write to ./out with a progress bar'),
        async (argv) => {
            if (argv.debug) {
                setLogLevel('debug');
            }
            const tracker = createProgressTracker(argv.progress);
            try {
                const input = path.resolve(process.cwd(), argv.zip);
                logger.info(`Reading archive: ${input}`);
                const data = await fs.readFile(input);
                const result = await pipelineService.processArchive(data, { tracker, sourceName: path.basename(input) });

                const outDir = path.resolve(process.cwd(), argv.output);
                await fs.mkdir(outDir, { recursive: true });
                const outPath = path.join(outDir, result.downloadName);
                await fs.writeFile(outPath, result.archive);

                printResult(`${result.totalFiles} file(s) -> ${result.entries.length} entr${result.entries.length === 1 ? 'y' : 'ies'}`, formatSummary(result.entries));
                printMessage(`Saved ${outPath}`, 'success');
                process.exit(0);
            } catch (error) {
                tracker.cleanup();
                if (isMergeError(error)) {
                    logger.error(`${error.code}: ${error.message}${error.details ? ` (${error.details})` : ''}`);
                    printMessage(`Error: ${error.message}`, 'error');
                } else {
                    logger.error(`Error: ${error}`);
                    printMessage(`Error: ${error}`, 'error');
                }
                process.exit(1);
            }
        }
    )
    .demandCommand(1, 'You must provide a valid command')
    .strict()
    .help()
    .alias('h', 'help')
    .version()
    .alias('v', 'version')
    .parse();
