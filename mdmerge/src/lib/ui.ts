/**
 * Terminal progress display for the CLI
 */

import ora from 'ora';
import * as cliProgress from 'cli-progress';
import chalk from 'chalk';
import { ProgressStyle, ProgressOptions, ProgressTracker, OutputEntry } from '../types';
import { SPINNER_CHARS, PROGRESS_BAR_LENGTH } from '../config';

/**
 * Check if the terminal is interactive
 */
function isInteractiveTerminal(): boolean {
    return process.stdout.isTTY === true;
}

/**
 * Format seconds as mm:ss
 */
export function formatTime(seconds: number): string {
    const mins = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);
    return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
}

class ProgressTrackerImpl implements ProgressTracker {
    private readonly style: ProgressStyle;
    private readonly interactive: boolean;
    private title = '';
    private total = 0;
    private current = 0;
    private startTime = Date.now();
    private spinner: ReturnType<typeof ora> | null = null;
    private progressBar: cliProgress.SingleBar | null = null;

    constructor(style: ProgressStyle, interactive: boolean) {
        this.style = style;
        this.interactive = interactive;
    }

    start(options: ProgressOptions): void {
        this.title = options.title || 'Processing';
        this.total = options.total;
        this.current = 0;
        this.startTime = Date.now();

        // Don't show progress if not interactive or style is none
        if (!this.interactive || this.style === 'none') {
            return;
        }

        this.cleanup();

        switch (this.style) {
            case 'spinner':
                this.spinner = ora({
                    text: `${this.title} (0/${this.total})`,
                    spinner: { interval: 80, frames: SPINNER_CHARS },
                }).start();
                break;
            case 'bar':
                this.progressBar = new cliProgress.SingleBar({
                    format: `${this.title} |${chalk.cyan('{bar}')}| {percentage}% | {value}/{total} | {file}`,
                    barCompleteChar: '█',
                    barIncompleteChar: '░',
                    hideCursor: true,
                    clearOnComplete: false,
                    barsize: PROGRESS_BAR_LENGTH,
                });
                this.progressBar.start(this.total, 0, { file: '' });
                break;
            case 'simple':
                process.stdout.write(`${this.title}: 0/${this.total}\n`);
                break;
        }
    }

    advance(message?: string): void {
        this.current = Math.min(this.current + 1, this.total);
        if (!this.interactive || this.style === 'none') {
            return;
        }

        switch (this.style) {
            case 'spinner':
                if (this.spinner) {
                    this.spinner.text = `${this.title} (${this.current}/${this.total})${message ? ` ${chalk.gray(message)}` : ''}`;
                }
                break;
            case 'bar':
                this.progressBar?.update(this.current, { file: message ?? '' });
                break;
            case 'simple':
                process.stdout.write(`\r${this.title}: ${this.current}/${this.total}`);
                break;
        }
    }

    finish(message?: string): void {
        if (!this.interactive || this.style === 'none') {
            return;
        }

        const elapsed = (Date.now() - this.startTime) / 1000;
        const finalMessage = `${message || `${this.title} complete`} in ${formatTime(elapsed)}`;

        switch (this.style) {
            case 'spinner':
                if (this.spinner) {
                    this.spinner.succeed(finalMessage);
                    this.spinner = null;
                }
                break;
            case 'bar':
                if (this.progressBar) {
                    this.progressBar.update(this.total);
                    this.progressBar.stop();
                    this.progressBar = null;
                }
                process.stdout.write(`${finalMessage}\n`);
                break;
            case 'simple':
                process.stdout.write(`\r${finalMessage}${' '.repeat(20)}\n`);
                break;
        }
    }

    /**
     * Stops whatever display is still running, e.g. after a failure.
     */
    cleanup(): void {
        if (this.spinner) {
            this.spinner.stop();
            this.spinner = null;
        }

        if (this.progressBar) {
            this.progressBar.stop();
            this.progressBar = null;
        }
    }
}

export function createProgressTracker(style: ProgressStyle, interactive: boolean = isInteractiveTerminal()): ProgressTracker & { cleanup(): void } {
    return new ProgressTrackerImpl(style, interactive);
}

export type MessageStyle = 'info' | 'success' | 'warning' | 'error';

/**
 * Create a styled message using chalk
 */
export function styleMessage(message: string, style: MessageStyle): string {
    switch (style) {
        case 'info':
            return chalk.blue(message);
        case 'success':
            return chalk.green(message);
        case 'warning':
            return chalk.yellow(message);
        case 'error':
            return chalk.red(message);
    }
}

export function printMessage(message: string, style: MessageStyle): void {
    console.log(styleMessage(message, style));
}

/**
 * One line per output entry: name, merged file count and word count.
 */
export function formatSummary(entries: OutputEntry[]): string {
    if (entries.length === 0) {
        return 'No Markdown files found; the output archive is empty.';
    }
    return entries
        .map(entry => {
            const line = `${entry.name}  files=${entry.memberCount}  words=${entry.wordCount}`;
            return entry.overThreshold ? chalk.yellow(line) : line;
        })
        .join('\n');
}

/**
 * Print a result to the console with nice formatting
 */
export function printResult(title: string, content: string): void {
    console.log('\n' + chalk.bold.cyan(title));
    console.log(chalk.gray('─'.repeat(process.stdout.columns || 80)));
    console.log(content);
    console.log(chalk.gray('─'.repeat(process.stdout.columns || 80)) + '\n');
}
