import { IProgressReporter, ProgressEvent } from '../../domain';

export interface ProgressOutput {
    isTTY?: boolean;
    write(text: string): unknown;
}

const BAR_WIDTH = 20;
const CLEAR_LINE = '\r\x1b[2K';

/**
 * Redraws a single status line on an interactive terminal. Writes nothing
 * when the output is not a terminal.
 */
export class ConsoleProgressReporter implements IProgressReporter {
    private active = false;

    constructor(private readonly output: ProgressOutput = process.stderr) {}

    report(event: ProgressEvent): void {
        if (!this.output.isTTY) {
            return;
        }
        this.output.write(CLEAR_LINE + renderProgress(event));
        this.active = true;
    }

    complete(activity: string): void {
        if (!this.active) {
            return;
        }
        this.output.write(`${CLEAR_LINE}${activity} ✓\n`);
        this.active = false;
    }
}

export function renderProgress(event: ProgressEvent): string {
    if (event.percent === undefined) {
        return `${event.activity} ${event.status}`;
    }

    const filled = Math.round((event.percent / 100) * BAR_WIDTH);
    const bar = '#'.repeat(filled) + '-'.repeat(BAR_WIDTH - filled);
    return `${event.activity} [${bar}] ${event.percent}% ${event.status}`;
}
