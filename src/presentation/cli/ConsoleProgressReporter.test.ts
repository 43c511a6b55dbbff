import { describe, it, expect } from '@jest/globals';
import { ConsoleProgressReporter, renderProgress } from './ConsoleProgressReporter';

function terminal(isTTY: boolean): { isTTY: boolean; written: string[]; write: (text: string) => boolean } {
    const written: string[] = [];
    return {
        isTTY,
        written,
        write: (text: string) => {
            written.push(text);
            return true;
        }
    };
}

describe('renderProgress', () => {
    it('should draw a bar when the percentage is known', () => {
        expect(renderProgress({
            activity: 'Downloading a.bin',
            status: '512 B of 1.0 KB',
            percent: 50,
            bytesWritten: 512,
            totalBytes: 1024
        })).toBe('Downloading a.bin [##########----------] 50% 512 B of 1.0 KB');
    });

    it('should print only the status when the size is unknown', () => {
        expect(renderProgress({
            activity: 'Downloading a.bin',
            status: '3 B (size unknown)',
            bytesWritten: 3
        })).toBe('Downloading a.bin 3 B (size unknown)');
    });
});

describe('ConsoleProgressReporter', () => {
    it('should redraw one line on a terminal and finish it', () => {
        const output = terminal(true);
        const reporter = new ConsoleProgressReporter(output);

        reporter.report({ activity: 'Downloading a.bin', status: '0 B of 4 B', percent: 0, bytesWritten: 0, totalBytes: 4 });
        reporter.complete('Downloading a.bin');

        expect(output.written).toEqual([
            '\r\x1b[2KDownloading a.bin [--------------------] 0% 0 B of 4 B',
            '\r\x1b[2KDownloading a.bin ✓\n'
        ]);
    });

    it('should stay quiet when the output is not a terminal', () => {
        const output = terminal(false);
        const reporter = new ConsoleProgressReporter(output);

        reporter.report({ activity: 'Downloading a.bin', status: '1 B', bytesWritten: 1 });
        reporter.complete('Downloading a.bin');

        expect(output.written).toEqual([]);
    });
});
