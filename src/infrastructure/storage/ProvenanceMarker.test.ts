import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    ZoneIdentifierMarker,
    QuarantineAttributeMarker,
    NoopProvenanceMarker,
    CommandRunner,
    createProvenanceMarker
} from './ProvenanceMarker';

describe('ProvenanceMarker', () => {
    describe('createProvenanceMarker', () => {
        it('should pick the marker for each platform', () => {
            expect(createProvenanceMarker('win32')).toBeInstanceOf(ZoneIdentifierMarker);
            expect(createProvenanceMarker('darwin')).toBeInstanceOf(QuarantineAttributeMarker);
            expect(createProvenanceMarker('linux')).toBeInstanceOf(NoopProvenanceMarker);
            expect(createProvenanceMarker('linux').platform).toBe('linux');
        });
    });

    describe('ZoneIdentifierMarker', () => {
        let root: string;
        let file: string;

        beforeEach(async () => {
            root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'grabfile-zone-'));
            file = path.join(root, 'setup.exe');
            await fs.promises.writeFile(file, 'binary');
        });

        afterEach(async () => {
            await fs.promises.rm(root, { recursive: true, force: true });
        });

        it('should write the internet zone stream and remove it again', async () => {
            const marker = new ZoneIdentifierMarker();
            const stream = `${file}:Zone.Identifier`;

            await marker.mark(file);
            expect(await fs.promises.readFile(stream, 'utf8')).toBe('[ZoneTransfer]\r\nZoneId=3\r\n');

            await marker.clear(file);
            expect(fs.existsSync(stream)).toBe(false);
        });

        it('should clear a file that was never marked', async () => {
            await expect(new ZoneIdentifierMarker().clear(file)).resolves.toBeUndefined();
        });
    });

    describe('QuarantineAttributeMarker', () => {
        const clock = { now: () => Date.UTC(2015, 9, 21, 7, 28, 0) };

        function recordingRunner(failure?: Error): { calls: Array<[string, string[]]>; run: CommandRunner } {
            const calls: Array<[string, string[]]> = [];
            const run: CommandRunner = async (file, args) => {
                calls.push([file, args]);
                if (failure) {
                    throw failure;
                }
                return { stdout: '', stderr: '' };
            };
            return { calls, run };
        }

        it('should write the quarantine attribute', async () => {
            const { calls, run } = recordingRunner();

            await new QuarantineAttributeMarker(run, clock).mark('/tmp/setup.dmg');

            expect(calls).toEqual([
                ['xattr', ['-w', 'com.apple.quarantine', '0081;56273e80;grabfile;', '/tmp/setup.dmg']]
            ]);
        });

        it('should delete the attribute on clear', async () => {
            const { calls, run } = recordingRunner();

            await new QuarantineAttributeMarker(run, clock).clear('/tmp/setup.dmg');

            expect(calls).toEqual([['xattr', ['-d', 'com.apple.quarantine', '/tmp/setup.dmg']]]);
        });

        it('should accept a file without the attribute', async () => {
            const { run } = recordingRunner(
                new Error('Command failed: xattr -d com.apple.quarantine /tmp/a\nxattr: /tmp/a: No such xattr: com.apple.quarantine')
            );

            await expect(new QuarantineAttributeMarker(run, clock).clear('/tmp/a')).resolves.toBeUndefined();
        });

        it('should surface other xattr failures', async () => {
            const { run } = recordingRunner(new Error('spawn xattr ENOENT'));

            await expect(new QuarantineAttributeMarker(run, clock).mark('/tmp/a')).rejects.toThrow('spawn xattr ENOENT');
        });
    });

    describe('NoopProvenanceMarker', () => {
        it('should do nothing', async () => {
            const marker = new NoopProvenanceMarker('linux');

            await expect(marker.mark()).resolves.toBeUndefined();
            await expect(marker.clear()).resolves.toBeUndefined();
        });
    });
});
