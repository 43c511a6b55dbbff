import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileOperations, LocalFileStorage } from './LocalFileStorage';
import { DirectoryCreateError, TempFileError, FinalizeError } from '../../shared/errors/AppError';
import { LogLevel } from '../../shared/logging/Logger';
import { RecordingLogger } from '../../__mocks__/recordingLogger';

describe('LocalFileStorage', () => {
    let root: string;
    let storage: LocalFileStorage;

    beforeEach(async () => {
        root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'grabfile-storage-'));
        storage = new LocalFileStorage(new RecordingLogger());
    });

    afterEach(async () => {
        await fs.promises.rm(root, { recursive: true, force: true });
    });

    describe('ensureDirectory', () => {
        it('should create intermediate directories', async () => {
            const nested = path.join(root, 'a', 'b', 'c');

            await storage.ensureDirectory(nested);

            expect((await fs.promises.stat(nested)).isDirectory()).toBe(true);
        });

        it('should accept an existing directory', async () => {
            await expect(storage.ensureDirectory(root)).resolves.toBeUndefined();
        });

        it('should fail when a file is in the way', async () => {
            const file = path.join(root, 'file');
            await fs.promises.writeFile(file, '');

            await expect(storage.ensureDirectory(path.join(file, 'sub'))).rejects.toBeInstanceOf(DirectoryCreateError);
        });
    });

    describe('createTempFile', () => {
        it('should create a uniquely named .tmp file', async () => {
            const first = await storage.createTempFile(root);
            const second = await storage.createTempFile(root);
            await first.handle.close();
            await second.handle.close();

            expect(path.dirname(first.path)).toBe(root);
            expect(path.basename(first.path)).toMatch(/^[0-9a-f-]{36}\.tmp$/);
            expect(first.path).not.toBe(second.path);
            expect(fs.existsSync(first.path)).toBe(true);
        });

        it('should fail in a missing directory', async () => {
            await expect(storage.createTempFile(path.join(root, 'missing'))).rejects.toBeInstanceOf(TempFileError);
        });
    });

    describe('move', () => {
        it('should replace an existing destination', async () => {
            const source = path.join(root, 'source.tmp');
            const destination = path.join(root, 'final.txt');
            await fs.promises.writeFile(source, 'new');
            await fs.promises.writeFile(destination, 'old');

            await storage.move(source, destination);

            expect(await fs.promises.readFile(destination, 'utf8')).toBe('new');
            expect(fs.existsSync(source)).toBe(false);
        });

        it('should fail when the source is missing', async () => {
            const destination = path.join(root, 'final.txt');

            await expect(storage.move(path.join(root, 'gone.tmp'), destination)).rejects.toBeInstanceOf(FinalizeError);
            expect(fs.existsSync(destination)).toBe(false);
        });

        describe('across devices', () => {
            let source: string;
            let destination: string;
            let logger: RecordingLogger;
            let copyTargets: string[];

            function errno(code: string): Error {
                return Object.assign(new Error(`${code}: operation failed`), { code });
            }

            // Renames out of the source fail as if it lived on another device
            function crossDevice(overrides: Partial<FileOperations> = {}): LocalFileStorage {
                const ops: FileOperations = {
                    rename: async (from, to) => {
                        if (from === source) {
                            throw errno('EXDEV');
                        }
                        await fs.promises.rename(from, to);
                    },
                    copyFile: async (from, to, mode) => {
                        copyTargets.push(to);
                        await fs.promises.copyFile(from, to, mode);
                    },
                    unlink: filePath => fs.promises.unlink(filePath),
                    ...overrides
                };
                return new LocalFileStorage(logger, ops);
            }

            beforeEach(async () => {
                source = path.join(root, 'source.tmp');
                destination = path.join(root, 'out', 'final.txt');
                logger = new RecordingLogger();
                copyTargets = [];
                await fs.promises.mkdir(path.dirname(destination));
                await fs.promises.writeFile(source, 'NEW CONTENT');
                await fs.promises.writeFile(destination, 'OLD');
            });

            it('should copy beside the destination and rename into place', async () => {
                await crossDevice().move(source, destination);

                expect(await fs.promises.readFile(destination, 'utf8')).toBe('NEW CONTENT');
                expect(fs.existsSync(source)).toBe(false);
                expect(copyTargets).toHaveLength(1);
                expect(path.dirname(copyTargets[0])).toBe(path.dirname(destination));
                expect(copyTargets[0]).not.toBe(destination);
                expect(await fs.promises.readdir(path.dirname(destination))).toEqual(['final.txt']);
            });

            it('should leave the destination untouched when the copy fails part way', async () => {
                const partial = crossDevice({
                    copyFile: async (_from, to) => {
                        copyTargets.push(to);
                        await fs.promises.writeFile(to, 'NEW');
                        throw errno('ENOSPC');
                    }
                });

                await expect(partial.move(source, destination)).rejects.toBeInstanceOf(FinalizeError);

                expect(copyTargets[0]).not.toBe(destination);
                expect(await fs.promises.readFile(destination, 'utf8')).toBe('OLD');
                expect(await fs.promises.readdir(path.dirname(destination))).toEqual(['final.txt']);
                expect(await fs.promises.readFile(source, 'utf8')).toBe('NEW CONTENT');
            });

            it('should only warn when the source cannot be removed after copying', async () => {
                const stuck = crossDevice({
                    unlink: async () => {
                        throw errno('EACCES');
                    }
                });

                await stuck.move(source, destination);

                expect(await fs.promises.readFile(destination, 'utf8')).toBe('NEW CONTENT');
                expect(logger.messages(LogLevel.WARN)).toEqual([
                    `Could not remove ${source} after copying: EACCES: operation failed`
                ]);
            });
        });
    });

    describe('setModifiedTime', () => {
        it('should set the modification time', async () => {
            const file = path.join(root, 'dated.txt');
            await fs.promises.writeFile(file, '');
            const modifiedAt = new Date(Date.UTC(2015, 9, 21, 7, 28, 0));

            await storage.setModifiedTime(file, modifiedAt);

            expect((await storage.getMetadata(file)).modifiedAt.getTime()).toBe(modifiedAt.getTime());
        });
    });

    describe('remove', () => {
        it('should delete a file and ignore one already gone', async () => {
            const file = path.join(root, 'doomed.tmp');
            await fs.promises.writeFile(file, 'x');

            await storage.remove(file);
            await storage.remove(file);

            expect(await storage.exists(file)).toBe(false);
        });
    });

    describe('listTempFiles', () => {
        it('should list only .tmp files, oldest filter applied', async () => {
            const stale = path.join(root, 'stale.tmp');
            const fresh = path.join(root, 'fresh.tmp');
            await fs.promises.writeFile(stale, 'abc');
            await fs.promises.writeFile(fresh, 'x');
            await fs.promises.writeFile(path.join(root, 'keep.txt'), '');
            await fs.promises.mkdir(path.join(root, 'dir.tmp'));
            const longAgo = new Date(Date.UTC(2020, 0, 1));
            await fs.promises.utimes(stale, longAgo, longAgo);

            const all = await storage.listTempFiles(root);
            const old = await storage.listTempFiles(root, { olderThan: new Date(Date.UTC(2021, 0, 1)) });

            expect(all.map(info => info.name)).toEqual(['fresh.tmp', 'stale.tmp']);
            expect(old).toEqual([{
                name: 'stale.tmp',
                path: stale,
                size: 3,
                modifiedAt: longAgo
            }]);
        });

        it('should return nothing for a missing directory', async () => {
            expect(await storage.listTempFiles(path.join(root, 'missing'))).toEqual([]);
        });
    });
});
