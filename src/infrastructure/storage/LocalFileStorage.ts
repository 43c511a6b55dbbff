import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { glob } from 'glob';
import {
    IFileStorage,
    TempFile,
    FileMetadata,
    ListTempOptions,
    FileInfo
} from '../../domain/interfaces/IFileStorage';
import {
    DirectoryCreateError,
    TempFileError,
    FinalizeError,
    errorMessage,
    isErrnoException
} from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

const fsPromises = fs.promises;

export const TEMP_EXTENSION = '.tmp';

/**
 * The file system calls a move is made of
 */
export interface FileOperations {
    rename(source: string, destination: string): Promise<void>;
    copyFile(source: string, destination: string, mode?: number): Promise<void>;
    unlink(filePath: string): Promise<void>;
}

export class LocalFileStorage implements IFileStorage {
    constructor(
        private logger: ILogger,
        private ops: FileOperations = fsPromises
    ) {}

    async exists(filePath: string): Promise<boolean> {
        try {
            await fsPromises.access(filePath, fs.constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async ensureDirectory(dirPath: string): Promise<void> {
        try {
            await fsPromises.mkdir(dirPath, { recursive: true });
        } catch (error) {
            throw new DirectoryCreateError(dirPath, error);
        }
    }

    async createTempFile(directory: string): Promise<TempFile> {
        const tempPath = path.join(directory, `${crypto.randomUUID()}${TEMP_EXTENSION}`);

        try {
            const handle = await fsPromises.open(tempPath, 'wx');
            this.logger.debug(`Temp file created: ${tempPath}`);
            return { path: tempPath, handle };
        } catch (error) {
            throw new TempFileError(tempPath, error);
        }
    }

    async move(source: string, destination: string): Promise<void> {
        try {
            await this.ops.rename(source, destination);
        } catch (error) {
            if (!isErrnoException(error) || error.code !== 'EXDEV') {
                throw new FinalizeError(source, destination, error);
            }
            await this.copyAcrossDevices(source, destination);
        }
        this.logger.debug(`Moved ${source} -> ${destination}`);
    }

    async setModifiedTime(filePath: string, modifiedAt: Date): Promise<void> {
        await fsPromises.utimes(filePath, new Date(), modifiedAt);
    }

    async remove(filePath: string): Promise<void> {
        try {
            await this.ops.unlink(filePath);
            this.logger.debug(`File deleted: ${filePath}`);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return;
            }
            throw error;
        }
    }

    async getMetadata(filePath: string): Promise<FileMetadata> {
        const stats = await fsPromises.stat(filePath);

        return {
            size: stats.size,
            createdAt: stats.birthtime,
            modifiedAt: stats.mtime
        };
    }

    async listTempFiles(directory: string, options: ListTempOptions = {}): Promise<FileInfo[]> {
        const files = await glob(`*${TEMP_EXTENSION}`, {
            cwd: directory,
            absolute: true,
            nodir: true,
            dot: true
        });

        const infos = await Promise.all(
            files.map(async (file): Promise<FileInfo> => {
                const stats = await fsPromises.stat(file);
                return {
                    name: path.basename(file),
                    path: file,
                    size: stats.size,
                    modifiedAt: stats.mtime
                };
            })
        );

        const { olderThan } = options;
        return infos
            .filter(info => olderThan === undefined || info.modifiedAt.getTime() < olderThan.getTime())
            .sort((a, b) => a.name.localeCompare(b.name));
    }

    /**
     * Copy beside the destination, then rename over it. The destination is
     * either left as it was or fully replaced.
     */
    private async copyAcrossDevices(source: string, destination: string): Promise<void> {
        const staging = path.join(path.dirname(destination), `.${crypto.randomUUID()}${TEMP_EXTENSION}`);
        this.logger.debug(`Rename crossed devices, copying ${source} -> ${staging}`);

        try {
            await this.ops.copyFile(source, staging, fs.constants.COPYFILE_EXCL);
            await this.ops.rename(staging, destination);
        } catch (error) {
            await this.discard(staging);
            throw new FinalizeError(source, destination, error);
        }

        try {
            await this.remove(source);
        } catch (error) {
            this.logger.warn(`Could not remove ${source} after copying: ${errorMessage(error)}`);
        }
    }

    private async discard(filePath: string): Promise<void> {
        try {
            await this.remove(filePath);
        } catch (error) {
            this.logger.warn(`Could not remove ${filePath}: ${errorMessage(error)}`);
        }
    }
}
