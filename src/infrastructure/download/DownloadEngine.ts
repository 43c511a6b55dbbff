import * as path from 'path';
import { FileHandle } from 'fs/promises';
import { IDownloadEngine, DownloadState } from '../../domain/interfaces/IDownloadEngine';
import { IMetadataResolver } from '../../domain/interfaces/IMetadataResolver';
import { IFileStorage, TempFile } from '../../domain/interfaces/IFileStorage';
import { IProvenanceMarker } from '../../domain/interfaces/IProvenanceMarker';
import { IProgressReporter, silentProgressReporter } from '../../domain/interfaces/IProgressReporter';
import { DownloadRequest } from '../../domain/entities/DownloadRequest';
import { DownloadResult } from '../../domain/entities/DownloadResult';
import { ResolvedResource } from '../../domain/entities/ResolvedResource';
import { HttpClient } from '../http/HttpClient';
import { ProgressThrottle } from './ProgressThrottle';
import {
    AppError,
    NoFileNameError,
    ClobberError,
    StreamUnavailableError,
    TransferError,
    errorMessage
} from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';
import { Clock, systemClock } from '../../shared/utils/clock';
import { formatBytes, percentOf } from '../../shared/utils/format';

export const COPY_CHUNK_SIZE = 64 * 1024;
export const PROGRESS_INTERVAL_MS = 250;

export interface DownloadEngineDependencies {
    client: HttpClient;
    resolver: IMetadataResolver;
    storage: IFileStorage;
    marker: IProvenanceMarker;
    logger: ILogger;
    progress?: IProgressReporter;
    clock?: Clock;
}

interface OpenStream {
    body: NodeJS.ReadableStream;
    release: () => void;
}

interface TransferContext {
    uri: string;
    activity: string;
    totalBytes?: number;
    reportProgress: boolean;
    bytesWritten: number;
}

/**
 * Streams one resource into a temporary file and moves it into place once the
 * body has been read to the end. The destination never holds a partial file.
 */
export class DownloadEngine implements IDownloadEngine {
    private readonly client: HttpClient;
    private readonly resolver: IMetadataResolver;
    private readonly storage: IFileStorage;
    private readonly marker: IProvenanceMarker;
    private readonly logger: ILogger;
    private readonly progress: IProgressReporter;
    private readonly clock: Clock;

    constructor(deps: DownloadEngineDependencies) {
        this.client = deps.client;
        this.resolver = deps.resolver;
        this.storage = deps.storage;
        this.marker = deps.marker;
        this.logger = deps.logger;
        this.progress = deps.progress ?? silentProgressReporter;
        this.clock = deps.clock ?? systemClock;
    }

    async download(request: DownloadRequest): Promise<DownloadResult> {
        const { uri } = request;
        let state = DownloadState.RESOLVING;
        let stream: OpenStream | undefined;

        const enter = (next: DownloadState): void => {
            this.logger.debug(`${uri}: ${state} -> ${next}`);
            state = next;
        };

        try {
            this.logger.debug(`${uri}: ${state}`);
            const resource = await this.resolver.resolve(
                uri,
                request.identityCandidates,
                request.extraHeaders,
                { explicitFileName: request.explicitFileName }
            );

            enter(DownloadState.NAMING);
            if (!resource.fileName) {
                throw new NoFileNameError(uri);
            }
            const destinationPath = path.join(request.destinationDir, resource.fileName);

            enter(DownloadState.CLOBBER_CHECK);
            if (request.noClobber && await this.storage.exists(destinationPath)) {
                throw new ClobberError(destinationPath);
            }

            enter(DownloadState.STREAM_OPENING);
            stream = await this.openStream(request);

            enter(DownloadState.TEMP_WRITING);
            await this.storage.ensureDirectory(request.tempDir);
            await this.storage.ensureDirectory(request.destinationDir);
            const tempFile = await this.storage.createTempFile(request.tempDir);
            const bytesWritten = await this.transfer(stream.body, tempFile, resource, request);

            enter(DownloadState.FINALIZING);
            await this.storage.move(tempFile.path, destinationPath);
            await this.applyProvenance(destinationPath, request.blockFile);
            const lastModifiedApplied = await this.applyModifiedTime(destinationPath, resource, request.ignoreDate);

            const result = new DownloadResult({
                finalPath: destinationPath,
                bytesWritten,
                resource,
                lastModifiedApplied
            });

            if (result.sizeMismatch) {
                this.logger.warn(`Size mismatch for ${destinationPath}`, {
                    declared: result.declaredSizeBytes,
                    written: bytesWritten
                });
            }

            enter(DownloadState.DONE);
            this.logger.info(`Saved ${destinationPath} (${formatBytes(bytesWritten)})`);

            return result;
        } catch (error) {
            stream?.release();
            const code = error instanceof AppError ? error.code : 'UNEXPECTED';
            this.logger.debug(`${uri}: ${state} -> ${DownloadState.FAILED}(${code})`);
            throw error;
        }
    }

    private async openStream(request: DownloadRequest): Promise<OpenStream> {
        const outcome = await this.client.firstSuccessful(
            request.uri,
            request.identityCandidates,
            request.extraHeaders,
            'body'
        );

        if (!outcome.ok) {
            throw new StreamUnavailableError(request.uri, outcome.status, outcome.reason);
        }

        const body: NodeJS.ReadableStream | null = outcome.response.body;
        if (!body) {
            outcome.release();
            throw new StreamUnavailableError(request.uri, outcome.response.status, 'Response has no body');
        }

        return { body, release: outcome.release };
    }

    /**
     * Copy the body into the temp file and close it. On failure the temp file
     * is removed unless the request keeps partial files.
     */
    private async transfer(
        body: NodeJS.ReadableStream,
        tempFile: TempFile,
        resource: ResolvedResource,
        request: DownloadRequest
    ): Promise<number> {
        const context: TransferContext = {
            uri: request.uri,
            activity: `Downloading ${resource.fileName}`,
            totalBytes: resource.fileSizeBytes,
            reportProgress: request.reportProgress,
            bytesWritten: 0
        };

        try {
            await this.copy(body, tempFile.handle, context);
        } catch (error) {
            await this.closeQuietly(tempFile.handle);
            await this.discardPartial(tempFile.path, request.keepPartial);
            throw new TransferError(
                request.uri,
                context.bytesWritten,
                error,
                request.keepPartial ? tempFile.path : undefined
            );
        }

        try {
            await tempFile.handle.close();
        } catch (error) {
            await this.discardPartial(tempFile.path, request.keepPartial);
            throw new TransferError(request.uri, context.bytesWritten, error);
        }

        if (context.reportProgress) {
            this.progress.complete(context.activity);
        }

        return context.bytesWritten;
    }

    private async copy(
        body: NodeJS.ReadableStream,
        handle: FileHandle,
        context: TransferContext
    ): Promise<void> {
        const throttle = new ProgressThrottle(PROGRESS_INTERVAL_MS, this.clock);

        for await (const chunk of body) {
            const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;

            for (let offset = 0; offset < data.length; offset += COPY_CHUNK_SIZE) {
                const slice = data.subarray(offset, Math.min(offset + COPY_CHUNK_SIZE, data.length));
                await writeFully(handle, slice);
                context.bytesWritten += slice.length;

                if (context.reportProgress && throttle.shouldEmit()) {
                    this.reportProgress(context);
                }
            }
        }
    }

    private reportProgress(context: TransferContext): void {
        const { bytesWritten, totalBytes } = context;

        this.progress.report({
            activity: context.activity,
            status: totalBytes !== undefined
                ? `${formatBytes(bytesWritten)} of ${formatBytes(totalBytes)}`
                : `${formatBytes(bytesWritten)} (size unknown)`,
            percent: totalBytes !== undefined ? percentOf(bytesWritten, totalBytes) : undefined,
            bytesWritten,
            totalBytes
        });
    }

    private async applyProvenance(filePath: string, block: boolean): Promise<void> {
        try {
            if (block) {
                await this.marker.mark(filePath);
            } else {
                await this.marker.clear(filePath);
            }
        } catch (error) {
            this.logger.warn(`Could not ${block ? 'set' : 'clear'} provenance marker on ${filePath}`, {
                platform: this.marker.platform,
                reason: errorMessage(error)
            });
        }
    }

    private async applyModifiedTime(
        filePath: string,
        resource: ResolvedResource,
        ignoreDate: boolean
    ): Promise<Date | undefined> {
        if (ignoreDate || !resource.lastModified) {
            return undefined;
        }

        try {
            await this.storage.setModifiedTime(filePath, resource.lastModified);
            return resource.lastModified;
        } catch (error) {
            this.logger.warn(`Could not set modification time on ${filePath}`, {
                reason: errorMessage(error)
            });
            return undefined;
        }
    }

    private async discardPartial(tempPath: string, keepPartial: boolean): Promise<void> {
        if (keepPartial) {
            this.logger.info(`Partial download kept at ${tempPath}`);
            return;
        }

        try {
            await this.storage.remove(tempPath);
        } catch (error) {
            this.logger.warn(`Could not remove partial file ${tempPath}`, { reason: errorMessage(error) });
        }
    }

    private async closeQuietly(handle: FileHandle): Promise<void> {
        try {
            await handle.close();
        } catch (error) {
            this.logger.debug(`Closing temp file failed: ${errorMessage(error)}`);
        }
    }
}

async function writeFully(handle: FileHandle, data: Buffer): Promise<void> {
    let offset = 0;
    while (offset < data.length) {
        const { bytesWritten } = await handle.write(data, offset, data.length - offset);
        offset += bytesWritten;
    }
}
