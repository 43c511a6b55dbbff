import { DownloadSession, DownloadServices } from '../../domain/interfaces/IDownloadSession';
import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { IProvenanceMarker } from '../../domain/interfaces/IProvenanceMarker';
import { IProgressReporter } from '../../domain/interfaces/IProgressReporter';
import { HttpClient, HttpClientConfig } from '../http/HttpClient';
import { MetadataResolver } from '../resolution/MetadataResolver';
import { LocalFileStorage } from '../storage/LocalFileStorage';
import { createProvenanceMarker } from '../storage/ProvenanceMarker';
import { DownloadEngine } from './DownloadEngine';
import { ILogger } from '../../shared/logging/Logger';
import { Clock } from '../../shared/utils/clock';

export interface DownloadSessionOptions {
    logger: ILogger;
    http?: HttpClientConfig;
    storage?: IFileStorage;
    marker?: IProvenanceMarker;
    progress?: IProgressReporter;
    clock?: Clock;
}

/**
 * Wire the resolver and engine around one scoped HttpClient per batch
 */
export function createDownloadSession(options: DownloadSessionOptions): DownloadSession {
    const { logger } = options;
    const storage = options.storage ?? new LocalFileStorage(logger);
    const marker = options.marker ?? createProvenanceMarker();

    return <T>(work: (services: DownloadServices) => Promise<T>): Promise<T> =>
        HttpClient.use(logger, options.http ?? {}, client => {
            const resolver = new MetadataResolver(client, logger);
            const engine = new DownloadEngine({
                client,
                resolver,
                storage,
                marker,
                logger,
                progress: options.progress,
                clock: options.clock
            });
            return work({ engine, resolver });
        });
}
