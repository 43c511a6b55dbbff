import { IDownloadEngine } from './IDownloadEngine';
import { IMetadataResolver } from './IMetadataResolver';

/**
 * Components sharing one network client for the length of a batch
 */
export interface DownloadServices {
  engine: IDownloadEngine;
  resolver: IMetadataResolver;
}

/**
 * Runs `work` with freshly acquired services and releases them on every exit path
 */
export type DownloadSession = <T>(work: (services: DownloadServices) => Promise<T>) => Promise<T>;
