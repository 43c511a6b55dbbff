import { DownloadRequest } from '../entities/DownloadRequest';
import { DownloadResult } from '../entities/DownloadResult';

/**
 * Streams one resource to disk
 */
export interface IDownloadEngine {
  download(request: DownloadRequest): Promise<DownloadResult>;
}

/**
 * Per-item lifecycle
 */
export enum DownloadState {
  RESOLVING = 'Resolving',
  NAMING = 'Naming',
  CLOBBER_CHECK = 'ClobberCheck',
  STREAM_OPENING = 'StreamOpening',
  TEMP_WRITING = 'TempWriting',
  FINALIZING = 'Finalizing',
  DONE = 'Done',
  FAILED = 'Failed'
}
