import * as os from 'os';
import { ResourceUrl } from '../value-objects/ResourceUrl';
import { ValidationError } from '../../shared/errors/AppError';

/**
 * Everything the engine needs to fetch one resource. Read-only to the engine.
 */
export interface DownloadRequest {
  readonly uri: string;
  readonly destinationDir: string;
  /**
   * Overrides Content-Disposition and URL naming when non-blank
   */
  readonly explicitFileName?: string;
  /**
   * Ordered User-Agent values; an empty string means "no identity"
   */
  readonly identityCandidates: readonly string[];
  readonly extraHeaders: Readonly<Record<string, string>>;
  readonly tempDir: string;
  readonly ignoreDate: boolean;
  readonly blockFile: boolean;
  readonly noClobber: boolean;
  readonly reportProgress: boolean;
  /**
   * Leave the temporary file behind when a transfer fails
   */
  readonly keepPartial: boolean;
}

export type DownloadRequestInput = Pick<DownloadRequest, 'uri'> & Partial<Omit<DownloadRequest, 'uri'>>;

/**
 * An explicit file name must name a file inside the destination directory
 */
export function assertPlainFileName(fileName: string | undefined): void {
  const trimmed = fileName?.trim();
  if (!trimmed) {
    return;
  }
  if (/[\\/]/.test(trimmed) || trimmed === '.' || trimmed === '..') {
    throw new ValidationError(`File name must not contain a path: ${trimmed}`, { fileName });
  }
}

/**
 * Build a request, validating the URL and filling in defaults
 */
export function createDownloadRequest(input: DownloadRequestInput): DownloadRequest {
  const url = new ResourceUrl(input.uri);
  assertPlainFileName(input.explicitFileName);

  return Object.freeze({
    uri: url.toString(),
    destinationDir: input.destinationDir ?? process.cwd(),
    explicitFileName: input.explicitFileName,
    identityCandidates: Object.freeze([...(input.identityCandidates ?? [''])]),
    extraHeaders: Object.freeze({ ...(input.extraHeaders ?? {}) }),
    tempDir: input.tempDir ?? os.tmpdir(),
    ignoreDate: input.ignoreDate ?? false,
    blockFile: input.blockFile ?? false,
    noClobber: input.noClobber ?? false,
    reportProgress: input.reportProgress ?? true,
    keepPartial: input.keepPartial ?? false
  });
}
