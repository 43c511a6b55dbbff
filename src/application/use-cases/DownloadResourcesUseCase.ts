import {
  BatchResult,
  DownloadRequestInput,
  DownloadResult,
  DownloadSession,
  assertPlainFileName,
  createDownloadRequest
} from '../../domain';
import { ErrorHandler, ILogger, ValidationError } from '../../shared';
import { runSequentially } from './runSequentially';

/**
 * Download resources use case request. Every option applies to each URL.
 */
export interface DownloadResourcesRequest extends Omit<DownloadRequestInput, 'uri'> {
  urls: string[];
}

/**
 * Downloads a list of URLs one after another over a single network session
 */
export class DownloadResourcesUseCase {
  constructor(
    private readonly session: DownloadSession,
    private readonly logger: ILogger,
    private readonly errorHandler: ErrorHandler = ErrorHandler.getInstance()
  ) {}

  async execute(request: DownloadResourcesRequest): Promise<BatchResult<DownloadResult>> {
    this.validateRequest(request);

    const { urls, ...options } = request;
    const started = Date.now();
    this.logger.info(`Downloading ${urls.length} resource(s)`);

    const outcomes = await this.session(({ engine }) =>
      runSequentially(urls, this.errorHandler, uri =>
        engine.download(createDownloadRequest({ ...options, uri }))
      )
    );

    const result = BatchResult.of(outcomes, Date.now() - started);

    if (result.success) {
      this.logger.info('Download completed successfully', { files: result.succeeded.length });
    } else {
      this.logger.warn('Download finished with failures', {
        succeeded: result.succeeded.length,
        failed: result.failed.length
      });
    }

    return result;
  }

  /**
   * Validate request
   */
  private validateRequest(request: DownloadResourcesRequest): void {
    if (request.urls.length === 0) {
      throw new ValidationError('At least one URL is required');
    }

    if (request.explicitFileName?.trim() && request.urls.length > 1) {
      throw new ValidationError('A file name can only be given for a single URL', {
        urls: request.urls.length
      });
    }

    assertPlainFileName(request.explicitFileName);
  }
}
