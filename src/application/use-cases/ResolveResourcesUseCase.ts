import { BatchResult, DownloadSession, ResolvedResource, ResourceUrl } from '../../domain';
import { ErrorHandler, ILogger, ValidationError } from '../../shared';
import { runSequentially } from './runSequentially';

export interface ResolveResourcesRequest {
  urls: string[];
  identityCandidates?: readonly string[];
  extraHeaders?: Readonly<Record<string, string>>;
}

/**
 * Resolves metadata for each URL without downloading anything
 */
export class ResolveResourcesUseCase {
  constructor(
    private readonly session: DownloadSession,
    private readonly logger: ILogger,
    private readonly errorHandler: ErrorHandler = ErrorHandler.getInstance()
  ) {}

  async execute(request: ResolveResourcesRequest): Promise<BatchResult<ResolvedResource>> {
    if (request.urls.length === 0) {
      throw new ValidationError('At least one URL is required');
    }

    const started = Date.now();
    const identities = request.identityCandidates ?? [''];
    const headers = request.extraHeaders ?? {};

    const outcomes = await this.session(({ resolver }) =>
      runSequentially(request.urls, this.errorHandler, uri =>
        resolver.resolve(new ResourceUrl(uri).toString(), identities, headers)
      )
    );

    const result = BatchResult.of(outcomes, Date.now() - started);
    this.logger.debug('Resolution finished', {
      resolved: result.succeeded.length,
      failed: result.failed.length
    });
    return result;
  }
}
