import { FileInfo, IFileStorage } from '../../domain';
import { AppError, Clock, ErrorHandler, ILogger, ValidationError, formatBytes, systemClock } from '../../shared';

export interface CleanTempRequest {
  tempDir: string;
  /**
   * Only files untouched for at least this long. Defaults to 60.
   */
  olderThanMinutes?: number;
  dryRun?: boolean;
}

export interface CleanTempResponse {
  candidates: FileInfo[];
  removed: FileInfo[];
  failed: Array<{ file: FileInfo; error: AppError }>;
  dryRun: boolean;
}

/**
 * Finds temporary files left behind by interrupted downloads and deletes them
 */
export class CleanTempUseCase {
  constructor(
    private readonly storage: IFileStorage,
    private readonly logger: ILogger,
    private readonly clock: Clock = systemClock,
    private readonly errorHandler: ErrorHandler = ErrorHandler.getInstance()
  ) {}

  async execute(request: CleanTempRequest): Promise<CleanTempResponse> {
    const olderThanMinutes = request.olderThanMinutes ?? 60;
    if (!Number.isFinite(olderThanMinutes) || olderThanMinutes < 0) {
      throw new ValidationError('Age must be a non-negative number of minutes', { olderThanMinutes });
    }

    const olderThan = new Date(this.clock.now() - olderThanMinutes * 60 * 1000);
    const candidates = await this.storage.listTempFiles(request.tempDir, { olderThan });
    const dryRun = request.dryRun ?? false;

    const response: CleanTempResponse = { candidates, removed: [], failed: [], dryRun };
    if (dryRun) {
      return response;
    }

    for (const file of candidates) {
      try {
        await this.storage.remove(file.path);
        response.removed.push(file);
      } catch (error) {
        const appError = this.errorHandler.normalize(error);
        this.errorHandler.handle(appError, { subject: file.path });
        response.failed.push({ file, error: appError });
      }
    }

    const freed = response.removed.reduce((total, file) => total + file.size, 0);
    this.logger.info(`Removed ${response.removed.length} temporary file(s), ${formatBytes(freed)}`);

    return response;
  }
}
