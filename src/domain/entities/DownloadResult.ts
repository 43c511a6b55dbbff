import { AppError } from '../../shared/errors/AppError';
import { ResolvedResource } from './ResolvedResource';

/**
 * Properties of a finished download
 */
export interface DownloadResultProps {
  finalPath: string;
  bytesWritten: number;
  resource: ResolvedResource;
  lastModifiedApplied?: Date;
}

/**
 * Outcome of one successful download
 */
export class DownloadResult {
  readonly finalPath: string;
  readonly bytesWritten: number;
  readonly resource: ResolvedResource;
  readonly lastModifiedApplied?: Date;

  constructor(props: DownloadResultProps) {
    this.finalPath = props.finalPath;
    this.bytesWritten = props.bytesWritten;
    this.resource = props.resource;
    this.lastModifiedApplied = props.lastModifiedApplied;
    Object.freeze(this);
  }

  get sizeWasKnown(): boolean {
    return this.resource.sizeKnown;
  }

  get declaredSizeBytes(): number | undefined {
    return this.resource.fileSizeBytes;
  }

  /**
   * The server declared a length and the stream delivered a different one
   */
  get sizeMismatch(): boolean {
    return this.sizeWasKnown && this.declaredSizeBytes !== this.bytesWritten;
  }
}

/**
 * Result of one item in a batch
 */
export type ItemOutcome<T> =
  | { uri: string; success: true; value: T }
  | { uri: string; success: false; error: AppError };

/**
 * Aggregate of a sequential batch; per-item failures do not stop the batch
 */
export class BatchResult<T> {
  private constructor(
    public readonly outcomes: ReadonlyArray<ItemOutcome<T>>,
    public readonly duration: number
  ) {}

  static of<T>(outcomes: ItemOutcome<T>[], duration: number = 0): BatchResult<T> {
    return new BatchResult([...outcomes], duration);
  }

  get succeeded(): T[] {
    const values: T[] = [];
    this.outcomes.forEach(outcome => {
      if (outcome.success) {
        values.push(outcome.value);
      }
    });
    return values;
  }

  get failed(): Array<{ uri: string; error: AppError }> {
    const failures: Array<{ uri: string; error: AppError }> = [];
    this.outcomes.forEach(outcome => {
      if (!outcome.success) {
        failures.push({ uri: outcome.uri, error: outcome.error });
      }
    });
    return failures;
  }

  get success(): boolean {
    return this.failed.length === 0;
  }
}
