/**
 * One progress update
 */
export interface ProgressEvent {
  activity: string;
  status: string;
  /**
   * 0..100, or undefined when the total size is unknown
   */
  percent?: number;
  bytesWritten: number;
  totalBytes?: number;
}

/**
 * Observability channel for transfer progress, kept apart from command output
 */
export interface IProgressReporter {
  report(event: ProgressEvent): void;
  complete(activity: string): void;
}

export const silentProgressReporter: IProgressReporter = {
  report: () => undefined,
  complete: () => undefined
};
