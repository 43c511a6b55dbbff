import { ItemOutcome } from '../../domain';
import { ErrorHandler } from '../../shared';

/**
 * Run `work` for each URI in turn. A failed item is handed to the error
 * handler and recorded; the remaining items still run.
 */
export async function runSequentially<T>(
  uris: readonly string[],
  errorHandler: ErrorHandler,
  work: (uri: string) => Promise<T>
): Promise<ItemOutcome<T>[]> {
  const outcomes: ItemOutcome<T>[] = [];

  for (const uri of uris) {
    try {
      outcomes.push({ uri, success: true, value: await work(uri) });
    } catch (error) {
      const appError = errorHandler.normalize(error);
      errorHandler.handle(appError, { subject: uri });
      outcomes.push({ uri, success: false, error: appError });
    }
  }

  return outcomes;
}
