import { DownloadSession, IFileStorage } from '../../domain';
import { ILogger } from '../../shared';
import { ConfigLoader, GrabfileConfig } from '../config/ConfigLoader';

/**
 * What commands need from the outside world. Output goes through `stdout`
 * (command results) and `stderr` (human messages) so tests can capture it.
 */
export interface CliContext {
    logger: ILogger;
    config: ConfigLoader;
    storage: IFileStorage;
    createSession: (config: GrabfileConfig) => DownloadSession;
    stdout: (line: string) => void;
    stderr: (line: string) => void;
}
