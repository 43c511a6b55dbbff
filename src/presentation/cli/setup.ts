import { ICommand } from './commands/ICommand';
import { DownloadCommand } from './commands/DownloadCommand';
import { InfoCommand } from './commands/InfoCommand';
import { CleanCommand } from './commands/CleanCommand';
import { CliApplication } from './CliApplication';
import { CliContext } from './CliContext';
import { ConsoleProgressReporter, ProgressOutput } from './ConsoleProgressReporter';
import { IFileStorage, IProvenanceMarker, silentProgressReporter } from '../../domain';
import { createDownloadSession } from '../../infrastructure/download/DownloadSession';
import { FetchImplementation } from '../../infrastructure/http/HttpClient';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import { createProvenanceMarker } from '../../infrastructure/storage/ProvenanceMarker';
import { ILogger } from '../../shared/logging/Logger';
import { ConfigLoader } from '../config/ConfigLoader';

export interface CliSetupOptions {
    logger: ILogger;
    config: ConfigLoader;
    stdout?: (line: string) => void;
    stderr?: (line: string) => void;
    /**
     * Replaces the network for every session
     */
    fetch?: FetchImplementation;
    storage?: IFileStorage;
    marker?: IProvenanceMarker;
    progressOutput?: ProgressOutput;
}

/**
 * Set up all dependencies using manual dependency injection
 */
export function createCliContext(options: CliSetupOptions): CliContext {
    const { logger } = options;
    const storage = options.storage ?? new LocalFileStorage(logger);
    const marker = options.marker ?? createProvenanceMarker();

    return {
        logger,
        config: options.config,
        storage,
        createSession: config => createDownloadSession({
            logger,
            storage,
            marker,
            http: {
                timeout: config.timeout * 1000,
                fetch: options.fetch
            },
            progress: config.progress
                ? new ConsoleProgressReporter(options.progressOutput)
                : silentProgressReporter
        }),
        stdout: options.stdout ?? (line => process.stdout.write(line + '\n')),
        stderr: options.stderr ?? (line => process.stderr.write(line + '\n'))
    };
}

export function createCommands(context: CliContext): ICommand[] {
    return [
        new DownloadCommand(context),
        new InfoCommand(context),
        new CleanCommand(context)
    ];
}

export function createCliApplication(context: CliContext, version?: string): CliApplication {
    const app = new CliApplication(context.logger, context.stderr, 'grabfile', version);
    createCommands(context).forEach(command => app.registerCommand(command));
    return app;
}
