import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { CliContext } from '../CliContext';
import { GrabfileConfig } from '../../config/ConfigLoader';
import { DownloadResourcesUseCase } from '../../../application/use-cases/DownloadResourcesUseCase';
import { DownloadResult } from '../../../domain';
import { ValidationError, formatBytes } from '../../../shared';

/**
 * Parse `Name: value` header arguments
 */
export function parseHeaderArgs(values: string[]): Record<string, string> {
    const headers: Record<string, string> = {};

    values.forEach(raw => {
        const separator = raw.indexOf(':');
        const name = separator === -1 ? '' : raw.substring(0, separator).trim();
        if (!name) {
            throw new ValidationError(`Invalid header "${raw}"; expected "Name: value"`);
        }
        headers[name] = raw.substring(separator + 1).trim();
    });

    return headers;
}

export class DownloadCommand extends BaseCommand {
    name = 'download';
    description = 'Download files from URLs';
    aliases = ['dl'];
    positional = '[urls..]';
    isDefault = true;

    constructor(private readonly context: CliContext) {
        super(context.logger);
    }

    async execute(args: CommandArgs): Promise<number> {
        const urls = this.getStringArray(args, 'urls');
        if (urls.length === 0) {
            throw new ValidationError('No URLs provided. Usage: grabfile download <url1> [url2] ...');
        }

        const config = this.context.config.applyCliOverrides(this.overrides(args));
        this.applyVerbosity(config.verbose);

        const useCase = new DownloadResourcesUseCase(this.context.createSession(config), this.logger);
        const result = await useCase.execute({
            urls,
            destinationDir: config.destination,
            explicitFileName: this.getString(args, 'file-name'),
            identityCandidates: config.userAgents,
            extraHeaders: config.headers,
            tempDir: config.tempDir,
            ignoreDate: config.ignoreDate,
            blockFile: config.block,
            noClobber: config.noClobber,
            reportProgress: config.progress,
            keepPartial: config.keepPartial
        });

        if (config.passthru) {
            for (const download of result.succeeded) {
                this.context.stdout(JSON.stringify(await this.describe(download)));
            }
        }

        const total = result.outcomes.length;
        const succeeded = result.succeeded;
        const bytes = succeeded.reduce((sum, download) => sum + download.bytesWritten, 0);
        this.context.stderr(`📊 ${succeeded.length} of ${total} downloaded (${formatBytes(bytes)})`);

        return result.success ? 0 : 1;
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'destination',
                alias: 'd',
                description: 'Directory to save into (default: current directory)',
                type: 'string'
            },
            {
                name: 'file-name',
                alias: 'n',
                description: 'File name to save as; only with a single URL',
                type: 'string'
            },
            {
                name: 'user-agent',
                alias: 'u',
                description: 'User-Agent to try, in order; repeatable. "" sends none',
                type: 'array'
            },
            {
                name: 'header',
                alias: 'H',
                description: 'Extra request header "Name: value"; repeatable',
                type: 'array'
            },
            {
                name: 'temp-dir',
                description: 'Directory for in-progress downloads',
                type: 'string'
            },
            {
                name: 'ignore-date',
                description: 'Do not apply the server Last-Modified time',
                type: 'boolean'
            },
            {
                name: 'block',
                description: 'Mark the file as downloaded from the internet',
                type: 'boolean'
            },
            {
                name: 'no-clobber',
                description: 'Fail instead of overwriting an existing file',
                type: 'boolean'
            },
            {
                name: 'no-progress',
                description: 'Do not show progress',
                type: 'boolean'
            },
            {
                name: 'passthru',
                description: 'Print a JSON line describing each saved file',
                type: 'boolean'
            },
            {
                name: 'keep-partial',
                description: 'Keep the temporary file when a transfer fails',
                type: 'boolean'
            },
            {
                name: 'timeout',
                description: 'Seconds to wait for response headers',
                type: 'number'
            },
            ...this.commonOptions()
        ];
    }

    private overrides(args: CommandArgs): Partial<GrabfileConfig> {
        const userAgents = this.getStringArray(args, 'user-agent');
        const headers = this.getStringArray(args, 'header');

        return {
            destination: this.getString(args, 'destination'),
            tempDir: this.getString(args, 'temp-dir'),
            userAgents: userAgents.length > 0 ? userAgents : undefined,
            headers: headers.length > 0 ? parseHeaderArgs(headers) : undefined,
            timeout: this.getNumber(args, 'timeout'),
            ignoreDate: this.getFlag(args, 'ignore-date'),
            block: this.getFlag(args, 'block'),
            noClobber: this.getFlag(args, 'no-clobber'),
            progress: this.getFlag(args, 'no-progress') ? false : undefined,
            passthru: this.getFlag(args, 'passthru'),
            keepPartial: this.getFlag(args, 'keep-partial'),
            verbose: this.getFlag(args, 'verbose')
        };
    }

    private async describe(download: DownloadResult): Promise<Record<string, unknown>> {
        const metadata = await this.context.storage.getMetadata(download.finalPath);
        return {
            path: download.finalPath,
            size: metadata.size,
            lastModified: metadata.modifiedAt.toISOString(),
            created: metadata.createdAt.toISOString()
        };
    }
}
