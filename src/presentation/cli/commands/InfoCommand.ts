import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { parseHeaderArgs } from './DownloadCommand';
import { CliContext } from '../CliContext';
import { ResolveResourcesUseCase } from '../../../application/use-cases/ResolveResourcesUseCase';
import { formatBytes } from '../../../shared';

/**
 * Print what a download would produce, one JSON line per URL
 */
export class InfoCommand extends BaseCommand {
    name = 'info';
    description = 'Show the file name, size and date a URL resolves to';
    positional = '<urls..>';

    constructor(private readonly context: CliContext) {
        super(context.logger);
    }

    async execute(args: CommandArgs): Promise<number> {
        const userAgents = this.getStringArray(args, 'user-agent');
        const headers = this.getStringArray(args, 'header');

        const config = this.context.config.applyCliOverrides({
            userAgents: userAgents.length > 0 ? userAgents : undefined,
            headers: headers.length > 0 ? parseHeaderArgs(headers) : undefined,
            timeout: this.getNumber(args, 'timeout'),
            verbose: this.getFlag(args, 'verbose')
        });
        this.applyVerbosity(config.verbose);

        const useCase = new ResolveResourcesUseCase(this.context.createSession(config), this.logger);
        const result = await useCase.execute({
            urls: this.getStringArray(args, 'urls'),
            identityCandidates: config.userAgents,
            extraHeaders: config.headers
        });

        result.succeeded.forEach(resource => {
            this.context.stdout(JSON.stringify({
                ...resource.toJSON(),
                size: resource.fileSizeBytes === undefined ? null : formatBytes(resource.fileSizeBytes)
            }));
        });

        return result.success ? 0 : 1;
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'user-agent',
                alias: 'u',
                description: 'User-Agent to try, in order; repeatable',
                type: 'array'
            },
            {
                name: 'header',
                alias: 'H',
                description: 'Extra request header "Name: value"; repeatable',
                type: 'array'
            },
            {
                name: 'timeout',
                description: 'Seconds to wait for response headers',
                type: 'number'
            },
            ...this.commonOptions()
        ];
    }
}
