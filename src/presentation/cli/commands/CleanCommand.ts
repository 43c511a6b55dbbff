import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { CliContext } from '../CliContext';
import { CleanTempUseCase } from '../../../application/use-cases/CleanTempUseCase';
import { formatBytes } from '../../../shared';

export class CleanCommand extends BaseCommand {
    name = 'clean';
    description = 'Delete temporary files left by interrupted downloads';

    constructor(private readonly context: CliContext) {
        super(context.logger);
    }

    async execute(args: CommandArgs): Promise<number> {
        const config = this.context.config.applyCliOverrides({
            tempDir: this.getString(args, 'temp-dir'),
            verbose: this.getFlag(args, 'verbose')
        });
        this.applyVerbosity(config.verbose);

        const useCase = new CleanTempUseCase(this.context.storage, this.logger);
        const result = await useCase.execute({
            tempDir: config.tempDir,
            olderThanMinutes: this.getNumber(args, 'older-than'),
            dryRun: this.getFlag(args, 'dry-run')
        });

        if (result.dryRun) {
            result.candidates.forEach(file => {
                this.context.stdout(`${file.path} (${formatBytes(file.size)})`);
            });
            this.context.stderr(`🔍 ${result.candidates.length} temporary file(s) would be removed`);
            return 0;
        }

        result.removed.forEach(file => this.context.stdout(file.path));

        return result.failed.length > 0 ? 1 : 0;
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'temp-dir',
                description: 'Directory holding temporary downloads',
                type: 'string'
            },
            {
                name: 'older-than',
                description: 'Only files untouched for this many minutes',
                type: 'number',
                default: 60
            },
            {
                name: 'dry-run',
                description: 'List the files without deleting them',
                type: 'boolean'
            },
            ...this.commonOptions()
        ];
    }
}
