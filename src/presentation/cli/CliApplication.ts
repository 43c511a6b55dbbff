import yargs, { Argv, Options } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ICommand, CommandArgs } from './commands/ICommand';
import { ILogger } from '../../shared/logging/Logger';
import { ErrorHandler, ErrorListener } from '../../shared/errors/ErrorHandler';
import { ValidationError, isErrorLike } from '../../shared/errors/AppError';

export class CliApplication {
    private commands: Map<string, ICommand> = new Map();

    constructor(
        private logger: ILogger,
        private stderr: (line: string) => void,
        private appName: string = 'grabfile',
        private version: string = '1.0.0',
        private errorHandler: ErrorHandler = ErrorHandler.getInstance()
    ) {}

    /**
     * Register a command
     */
    registerCommand(command: ICommand): void {
        this.commands.set(command.name, command);
        this.logger.debug(`Registered command: ${command.name}`);
    }

    /**
     * Run the CLI application and return the process exit code
     */
    async run(argv: string[] = process.argv): Promise<number> {
        const exitCodes: number[] = [];
        const report: ErrorListener = (error, context) => {
            this.stderr(context.subject ? `❌ ${context.subject}: ${error.message}` : `❌ ${error.message}`);
        };
        this.errorHandler.addListener(report);

        try {
            const yargsInstance = yargs(hideBin(argv))
                .scriptName(this.appName)
                .version(this.version)
                .help()
                .alias('h', 'help')
                .alias('v', 'version')
                .strict()
                .parserConfiguration({ 'boolean-negation': false })
                .exitProcess(false)
                .fail((message, error) => {
                    throw isErrorLike(error) ? error : new ValidationError(message);
                })
                .wrap(100);

            this.commands.forEach(command => {
                yargsInstance.command(
                    this.usage(command),
                    command.description,
                    y => this.configureCommand(y, command),
                    async parsed => {
                        const args: CommandArgs = { ...parsed };
                        exitCodes.push(await command.execute(args));
                    }
                );
            });

            await yargsInstance.parseAsync();
        } catch (error) {
            this.errorHandler.handle(error);
            return 1;
        } finally {
            this.errorHandler.removeListener(report);
        }

        return exitCodes.length > 0 ? Math.max(...exitCodes) : 0;
    }

    /**
     * Get registered commands
     */
    getCommands(): ICommand[] {
        return Array.from(this.commands.values());
    }

    private usage(command: ICommand): string[] {
        const suffix = command.positional ? ` ${command.positional}` : '';
        const names = [`${command.name}${suffix}`, ...(command.aliases ?? [])];
        if (command.isDefault) {
            names.push('$0');
        }
        return names;
    }

    private configureCommand(y: Argv, command: ICommand): Argv {
        const positional = command.positional?.match(/^[<[](\w+)(\.\.)?[>\]]$/);
        if (positional) {
            y.positional(positional[1], {
                describe: 'URLs',
                type: 'string',
                array: positional[2] !== undefined
            });
        }

        command.getOptions().forEach(option => {
            const config: Options = {
                describe: option.description,
                type: option.type
            };

            if (option.default !== undefined) {
                config.default = option.default;
            }

            if (option.required) {
                config.demandOption = true;
            }

            if (option.type === 'array') {
                config.string = true;
            }

            if (option.choices) {
                config.choices = option.choices;
            }

            if (option.alias) {
                config.alias = option.alias;
            }

            y.option(option.name, config);
        });

        return y;
    }
}
