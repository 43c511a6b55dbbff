import { ILogger, LoggerFactory, LogLevel } from '../../../shared/logging/Logger';
import { ValidationError } from '../../../shared/errors/AppError';

/**
 * Base interface for CLI commands
 */
export interface ICommand {
    /**
     * Command name (e.g., 'download', 'info')
     */
    name: string;

    /**
     * Command description for help text
     */
    description: string;

    /**
     * Command aliases (e.g., ['dl'] for 'download')
     */
    aliases?: string[];

    /**
     * Positional part of the usage, e.g. `[urls..]`
     */
    positional?: string;

    /**
     * Run this command when no command name is given
     */
    isDefault?: boolean;

    /**
     * Execute the command and return the process exit code
     */
    execute(args: CommandArgs): Promise<number>;

    /**
     * Get command-specific options
     */
    getOptions(): CommandOption[];
}

/**
 * Command arguments passed from CLI
 */
export interface CommandArgs {
    /**
     * Positional arguments
     */
    _: Array<string | number>;

    /**
     * Named options/flags
     */
    [key: string]: unknown;
}

/**
 * Command option definition
 */
export interface CommandOption {
    name: string;
    alias?: string;
    description: string;
    type: 'string' | 'number' | 'boolean' | 'array';
    default?: string | number | boolean;
    required?: boolean;
    choices?: string[];
}

/**
 * Base command class with common functionality
 */
export abstract class BaseCommand implements ICommand {
    abstract name: string;
    abstract description: string;
    aliases?: string[];
    positional?: string;
    isDefault?: boolean;

    constructor(protected logger: ILogger) {}

    abstract execute(args: CommandArgs): Promise<number>;

    abstract getOptions(): CommandOption[];

    /**
     * Options every command accepts
     */
    protected commonOptions(): CommandOption[] {
        return [
            {
                name: 'verbose',
                description: 'Enable debug logging',
                type: 'boolean'
            }
        ];
    }

    protected applyVerbosity(verbose: boolean): void {
        if (verbose) {
            LoggerFactory.setDefaultConfig({ level: LogLevel.DEBUG });
            this.logger.setLevel?.(LogLevel.DEBUG);
        }
    }

    protected getString(args: CommandArgs, name: string): string | undefined {
        const value = args[name];
        if (value === undefined) {
            return undefined;
        }
        if (typeof value === 'string') {
            return value;
        }
        if (typeof value === 'number') {
            return String(value);
        }
        throw new ValidationError(`Option --${name} expects a single value`);
    }

    protected getNumber(args: CommandArgs, name: string): number | undefined {
        const value = args[name];
        if (value === undefined) {
            return undefined;
        }
        if (typeof value !== 'number' || Number.isNaN(value)) {
            throw new ValidationError(`Option --${name} expects a number`);
        }
        return value;
    }

    /**
     * True only when the flag was given; absent flags leave configuration alone
     */
    protected getFlag(args: CommandArgs, name: string): true | undefined {
        return args[name] === true ? true : undefined;
    }

    protected getStringArray(args: CommandArgs, name: string): string[] {
        const value = args[name];
        if (value === undefined) {
            return [];
        }
        const items: unknown[] = Array.isArray(value) ? value : [value];
        return items.map(item => {
            if (typeof item === 'string') {
                return item;
            }
            if (typeof item === 'number') {
                return String(item);
            }
            throw new ValidationError(`Option --${name} expects text values`);
        });
    }
}
