import { cosmiconfigSync } from 'cosmiconfig';
import * as path from 'path';
import * as os from 'os';
import { ILogger } from '../../shared/logging/Logger';
import { ConfigurationError } from '../../shared/errors/AppError';

export const MODULE_NAME = 'grabfile';
export const ENV_PREFIX = 'GRABFILE_';

/* --------------------- Configuration Types --------------------- */
export interface GrabfileConfig {
    destination: string;
    tempDir: string;
    /**
     * Ordered identity candidates; an empty string sends no identity
     */
    userAgents: string[];
    headers: Record<string, string>;
    /**
     * Seconds to wait for response headers
     */
    timeout: number;
    ignoreDate: boolean;
    block: boolean;
    noClobber: boolean;
    progress: boolean;
    passthru: boolean;
    keepPartial: boolean;
    verbose: boolean;
}

export interface ConfigLoaderOptions {
    cwd?: string;
    homeDir?: string;
    env?: NodeJS.ProcessEnv;
}

/* --------------------- Default Configuration --------------------- */
export const DEFAULT_USER_AGENTS: readonly string[] = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    'Googlebot/2.1 (+http://www.google.com/bot.html)'
];

export function defaultConfig(cwd: string = process.cwd()): GrabfileConfig {
    return {
        destination: cwd,
        tempDir: os.tmpdir(),
        userAgents: [...DEFAULT_USER_AGENTS],
        headers: { Accept: '*/*' },
        timeout: 30,
        ignoreDate: false,
        block: false,
        noClobber: false,
        progress: true,
        passthru: false,
        keepPartial: false,
        verbose: false
    };
}

type BooleanKey = 'ignoreDate' | 'block' | 'noClobber' | 'progress' | 'passthru' | 'keepPartial' | 'verbose';

const BOOLEAN_KEYS: readonly BooleanKey[] = [
    'ignoreDate', 'block', 'noClobber', 'progress', 'passthru', 'keepPartial', 'verbose'
];

const ENV_BOOLEANS: ReadonlyArray<[string, BooleanKey]> = [
    ['IGNORE_DATE', 'ignoreDate'],
    ['BLOCK', 'block'],
    ['NO_CLOBBER', 'noClobber'],
    ['PROGRESS', 'progress'],
    ['PASSTHRU', 'passthru'],
    ['KEEP_PARTIAL', 'keepPartial'],
    ['VERBOSE', 'verbose']
];

/* --------------------- Configuration Loader --------------------- */
/**
 * Layers configuration: defaults < home directory < working directory <
 * environment < command line.
 */
export class ConfigLoader {
    private config: GrabfileConfig;
    private readonly cwd: string;
    private readonly homeDir: string;
    private readonly env: NodeJS.ProcessEnv;
    private readonly sources: string[] = [];

    constructor(
        private readonly logger: ILogger,
        options: ConfigLoaderOptions = {}
    ) {
        this.cwd = options.cwd ?? process.cwd();
        this.homeDir = options.homeDir ?? os.homedir();
        this.env = options.env ?? process.env;
        this.config = defaultConfig(this.cwd);
    }

    /**
     * Load configuration from files and environment
     */
    load(): GrabfileConfig {
        const explorer = cosmiconfigSync(MODULE_NAME, {
            searchPlaces: [
                'package.json',
                `.${MODULE_NAME}rc`,
                `.${MODULE_NAME}rc.json`,
                `${MODULE_NAME}.config.json`
            ],
            packageProp: MODULE_NAME
        });

        let config = defaultConfig(this.cwd);
        this.sources.length = 0;

        const directories = this.homeDir === this.cwd ? [this.homeDir] : [this.homeDir, this.cwd];
        for (const directory of directories) {
            const result = explorer.search(directory);
            if (result && !result.isEmpty) {
                config = mergeConfig(config, parseFileConfig(result.config, result.filepath));
                this.sources.push(result.filepath);
                this.logger.debug(`Loaded config from ${result.filepath}`);
            }
        }

        const envConfig = parseEnvironment(this.env);
        if (Object.keys(envConfig).length > 0) {
            config = mergeConfig(config, envConfig);
            this.sources.push('environment');
        }

        this.config = this.finalize(config);
        this.logger.debug('Configuration loaded', { sources: this.sources });

        return this.getConfig();
    }

    /**
     * Get the loaded configuration
     */
    getConfig(): GrabfileConfig {
        return {
            ...this.config,
            userAgents: [...this.config.userAgents],
            headers: { ...this.config.headers }
        };
    }

    /**
     * Override configuration with command-line arguments
     */
    applyCliOverrides(overrides: Partial<GrabfileConfig>): GrabfileConfig {
        this.config = this.finalize(mergeConfig(this.config, overrides));
        return this.getConfig();
    }

    getSources(): readonly string[] {
        return [...this.sources];
    }

    private finalize(config: GrabfileConfig): GrabfileConfig {
        validateConfig(config);
        return {
            ...config,
            destination: path.resolve(this.cwd, config.destination),
            tempDir: path.resolve(this.cwd, config.tempDir)
        };
    }
}

function mergeConfig(base: GrabfileConfig, override: Partial<GrabfileConfig>): GrabfileConfig {
    const merged: GrabfileConfig = { ...base };

    if (override.destination !== undefined) merged.destination = override.destination;
    if (override.tempDir !== undefined) merged.tempDir = override.tempDir;
    if (override.userAgents !== undefined) merged.userAgents = [...override.userAgents];
    if (override.timeout !== undefined) merged.timeout = override.timeout;
    BOOLEAN_KEYS.forEach(key => {
        const value = override[key];
        if (value !== undefined) merged[key] = value;
    });

    // Headers merge by name, case-insensitively; later layers win
    if (override.headers !== undefined) {
        const headers: Record<string, string> = {};
        Object.entries(base.headers).forEach(([name, value]) => {
            const replaced = Object.keys(override.headers ?? {}).some(key => key.toLowerCase() === name.toLowerCase());
            if (!replaced) headers[name] = value;
        });
        merged.headers = { ...headers, ...override.headers };
    }

    return merged;
}

function validateConfig(config: GrabfileConfig): void {
    if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
        throw new ConfigurationError('Timeout must be a positive number of seconds', { timeout: config.timeout });
    }

    if (!config.destination.trim()) {
        throw new ConfigurationError('Destination directory must not be empty');
    }

    if (!config.tempDir.trim()) {
        throw new ConfigurationError('Temporary directory must not be empty');
    }

    Object.keys(config.headers).forEach(name => {
        if (!/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/.test(name)) {
            throw new ConfigurationError(`Invalid header name: ${name}`, { header: name });
        }
    });
}

/* --------------------- Raw value parsing --------------------- */
function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the shape of a parsed config file. Unknown keys are ignored.
 */
export function parseFileConfig(raw: unknown, source: string): Partial<GrabfileConfig> {
    if (!isRecord(raw)) {
        throw new ConfigurationError(`Configuration in ${source} must be an object`, { source });
    }

    const invalid = (key: string, expected: string): ConfigurationError =>
        new ConfigurationError(`Invalid "${key}" in ${source}: expected ${expected}`, { source, key });

    const config: Partial<GrabfileConfig> = {};

    for (const key of ['destination', 'tempDir'] as const) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value !== 'string') throw invalid(key, 'a string');
        config[key] = value;
    }

    if (raw.userAgents !== undefined) {
        const value = raw.userAgents;
        if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
            throw invalid('userAgents', 'an array of strings');
        }
        config.userAgents = value;
    }

    if (raw.headers !== undefined) {
        const value = raw.headers;
        if (!isRecord(value)) throw invalid('headers', 'an object of strings');
        const headers: Record<string, string> = {};
        for (const [name, headerValue] of Object.entries(value)) {
            if (typeof headerValue !== 'string') throw invalid('headers', 'an object of strings');
            headers[name] = headerValue;
        }
        config.headers = headers;
    }

    if (raw.timeout !== undefined) {
        if (typeof raw.timeout !== 'number') throw invalid('timeout', 'a number');
        config.timeout = raw.timeout;
    }

    BOOLEAN_KEYS.forEach(key => {
        const value = raw[key];
        if (value === undefined) return;
        if (typeof value !== 'boolean') throw invalid(key, 'true or false');
        config[key] = value;
    });

    return config;
}

/**
 * `GRABFILE_*` variables. User agents are separated by `|`.
 */
export function parseEnvironment(env: NodeJS.ProcessEnv): Partial<GrabfileConfig> {
    const config: Partial<GrabfileConfig> = {};
    const read = (name: string): string | undefined => {
        const value = env[`${ENV_PREFIX}${name}`];
        return value === undefined || value === '' ? undefined : value;
    };

    const destination = read('DESTINATION');
    if (destination !== undefined) config.destination = destination;

    const tempDir = read('TEMP_DIR');
    if (tempDir !== undefined) config.tempDir = tempDir;

    const userAgents = read('USER_AGENTS');
    if (userAgents !== undefined) config.userAgents = userAgents.split('|').map(agent => agent.trim());

    const timeout = read('TIMEOUT');
    if (timeout !== undefined) {
        const seconds = Number(timeout);
        if (Number.isNaN(seconds)) {
            throw new ConfigurationError(`Invalid ${ENV_PREFIX}TIMEOUT: ${timeout}`);
        }
        config.timeout = seconds;
    }

    ENV_BOOLEANS.forEach(([name, key]) => {
        const value = read(name);
        if (value === undefined) return;
        config[key] = parseBoolean(value, `${ENV_PREFIX}${name}`);
    });

    return config;
}

function parseBoolean(value: string, name: string): boolean {
    switch (value.trim().toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            throw new ConfigurationError(`Invalid ${name}: expected true or false, got ${value}`);
    }
}
