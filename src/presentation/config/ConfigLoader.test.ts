import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigLoader, DEFAULT_USER_AGENTS, parseEnvironment } from './ConfigLoader';
import { ConfigurationError } from '../../shared/errors/AppError';
import { RecordingLogger } from '../../__mocks__/recordingLogger';

describe('ConfigLoader', () => {
    let homeDir: string;
    let cwd: string;

    beforeEach(async () => {
        homeDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'grabfile-home-'));
        cwd = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'grabfile-cwd-'));
    });

    afterEach(async () => {
        await fs.promises.rm(homeDir, { recursive: true, force: true });
        await fs.promises.rm(cwd, { recursive: true, force: true });
    });

    function loader(env: NodeJS.ProcessEnv = {}): ConfigLoader {
        return new ConfigLoader(new RecordingLogger(), { cwd, homeDir, env });
    }

    async function writeJson(dir: string, name: string, content: unknown): Promise<string> {
        const file = path.join(dir, name);
        await fs.promises.writeFile(file, JSON.stringify(content));
        return file;
    }

    it('should fall back to defaults', () => {
        const config = loader().load();

        expect(config).toEqual({
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
        });
    });

    it('should let the working directory override the home directory', async () => {
        const homeFile = await writeJson(homeDir, '.grabfilerc.json', { timeout: 10, block: true });
        const localFile = await writeJson(cwd, 'grabfile.config.json', { timeout: 20 });
        const configLoader = loader();

        const config = configLoader.load();

        expect(config.timeout).toBe(20);
        expect(config.block).toBe(true);
        expect(configLoader.getSources()).toEqual([homeFile, localFile]);
    });

    it('should read the grabfile key of package.json', async () => {
        await writeJson(cwd, 'package.json', { name: 'some-project', grabfile: { destination: 'downloads' } });

        expect(loader().load().destination).toBe(path.join(cwd, 'downloads'));
    });

    it('should let the environment override files', async () => {
        await writeJson(cwd, '.grabfilerc', { timeout: 20, noClobber: false });

        const config = loader({
            GRABFILE_TIMEOUT: '5',
            GRABFILE_USER_AGENTS: 'Agent/1 | Agent/2',
            GRABFILE_NO_CLOBBER: 'true'
        }).load();

        expect(config.timeout).toBe(5);
        expect(config.userAgents).toEqual(['Agent/1', 'Agent/2']);
        expect(config.noClobber).toBe(true);
    });

    it('should reject a value of the wrong type', async () => {
        const file = await writeJson(cwd, '.grabfilerc.json', { timeout: 'soon' });

        expect(() => loader().load()).toThrow(new ConfigurationError(`Invalid "timeout" in ${file}: expected a number`));
    });

    it('should reject user agents that are not strings', async () => {
        await writeJson(cwd, '.grabfilerc.json', { userAgents: ['ok', 7] });

        expect(() => loader().load()).toThrow(ConfigurationError);
    });

    it('should reject a non-positive timeout', async () => {
        await writeJson(cwd, '.grabfilerc.json', { timeout: 0 });

        expect(() => loader().load()).toThrow('Timeout must be a positive number of seconds');
    });

    it('should apply command line overrides last', () => {
        const configLoader = loader({ GRABFILE_BLOCK: 'true' });
        configLoader.load();

        const config = configLoader.applyCliOverrides({
            block: false,
            destination: 'out',
            headers: { accept: 'text/html', 'X-Trace': 'on' }
        });

        expect(config.block).toBe(false);
        expect(config.destination).toBe(path.join(cwd, 'out'));
        expect(config.headers).toEqual({ accept: 'text/html', 'X-Trace': 'on' });
    });

    it('should reject an invalid header name', () => {
        const configLoader = loader();
        configLoader.load();

        expect(() => configLoader.applyCliOverrides({ headers: { 'Bad Name': 'x' } })).toThrow('Invalid header name: Bad Name');
    });
});

describe('parseEnvironment', () => {
    it('should ignore unrelated and empty variables', () => {
        expect(parseEnvironment({ PATH: '/usr/bin', GRABFILE_DESTINATION: '' })).toEqual({});
    });

    it('should parse boolean spellings', () => {
        expect(parseEnvironment({ GRABFILE_VERBOSE: 'yes', GRABFILE_PROGRESS: '0' })).toEqual({
            verbose: true,
            progress: false
        });
    });

    it('should reject an unreadable boolean', () => {
        expect(() => parseEnvironment({ GRABFILE_IGNORE_DATE: 'maybe' }))
            .toThrow('Invalid GRABFILE_IGNORE_DATE: expected true or false, got maybe');
    });

    it('should reject a non-numeric timeout', () => {
        expect(() => parseEnvironment({ GRABFILE_TIMEOUT: 'soon' })).toThrow(ConfigurationError);
    });
});
