import * as fs from 'fs';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { IProvenanceMarker } from '../../domain/interfaces/IProvenanceMarker';
import { isErrnoException, errorMessage } from '../../shared/errors/AppError';
import { Clock, systemClock } from '../../shared/utils/clock';

const fsPromises = fs.promises;
const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const runCommand: CommandRunner = (file, args) => execFileAsync(file, args);

const ZONE_STREAM = 'Zone.Identifier';
// Internet zone
const ZONE_CONTENT = '[ZoneTransfer]\r\nZoneId=3\r\n';

/**
 * Windows: the Zone.Identifier alternate data stream read by the shell and
 * SmartScreen
 */
export class ZoneIdentifierMarker implements IProvenanceMarker {
    readonly platform = 'win32';

    async mark(filePath: string): Promise<void> {
        await fsPromises.writeFile(streamPath(filePath), ZONE_CONTENT, 'utf8');
    }

    async clear(filePath: string): Promise<void> {
        try {
            await fsPromises.unlink(streamPath(filePath));
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return;
            }
            throw error;
        }
    }
}

export const QUARANTINE_ATTRIBUTE = 'com.apple.quarantine';

/**
 * macOS: the quarantine extended attribute, set through the xattr tool
 */
export class QuarantineAttributeMarker implements IProvenanceMarker {
    readonly platform = 'darwin';

    constructor(
        private readonly run: CommandRunner = runCommand,
        private readonly clock: Clock = systemClock,
        private readonly agentName: string = 'grabfile'
    ) {}

    async mark(filePath: string): Promise<void> {
        await this.run('xattr', ['-w', QUARANTINE_ATTRIBUTE, this.quarantineValue(), filePath]);
    }

    async clear(filePath: string): Promise<void> {
        try {
            await this.run('xattr', ['-d', QUARANTINE_ATTRIBUTE, filePath]);
        } catch (error) {
            if (errorMessage(error).includes('No such xattr')) {
                return;
            }
            throw error;
        }
    }

    // flags;timestamp (hex seconds);agent;event id
    private quarantineValue(): string {
        const seconds = Math.floor(this.clock.now() / 1000);
        return `0081;${seconds.toString(16)};${this.agentName};`;
    }
}

/**
 * Platforms without a provenance concept
 */
export class NoopProvenanceMarker implements IProvenanceMarker {
    constructor(readonly platform: string) {}

    async mark(): Promise<void> {
        return undefined;
    }

    async clear(): Promise<void> {
        return undefined;
    }
}

export function createProvenanceMarker(platform: NodeJS.Platform = process.platform): IProvenanceMarker {
    switch (platform) {
        case 'win32':
            return new ZoneIdentifierMarker();
        case 'darwin':
            return new QuarantineAttributeMarker();
        default:
            return new NoopProvenanceMarker(platform);
    }
}

function streamPath(filePath: string): string {
    return `${filePath}:${ZONE_STREAM}`;
}
