#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { ConfigLoader } from '../config/ConfigLoader';
import { LoggerFactory, LogLevel, parseLogLevel } from '../../shared/logging/Logger';
import { errorMessage } from '../../shared/errors/AppError';
import { createCliApplication, createCliContext } from './setup';

async function main(argv: string[] = process.argv): Promise<number> {
    dotenv.config();

    LoggerFactory.setDefaultConfig({
        level: parseLogLevel(process.env.LOG_LEVEL ?? '') ?? LogLevel.WARN
    });
    const logger = LoggerFactory.getLogger('CLI');

    // Load configuration
    const config = new ConfigLoader(logger);
    config.load();

    const context = createCliContext({ logger, config });
    const app = createCliApplication(context, process.env.npm_package_version || '1.0.0');

    return app.run(argv);
}

// Run if this is the main module
if (require.main === module) {
    main()
        .then(code => {
            process.exitCode = code;
        })
        .catch(error => {
            console.error('Fatal error:', errorMessage(error));
            process.exitCode = 1;
        });
}

export { main };
