/**
 * cmd-server - line command server
 *
 * Entry point: reads configuration, wires the default command set into the
 * server and keeps it up until SIGINT/SIGTERM.
 */

import { createDefaultDispatcher } from './commands/index.js';
import { CommandServer } from './lib/command-server.js';
import { ConfigError, loadConfig, type AppConfig } from './lib/config.js';
import { createLogger, createStatusLogger } from './lib/logger.js';

export { CommandServer } from './lib/command-server.js';
export { CommandDispatcher, unknownCommandResponse } from './lib/command-dispatcher.js';
export { ConnectionHandler } from './lib/connection-handler.js';
export { BaseCommand, SettingCommand, ReportCommand } from './lib/base-command.js';
export { parseRequest } from './lib/request-parser.js';
export { createDefaultDispatcher } from './commands/index.js';
export { loadConfig, ConfigError } from './lib/config.js';
export { createLogger, createStatusLogger } from './lib/logger.js';
export type * from './lib/types.js';

export const SERVICE_NAME = 'cmd-server';
export const VERSION = '1.0.0';

export async function main(): Promise<void> {
    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (error) {
        const logger = createLogger({ service: SERVICE_NAME, level: 'info' });
        logger.fatal({ err: error }, error instanceof ConfigError ? error.message : 'Failed to load configuration');
        process.exit(1);
    }

    const logger = createLogger({ service: SERVICE_NAME, level: config.logLevel, pretty: config.pretty });
    const server = new CommandServer({
        host: config.host,
        clientTimeoutMs: config.clientTimeoutMs,
        drainOnStop: config.drainOnStop
    });

    const started = await server.start(
        config.port,
        createDefaultDispatcher({ version: VERSION }),
        createStatusLogger(logger)
    );
    if (!started) {
        logger.fatal(`Failed to start ${SERVICE_NAME} on ${config.host}:${config.port}`);
        process.exit(1);
    }

    const shutdown = (signal: NodeJS.Signals) => {
        logger.info(`Received ${signal}, shutting down`);
        server.stop().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error({ err: error }, 'Error during shutdown');
                process.exit(1);
            }
        );
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

// Start server if this file is run directly
if (import.meta.url === `file://${process.argv[1]}`) {
    main().catch((error: unknown) => {
        console.error(`${SERVICE_NAME} startup error:`, error);
        process.exit(1);
    });
}
