#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'util';
import { ConfigurationError, ConfigurationManager, ConfigUpdates } from './config/ConfigurationManager.js';
import type { LogLevel } from './config/types.js';
import { startHoneypot } from './honeypot.js';
import { HoneypotErrorType, errorHandler } from './utils/ErrorHandler.js';
import { LOG_LEVELS, initializeLogging, resetLogging } from './utils/logger/logger.js';

const USAGE = `Usage: honeyshell [options]

Options:
  -c, --config <file>     Configuration file (JSON)
  -p, --port <port>       SSH listen port
      --log-level <level> One of ${LOG_LEVELS.join(', ')}
      --show-config       Print the resolved configuration and exit
  -h, --help              Show this help
`;

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ConfigurationError(`Invalid log level: ${value}`, 'logging.level');
  }
  return level;
}

export async function main(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      port: { type: 'string', short: 'p' },
      'log-level': { type: 'string' },
      'show-config': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    process.stdout.write(USAGE);
    return;
  }

  const manager = new ConfigurationManager({ configPath: values.config });
  const updates: ConfigUpdates = {};
  if (values.port !== undefined) {
    updates.server = { port: Number(values.port) };
  }
  if (values['log-level'] !== undefined) {
    updates.logging = { level: parseLogLevel(values['log-level']) };
  }
  if (Object.keys(updates).length > 0) {
    manager.updateConfig(updates);
  }

  const config = manager.getConfig();
  if (values['show-config']) {
    process.stdout.write(`${JSON.stringify(config, null, 2)}\n`);
    return;
  }

  initializeLogging(config.logging);
  const running = await startHoneypot(config);

  const shutdown = (signal: NodeJS.Signals) => {
    console.info(`Received ${signal}, shutting down`);
    running
      .stop()
      .then(() => {
        resetLogging();
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      errorHandler.handle(HoneypotErrorType.CONFIGURATION_ERROR, error, { field: error.field });
    } else {
      console.error('Failed to start honeypot:', error);
    }
    process.exitCode = 1;
  });
}
