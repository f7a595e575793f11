#!/usr/bin/env node
import * as path from 'path';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import {
  AdapterSettings,
  ConfigManager,
  LOG_LEVELS,
  LoggerInterface,
  LogLevel,
  errorMessage,
  isLogLevel,
} from 'perl-debug-core';
import { createAdapterLogger } from './logger';
import { AdapterHost } from './server';

export { AdapterHost } from './server';
export type { AdapterHostOptions, AdapterHostEvents } from './server';
export { createAdapterLogger } from './logger';
export type { AdapterLoggerOptions } from './logger';

const VERSION = '0.1.0';

export const PACKAGED_SETTINGS_PATH = path.resolve(
  __dirname,
  '..',
  'config',
  'default-settings.json',
);

export interface CliOptions {
  /** Serve TCP connections on this port instead of stdio. */
  port?: number;
  host: string;
  config?: string;
  logLevel?: LogLevel;
  logFile?: string;
  perl?: string;
}

/**
 * Parses command-line arguments (without the node and script entries).
 * Invalid input throws; `--help` and `--version` print and exit.
 */
export function parseCliArguments(args: string[]): CliOptions {
  const argv = yargs(args)
    .scriptName('perl-debug-adapter')
    .option('port', {
      alias: 'p',
      type: 'number',
      description: 'Serve debug clients over TCP on this port instead of stdio',
    })
    .option('host', {
      type: 'string',
      default: '127.0.0.1',
      description: 'Address to listen on with --port',
    })
    .option('config', {
      alias: 'c',
      type: 'string',
      description: 'Path to a settings JSON file',
    })
    .option('log-level', {
      type: 'string',
      choices: LOG_LEVELS,
      description: 'Minimum level written to the log',
    })
    .option('log-file', {
      type: 'string',
      description: 'Write logs to this file instead of stderr',
    })
    .option('perl', {
      type: 'string',
      description: 'Perl interpreter used when a launch request names none',
    })
    .check((parsed) => {
      const port = parsed.port;
      if (
        port !== undefined &&
        (!Number.isInteger(port) || port < 0 || port > 65535)
      ) {
        throw new Error(`--port must be an integer between 0 and 65535`);
      }
      return true;
    })
    .usage('Usage: $0 [options]')
    .strict()
    .help()
    .alias('help', 'h')
    .version(VERSION)
    .alias('version', 'v')
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .parseSync();

  const logLevel = argv.logLevel;
  return {
    port: argv.port,
    host: argv.host,
    config: argv.config,
    logLevel: isLogLevel(logLevel) ? logLevel : undefined,
    logFile: argv.logFile,
    perl: argv.perl,
  };
}

/**
 * Layers the packaged defaults, the user's file, the environment and the
 * command line.
 */
export function resolveSettings(
  options: CliOptions,
  env: NodeJS.ProcessEnv,
  logger: LoggerInterface,
  packagedSettingsPath: string = PACKAGED_SETTINGS_PATH,
): AdapterSettings {
  const config = new ConfigManager(logger);
  config.loadPackagedDefaults(packagedSettingsPath);
  if (options.config) {
    config.loadUserSettings(options.config);
  }
  config.applyEnvironment(env);
  config.applyOverrides({ logLevel: options.logLevel, perlPath: options.perl });
  return config.getSettings();
}

/**
 * Starts the adapter: one session over stdio, or a TCP server with `--port`.
 */
export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<AdapterHost> {
  const options = parseCliArguments(hideBin(argv));
  const logger = createAdapterLogger({
    level: options.logLevel ?? 'info',
    logFile: options.logFile,
  });
  const settings = resolveSettings(options, env, logger);
  logger.level = settings.logLevel;
  logger.debug({ settings }, 'Effective settings');

  const host = new AdapterHost({ settings, logger });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} received`);
    host.close(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  if (options.port !== undefined) {
    await host.listen(options.port, options.host);
  } else {
    // stdio carries exactly one session; the adapter ends with it.
    host.once('sessionClosed', () => process.exit(0));
    host.serve(process.stdin, process.stdout);
    logger.info('Perl debug adapter running on stdio');
  }
  return host;
}

export function runCli(argv: string[]): void {
  main(argv).catch((error: unknown) => {
    console.error(`perl-debug-adapter: ${errorMessage(error)}`);
    process.exit(1);
  });
}

if (require.main === module) {
  runCli(process.argv);
}
