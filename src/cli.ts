#!/usr/bin/env node
// src/cli.ts

import { parseArgs } from 'util';
import { NotifierApp } from './app';
import { DEFAULT_ENV_FILE, loadConfigFromEnv, loadEnvFile } from './config/env';
import { Logger } from './observability/Logger';
import { ConfigError, errorMessage } from './utils/errors';

export type Command = 'poll' | 'print-all';

export interface CliOptions {
  command: Command;
  envFile: string;
  help: boolean;
}

export const USAGE = `
notification-printer - print new notifications on a receipt printer

Usage:
  notification-printer [command] [options]

Commands:
  poll        Poll providers and print new notifications (default)
  print-all   Print everything currently listed once, then exit

Options:
  -e, --env-file <path>  Environment file to load (default: ${DEFAULT_ENV_FILE})
  -h, --help             Show this help message
`;

const COMMANDS: readonly Command[] = ['poll', 'print-all'];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'env-file': { type: 'string', short: 'e', default: DEFAULT_ENV_FILE },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [command = 'poll', ...rest] = positionals;
  if (!isCommand(command)) {
    throw new ConfigError(`Unknown command: ${command}`);
  }
  if (rest.length > 0) {
    throw new ConfigError(`Unexpected arguments: ${rest.join(' ')}`);
  }

  return {
    command,
    envFile: values['env-file'] ?? DEFAULT_ENV_FILE,
    help: values.help ?? false,
  };
}

/**
 * @returns Process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const bootLogger = new Logger({ format: 'pretty' });

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error: unknown) {
    bootLogger.error(errorMessage(error));
    console.log(USAGE);
    return 2;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  let app: NotifierApp;
  try {
    loadEnvFile(options.envFile);
    app = await NotifierApp.init(loadConfigFromEnv());
  } catch (error: unknown) {
    const issues = error instanceof ConfigError ? error.issues : [];
    bootLogger.error('Failed to start', { error: errorMessage(error), issues });
    return 1;
  }

  if (options.command === 'print-all') {
    const result = await app.printAll();
    await app.stop();
    return result.ok ? 0 : 1;
  }

  try {
    await app.start();
  } catch (error: unknown) {
    bootLogger.error('Failed to start', { error: errorMessage(error) });
    await app.stop();
    return 1;
  }

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      bootLogger.info('Shutting down', { signal });
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

  await app.stop();
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
