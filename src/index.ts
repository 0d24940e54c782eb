#!/usr/bin/env node
/**
 * cpfetch - fetch sample tests and problem metadata from competitive
 * programming judges.
 *
 * Commands:
 *   fetch <problems> [directory]   save samples for A, A~E, "A B C"
 *   info <url>                     show what a problem URL resolves to
 *   contest <url>                  list a contest's problems
 *   cookies clear [domain]         drop cached browser cookies
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { env } from './env.js';
import { loadSettings } from './config/settings.js';
import { FetchEngine } from './engine.js';
import { clearCookiesCommand, contestCommand, fetchCommand, infoCommand } from './commands/index.js';
import type { CommandContext } from './commands/index.js';
import { isOperationalError } from './shared/errors.js';
import { getLogger } from './shared/logger.js';

const logger = getLogger('cli');

const print = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

function createContext(signal?: AbortSignal): CommandContext {
  const settings = loadSettings(env.CPFETCH_CONFIG_PATH);
  const engine = new FetchEngine({ settings, cacheDir: env.CPFETCH_CACHE_DIR });
  return { engine, print, signal };
}

async function main(argv: string[]): Promise<number> {
  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.info('Interrupted; stopping after the current problem');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  let exitCode = 0;
  try {
    await yargs(argv)
      .scriptName('cpfetch')
      .usage('$0 <command> [options]')
      .command(
        'fetch <problems> [directory]',
        'Fetch sample tests for problems in a directory',
        (y) =>
          y
            .positional('problems', { type: 'string', demandOption: true, describe: 'A, A~E, "A B C" or A,B,C' })
            .positional('directory', { type: 'string', default: process.cwd(), describe: 'Directory with the .cpp files' }),
        async (args) => {
          const summary = await fetchCommand(args.problems, args.directory, createContext(controller.signal));
          if (summary.cancelled) {
            exitCode = 130;
          } else if (summary.fetched < summary.total) {
            exitCode = 1;
          }
        },
      )
      .command(
        'info <url>',
        'Show the judge and metadata for a problem URL',
        (y) => y.positional('url', { type: 'string', demandOption: true }),
        async (args) => {
          exitCode = (await infoCommand(args.url, createContext())) ? 0 : 1;
        },
      )
      .command(
        'contest <url>',
        "List a contest's problems",
        (y) => y.positional('url', { type: 'string', demandOption: true }),
        async (args) => {
          exitCode = (await contestCommand(args.url, createContext())) ? 0 : 1;
        },
      )
      .command('cookies', 'Manage the cookie cache', (y) =>
        y
          .command(
            'clear [domain]',
            'Clear cached cookies for a domain, or all of them',
            (c) => c.positional('domain', { type: 'string' }),
            (args) => {
              clearCookiesCommand(args.domain, createContext());
            },
          )
          .demandCommand(1),
      )
      .demandCommand(1)
      .strict()
      .fail((message, error, instance) => {
        // Handler errors go to the top-level handler; usage errors print help
        if (error) {
          throw error;
        }
        instance.showHelp();
        process.stderr.write(`\n${message}\n`);
        process.exit(1);
      })
      .help()
      .parseAsync();
  } finally {
    process.off('SIGINT', onSigint);
  }

  return exitCode;
}

main(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (isOperationalError(error) && error instanceof Error) {
      process.stderr.write(`cpfetch: ${error.message}\n`);
    } else {
      logger.fatal({ err: error }, 'Unexpected error');
    }
    process.exitCode = 1;
  });
