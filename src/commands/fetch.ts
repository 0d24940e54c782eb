/**
 * `cpfetch fetch <problems> [directory]`
 *
 * For each selected problem, reads the Link from `<problem>.cpp`, fetches the
 * samples from its judge and writes them next to the source file. Problems
 * are processed one after another; a failure is reported and the batch
 * moves on.
 */

import { basename } from 'node:path';
import { AppError, PlatformError } from '../shared/errors.js';
import { eventBus } from '../shared/events.js';
import { getLogger } from '../shared/logger.js';
import { findSourceFile, parseProblemRange, readProblemHeader, saveSamples } from '../problems/index.js';
import type { CommandContext } from './context.js';

const log = getLogger('cli', { component: 'fetch' });

export interface FetchSummary {
  fetched: number;
  total: number;
  cancelled: boolean;
}

type Outcome = { ok: true; count: number } | { ok: false; reason: string };

/** Errors raised by node:fs carry the failing syscall (open, scandir...). */
function isFileSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'syscall' in error && typeof error.syscall === 'string';
}

async function fetchProblem(problem: string, directory: string, ctx: CommandContext): Promise<Outcome> {
  let sourceFile: string | null;
  try {
    sourceFile = await findSourceFile(directory, problem);
  } catch (error) {
    if (!isFileSystemError(error)) {
      throw error;
    }
    return { ok: false, reason: `Cannot read ${directory}: ${error.message}` };
  }
  if (!sourceFile) {
    return { ok: false, reason: `${problem}.cpp not found` };
  }
  const filename = basename(sourceFile);

  const header = await readProblemHeader(sourceFile);
  if (!header?.link) {
    return { ok: false, reason: `${filename} has no Link` };
  }

  const { judge, samples } = await ctx.engine.fetchSamples(header.link);
  if (!judge) {
    return { ok: false, reason: `Unsupported platform for ${filename}` };
  }
  if (!samples || samples.length === 0) {
    return { ok: false, reason: `No samples found for ${filename}` };
  }

  try {
    return { ok: true, count: await saveSamples(directory, problem, samples) };
  } catch (error) {
    if (!isFileSystemError(error)) {
      throw error;
    }
    return { ok: false, reason: `Could not save samples for ${problem}: ${error.message}` };
  }
}

function describeFailure(problem: string, error: AppError): string {
  if (error instanceof PlatformError) {
    return `${problem}: ${error.message}`;
  }
  return `${problem}: ${error.message} (${error.code})`;
}

export async function fetchCommand(problemsInput: string, directory: string, ctx: CommandContext): Promise<FetchSummary> {
  const problems = parseProblemRange(problemsInput);
  const onRetry = ({ domain }: { domain: string }): void => {
    ctx.print(`  (refreshing cookies for ${domain}...)`);
  };

  ctx.print('--- Fetching Samples ---');
  ctx.print('');

  let fetched = 0;
  let cancelled = false;
  eventBus.on('auth:retry', onRetry);
  try {
    for (const problem of problems) {
      if (ctx.signal?.aborted) {
        cancelled = true;
        ctx.print('  Cancelled.');
        break;
      }

      try {
        const outcome = await fetchProblem(problem, directory, ctx);
        if (outcome.ok) {
          fetched++;
          ctx.print(`  + ${problem}: ${outcome.count} sample(s) saved`);
        } else {
          ctx.print(`  ! ${outcome.reason}`);
        }
      } catch (error) {
        if (!(error instanceof AppError)) {
          throw error;
        }
        log.warn({ problem, err: error }, 'Fetch failed');
        ctx.print(`  x ${describeFailure(problem, error)}`);
      }
    }
  } finally {
    eventBus.off('auth:retry', onRetry);
  }

  ctx.print('');
  ctx.print(`Fetched ${fetched}/${problems.length} problem(s).`);
  return { fetched, total: problems.length, cancelled };
}
