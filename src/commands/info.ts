import { parseProblemUrl } from '../problems/index.js';
import type { ParsedProblemUrl } from '../problems/index.js';
import type { CommandContext } from './context.js';

/** AtCoder looks problems up by task id, the others by letter. */
function problemKey(parsed: ParsedProblemUrl): string {
  return parsed.fetchPlatform === 'atcoder' ? parsed.filename : parsed.letter;
}

/**
 * `cpfetch info <url>`: which judge handles a URL and what it knows about it.
 * Returns false for unsupported URLs.
 */
export async function infoCommand(url: string, ctx: CommandContext): Promise<boolean> {
  const judge = ctx.engine.resolve(url);
  if (!judge) {
    ctx.print(`Unsupported platform: ${url}`);
    return false;
  }

  ctx.print(`Platform: ${judge.platformName}`);
  ctx.print(`Auth:     ${judge.needsAuthentication(url) ? 'browser cookies' : 'none'}`);

  const parsed = parseProblemUrl(url);
  if (!parsed) {
    return true;
  }

  ctx.print(`Contest:  ${parsed.contestId}`);
  ctx.print(`Problem:  ${parsed.letter}`);
  ctx.print(`File:     ${parsed.platformDir}/${parsed.filename}.cpp`);

  const name = await judge.fetchProblemName(parsed.contestId, problemKey(parsed));
  ctx.print(`Name:     ${name ?? '(unavailable)'}`);
  return true;
}
