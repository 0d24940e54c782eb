import { contestProblemUrl, parseContestUrl, parseProblemRange } from '../problems/index.js';
import type { CommandContext } from './context.js';

/**
 * `cpfetch contest <url>`: lists a contest's problems. When the judge has no
 * problem list, falls back to the range implied by the URL (a link to
 * problem D lists A to D). Returns false for unrecognised URLs.
 */
export async function contestCommand(url: string, ctx: CommandContext): Promise<boolean> {
  const contest = parseContestUrl(url);
  if (!contest) {
    ctx.print(`Unrecognised contest URL: ${url}`);
    return false;
  }

  ctx.print(`${contest.platform} ${contest.groupId ? `${contest.groupId}/` : ''}${contest.contestId}`);

  const problems = (await ctx.engine.fetchContestProblems(url, contest.contestId)) ?? {};
  const indexes = Object.keys(problems);

  if (indexes.length > 0) {
    for (const index of indexes) {
      ctx.print(`  ${index.padEnd(3)} ${problems[index] ?? ''}  ${contestProblemUrl(contest, index)}`);
    }
    return true;
  }

  if (contest.defaultRange) {
    for (const index of parseProblemRange(contest.defaultRange)) {
      ctx.print(`  ${index.padEnd(3)} ${contestProblemUrl(contest, index)}`);
    }
    return true;
  }

  ctx.print('  No problem list available.');
  return true;
}
