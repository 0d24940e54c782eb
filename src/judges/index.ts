/**
 * Judge registry - the ordered list of platform handlers and URL routing.
 *
 * Judges are instantiated once per process. `detectJudge` returns the first
 * judge that claims a URL, so registration order is the tie-break: more
 * specific matchers go first.
 */

import { getLogger } from '../shared/logger.js';
import type { Judge } from '../types/judge.types.js';
import type { PageFetcher } from '../types/http.types.js';
import { CodeforcesJudge } from './codeforces.js';
import { AtCoderJudge } from './atcoder.js';
import { CsesJudge } from './cses.js';
import { YosupoJudge, VJudgeJudge } from './minimal.js';

const log = getLogger('judges', { component: 'registry' });

/**
 * Creates the judges in registration order.
 */
export function createJudges(fetcher: PageFetcher): readonly Judge[] {
  return [
    new CodeforcesJudge(fetcher),
    new AtCoderJudge(fetcher),
    new CsesJudge(fetcher),
    new YosupoJudge(),
    new VJudgeJudge(),
  ];
}

/**
 * Finds the judge responsible for `url`. Returns null for unsupported
 * platforms; never throws.
 */
export function detectJudge(url: string, judges: readonly Judge[]): Judge | null {
  const judge = judges.find((candidate) => candidate.detect(url)) ?? null;
  log.debug({ url, platform: judge?.platformName ?? null }, 'Resolved judge');
  return judge;
}

/**
 * Platform names, in registration order.
 */
export function getAvailablePlatforms(judges: readonly Judge[]): string[] {
  return judges.map((judge) => judge.platformName);
}

export { BaseJudge, NetworkJudge } from './base-judge.js';
export { CodeforcesJudge, parseCodeforcesSamples } from './codeforces.js';
export { AtCoderJudge, parseAtCoderSamples, parseAtCoderTasks } from './atcoder.js';
export { CsesJudge, parseCsesSamples, parseCsesTitle } from './cses.js';
export { YosupoJudge, VJudgeJudge } from './minimal.js';
export { cleanSampleText } from './sample-text.js';
