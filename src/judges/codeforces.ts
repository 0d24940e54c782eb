/**
 * Codeforces (contests, problemset, gym and groups).
 *
 * Problem names come from the public API; samples are scraped from the
 * problem page. Group pages are members-only and fetched with the
 * browser's session cookies.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import { getLogger } from '../shared/logger.js';
import { API_TIMEOUT_MS } from '../shared/constants.js';
import { parseUrl } from '../shared/utils.js';
import type { ContestProblems, SampleTest } from '../types/judge.types.js';
import { NetworkJudge } from './base-judge.js';
import { cleanSampleText } from './sample-text.js';

const log = getLogger('judges', { component: 'codeforces' });

const API_BASE = 'https://codeforces.com/api';

const standingsSchema = z.object({
  status: z.string(),
  comment: z.string().optional(),
  result: z
    .object({
      problems: z.array(
        z.object({
          index: z.string(),
          name: z.string(),
        }),
      ),
    })
    .optional(),
});

const SELECTORS = {
  sampleSection: '.sample-test',
  input: '.input pre',
  output: '.output pre',
};

/**
 * Parses paired sample blocks out of a Codeforces problem page.
 * A page without a sample section yields [].
 */
export function parseCodeforcesSamples(html: string): SampleTest[] {
  const $ = cheerio.load(html);
  const section = $(SELECTORS.sampleSection).first();
  if (section.length === 0) {
    return [];
  }

  const inputs = section.find(SELECTORS.input).toArray();
  const outputs = section.find(SELECTORS.output).toArray();
  const count = Math.min(inputs.length, outputs.length);

  const samples: SampleTest[] = [];
  for (let i = 0; i < count; i++) {
    samples.push({
      input: cleanSampleText($(inputs[i]).html() ?? ''),
      output: cleanSampleText($(outputs[i]).html() ?? ''),
    });
  }
  return samples;
}

export class CodeforcesJudge extends NetworkJudge {
  readonly platformName = 'Codeforces';
  protected readonly hosts = ['codeforces.com'];
  protected override readonly loginMarkers = [/id=["']enterForm["']/];

  /** Group contests (/group/<id>/contest/...) require membership. */
  override isPrivateUrl(url: string): boolean {
    const parsed = parseUrl(url);
    return parsed !== null && /^\/group\//.test(parsed.pathname);
  }

  async fetchProblemName(contestId: string, problemId: string): Promise<string | null> {
    const problems = await this.fetchContestProblems(contestId);
    return problems[problemId] ?? problems[problemId.toUpperCase()] ?? null;
  }

  async fetchContestProblems(contestId: string): Promise<ContestProblems> {
    const url = `${API_BASE}/contest.standings?contestId=${encodeURIComponent(contestId)}&from=1&count=1`;

    return this.softly<ContestProblems>(
      'contest problems',
      async () => {
        const data = this.validate(standingsSchema, await this.fetcher.fetchJson(url, API_TIMEOUT_MS), url);
        if (data.status !== 'OK' || !data.result) {
          log.debug({ contestId, comment: data.comment }, 'Codeforces API refused the request');
          return {};
        }

        const problems: ContestProblems = {};
        for (const problem of data.result.problems) {
          problems[problem.index] = problem.name;
        }
        return problems;
      },
      {},
    );
  }

  async fetchSamples(url: string): Promise<SampleTest[] | null> {
    return this.softly<SampleTest[] | null>('samples', async () => parseCodeforcesSamples(await this.fetchPage(url)), null);
  }
}
