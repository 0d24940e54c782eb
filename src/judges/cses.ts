import * as cheerio from 'cheerio';
import { API_TIMEOUT_MS } from '../shared/constants.js';
import type { ContestProblems, SampleTest } from '../types/judge.types.js';
import { NetworkJudge } from './base-judge.js';
import { cleanSampleText } from './sample-text.js';

const TITLE_PREFIX = /^CSES\s*-\s*/;

/** Finds the <pre> following each `<p>label</p>`. */
function preAfterLabel($: cheerio.CheerioAPI, label: string): string[] {
  return $('p')
    .filter((_index, p) => $(p).text().trim() === label)
    .toArray()
    .map((p) => $(p).nextAll('pre').first())
    .filter((pre) => pre.length > 0)
    .map((pre) => cleanSampleText(pre.html() ?? ''));
}

export function parseCsesSamples(html: string): SampleTest[] {
  const $ = cheerio.load(html);
  const inputs = preAfterLabel($, 'Input:');
  const outputs = preAfterLabel($, 'Output:');

  return inputs.slice(0, outputs.length).map((input, i) => ({ input, output: outputs[i] ?? null }));
}

export function parseCsesTitle(html: string): string | null {
  const title = cheerio.load(html)('title').first().text().trim();
  if (!TITLE_PREFIX.test(title)) {
    return null;
  }
  return title.replace(TITLE_PREFIX, '').trim() || null;
}

/**
 * CSES Problem Set. A single problem set, no contests.
 */
export class CsesJudge extends NetworkJudge {
  readonly platformName = 'CSES';
  protected readonly hosts = ['cses.fi'];

  async fetchProblemName(_contestId: string, problemId: string): Promise<string | null> {
    const url = `https://cses.fi/problemset/task/${encodeURIComponent(problemId)}`;
    return this.softly<string | null>('problem name', async () => parseCsesTitle(await this.fetchPage(url, API_TIMEOUT_MS)), null);
  }

  async fetchContestProblems(_contestId: string): Promise<ContestProblems> {
    return {};
  }

  async fetchSamples(url: string): Promise<SampleTest[] | null> {
    return this.softly<SampleTest[] | null>('samples', async () => parseCsesSamples(await this.fetchPage(url)), null);
  }
}
