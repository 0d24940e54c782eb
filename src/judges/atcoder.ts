/**
 * AtCoder. Everything is scraped: the contest task table for names and
 * the "Sample Input N" / "入力例 N" sections for samples.
 */

import * as cheerio from 'cheerio';
import { API_TIMEOUT_MS } from '../shared/constants.js';
import type { ContestProblems, ProblemInfo, SampleTest } from '../types/judge.types.js';
import { NetworkJudge } from './base-judge.js';
import { cleanSampleText } from './sample-text.js';

const BASE_URL = 'https://atcoder.jp';

const INPUT_HEADING = /^\s*(?:Sample Input|入力例)\s*(\d+)/;
const OUTPUT_HEADING = /^\s*(?:Sample Output|出力例)\s*(\d+)/;

/**
 * Reads the task table of `/contests/<id>/tasks`.
 */
export function parseAtCoderTasks(html: string): ProblemInfo[] {
  const $ = cheerio.load(html);
  const problems: ProblemInfo[] = [];

  $('table tr').each((_index, row) => {
    const cells = $(row).find('td');
    if (cells.length < 2) {
      return;
    }
    const indexLink = cells.eq(0).find('a').first();
    const nameLink = cells.eq(1).find('a').first();
    const index = indexLink.text().trim();
    const name = nameLink.text().trim();
    const href = nameLink.attr('href') ?? indexLink.attr('href') ?? '';
    if (!index || !name || !href.includes('/tasks/')) {
      return;
    }
    problems.push({ index, name, link: new URL(href, BASE_URL).toString() });
  });

  return problems;
}

/**
 * Collects samples by number. The statement appears in Japanese and in
 * English, so each number is seen twice; the text is the same.
 */
export function parseAtCoderSamples(html: string): SampleTest[] {
  const $ = cheerio.load(html);
  const inputs = new Map<number, string>();
  const outputs = new Map<number, string>();

  $('h3').each((_index, heading) => {
    const title = $(heading).text();
    const inputMatch = INPUT_HEADING.exec(title);
    const outputMatch = inputMatch ? null : OUTPUT_HEADING.exec(title);
    const match = inputMatch ?? outputMatch;
    if (!match?.[1]) {
      return;
    }

    const pre = $(heading).nextAll('pre').first();
    if (pre.length === 0) {
      return;
    }
    const target = inputMatch ? inputs : outputs;
    target.set(Number(match[1]), cleanSampleText(pre.html() ?? ''));
  });

  return [...inputs.keys()]
    .sort((a, b) => a - b)
    .map((num) => ({
      input: inputs.get(num) ?? '',
      output: outputs.get(num) ?? null,
    }));
}

export class AtCoderJudge extends NetworkJudge {
  readonly platformName = 'AtCoder';
  protected readonly hosts = ['atcoder.jp'];

  /**
   * `problemId` is either the task id ("abc300_a") or the index ("A").
   */
  async fetchProblemName(contestId: string, problemId: string): Promise<string | null> {
    const tasks = await this.fetchTasks(contestId);
    const wanted = problemId.toLowerCase();
    const task = tasks.find(
      (candidate) =>
        candidate.link.toLowerCase().endsWith(`/tasks/${wanted}`) || candidate.index.toLowerCase() === wanted,
    );
    return task?.name ?? null;
  }

  async fetchContestProblems(contestId: string): Promise<ContestProblems> {
    const problems: ContestProblems = {};
    for (const task of await this.fetchTasks(contestId)) {
      problems[task.index] = task.name;
    }
    return problems;
  }

  async fetchSamples(url: string): Promise<SampleTest[] | null> {
    return this.softly<SampleTest[] | null>('samples', async () => parseAtCoderSamples(await this.fetchPage(url)), null);
  }

  private async fetchTasks(contestId: string): Promise<ProblemInfo[]> {
    const url = `${BASE_URL}/contests/${encodeURIComponent(contestId)}/tasks`;
    return this.softly<ProblemInfo[]>('tasks', async () => parseAtCoderTasks(await this.fetchPage(url, API_TIMEOUT_MS)), []);
  }
}
