/**
 * Judges recognised for routing but without scrapeable metadata.
 */

import { titleFromSlug } from '../shared/utils.js';
import type { ContestProblems, SampleTest } from '../types/judge.types.js';
import { BaseJudge } from './base-judge.js';

/**
 * Library Checker. Problem ids are slugs ("point_add_range_sum"), which
 * double as names once title-cased.
 */
export class YosupoJudge extends BaseJudge {
  readonly platformName = 'Yosupo';
  protected readonly hosts = ['judge.yosupo.jp'];

  async fetchProblemName(_contestId: string, problemId: string): Promise<string | null> {
    return titleFromSlug(problemId) || null;
  }

  async fetchContestProblems(_contestId: string): Promise<ContestProblems> {
    return {};
  }

  async fetchSamples(_url: string): Promise<SampleTest[] | null> {
    return null;
  }
}

/** Virtual Judge mirrors other platforms; nothing is fetched from it. */
export class VJudgeJudge extends BaseJudge {
  readonly platformName = 'vJudge';
  protected readonly hosts = ['vjudge.net'];

  async fetchProblemName(_contestId: string, _problemId: string): Promise<string | null> {
    return null;
  }

  async fetchContestProblems(_contestId: string): Promise<ContestProblems> {
    return {};
  }

  async fetchSamples(_url: string): Promise<SampleTest[] | null> {
    return null;
  }
}
