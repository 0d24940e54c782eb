/** A paired example input/output published on a problem page. */
export interface SampleTest {
  readonly input: string;
  /** null when only the input could be captured */
  readonly output: string | null;
}

export interface ProblemInfo {
  /** Short code within the contest, e.g. "A" or "B2" */
  index: string;
  name: string;
  link: string;
}

/** Problem index -> display name. */
export type ContestProblems = Record<string, string>;

/**
 * Handler for one online-judge platform. Implementations are stateless
 * apart from the injected fetcher and are registered in a fixed order.
 */
export interface Judge {
  readonly platformName: string;
  readonly requiresAuth: boolean;

  /** Pure predicate over the URL's host and path. */
  detect(url: string): boolean;
  /** Group, organisation or other members-only pages. */
  isPrivateUrl(url: string): boolean;
  needsAuthentication(url: string): boolean;

  fetchProblemName(contestId: string, problemId: string): Promise<string | null>;
  /** Empty record when the platform has no contests or the lookup failed. */
  fetchContestProblems(contestId: string): Promise<ContestProblems>;
  /**
   * null: nothing available or the fetch failed.
   * []:   fetched fine, the page has no samples.
   */
  fetchSamples(url: string): Promise<SampleTest[] | null>;
}
