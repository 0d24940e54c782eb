import type { ZodType, ZodTypeDef } from 'zod';
import { getLogger } from '../shared/logger.js';
import { ParseError, isSoftFailure } from '../shared/errors.js';
import { PAGE_TIMEOUT_MS } from '../shared/constants.js';
import { hostMatches, parseUrl } from '../shared/utils.js';
import type { ContestProblems, Judge, SampleTest } from '../types/judge.types.js';
import type { PageFetcher } from '../types/http.types.js';

const log = getLogger('judges', { component: 'base-judge' });

/**
 * Shared behaviour for judges: host matching, the authentication decision
 * and the conversion of soft failures into empty results.
 */
export abstract class BaseJudge implements Judge {
  abstract readonly platformName: string;
  readonly requiresAuth: boolean = false;

  /** Hosts served by this judge; subdomains match too. */
  protected abstract readonly hosts: readonly string[];

  abstract fetchProblemName(contestId: string, problemId: string): Promise<string | null>;
  abstract fetchContestProblems(contestId: string): Promise<ContestProblems>;
  abstract fetchSamples(url: string): Promise<SampleTest[] | null>;

  detect(url: string): boolean {
    const parsed = parseUrl(url);
    if (!parsed) {
      return false;
    }
    return this.hosts.some((host) => hostMatches(parsed.hostname, host));
  }

  isPrivateUrl(_url: string): boolean {
    return false;
  }

  needsAuthentication(url: string): boolean {
    return this.requiresAuth || this.isPrivateUrl(url);
  }

  /**
   * Runs `operation`, turning NetworkError and ParseError into `fallback`.
   * Anything else (authentication exhausted, no browser cookies, bugs)
   * propagates.
   */
  protected async softly<T>(what: string, operation: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (!isSoftFailure(error)) {
        throw error;
      }
      log.debug({ platform: this.platformName, what, code: error.code, err: error }, 'Lookup failed softly');
      return fallback;
    }
  }
}

/**
 * Base for judges that talk to the network through an injected fetcher.
 */
export abstract class NetworkJudge extends BaseJudge {
  /**
   * Body patterns of the judge's login page, used by the auth retry.
   * Heuristic: extend per judge as the site changes.
   */
  protected readonly loginMarkers: readonly RegExp[] = [];

  constructor(protected readonly fetcher: PageFetcher) {
    super();
  }

  /**
   * Fetches a page, with the domain's browser cookies when the URL needs them.
   */
  protected async fetchPage(url: string, timeoutMs: number = PAGE_TIMEOUT_MS): Promise<string> {
    if (this.needsAuthentication(url)) {
      return this.fetcher.fetchUrlWithAuth(url, { loginMarkers: this.loginMarkers, timeoutMs });
    }
    return this.fetcher.fetchUrl(url, timeoutMs);
  }

  protected validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, url: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ParseError(
        `Unexpected response shape from ${url}: ${result.error.issues[0]?.message ?? 'invalid'}`,
        url,
      );
    }
    return result.data;
  }
}
