/**
 * Problem and contest URL parsing.
 *
 * Patterns are searched anywhere in the string, so URLs with or without a
 * scheme, `www.` or trailing query strings all parse.
 */

export type FetchPlatform = 'codeforces' | 'atcoder' | 'yosupo' | 'cses';

export interface ParsedProblemUrl {
  /** Directory the problem belongs in, e.g. "Codeforces/Problemset". */
  platformDir: string;
  contestId: string;
  letter: string;
  /** Suggested source file name, without extension. */
  filename: string;
  link: string;
  fetchPlatform: FetchPlatform;
}

export interface ParsedContestUrl {
  platform: string;
  contestId: string;
  groupId: string | null;
  isTraining: boolean;
  /** Problem URL with `{groupId}`, `{id}` and `{char}` placeholders. */
  problemUrlTemplate: string;
  /** "A~X" when the URL points at problem X, otherwise null. */
  defaultRange: string | null;
}

interface ProblemPattern {
  pattern: RegExp;
  build: (match: RegExpExecArray, link: string) => ParsedProblemUrl;
}

const PROBLEM_PATTERNS: ProblemPattern[] = [
  {
    pattern: /codeforces\.com\/problemset\/problem\/(\d+)\/([A-Za-z]\d*)/,
    build: ([, contestId = '', letter = ''], link) => ({
      platformDir: 'Codeforces/Problemset',
      contestId,
      letter,
      filename: `${contestId}${letter}`,
      link,
      fetchPlatform: 'codeforces',
    }),
  },
  {
    pattern: /codeforces\.com\/contest\/(\d+)\/problem\/([A-Za-z]\d*)/,
    build: ([, contestId = '', letter = ''], link) => ({
      platformDir: 'Codeforces/Problemset',
      contestId,
      letter,
      filename: `${contestId}${letter}`,
      link,
      fetchPlatform: 'codeforces',
    }),
  },
  {
    pattern: /codeforces\.com\/gym\/(\d+)\/problem\/([A-Za-z]\d*)/,
    build: ([, contestId = '', letter = ''], link) => ({
      platformDir: 'Codeforces/Problemset',
      contestId,
      letter,
      filename: `gym${contestId}${letter}`,
      link,
      fetchPlatform: 'codeforces',
    }),
  },
  {
    pattern: /codeforces\.com\/group\/([^/]+)\/contest\/(\d+)\/problem\/([A-Za-z]\d*)/,
    build: ([, , contestId = '', letter = ''], link) => ({
      platformDir: 'Trainings',
      contestId,
      letter,
      filename: letter,
      link,
      fetchPlatform: 'codeforces',
    }),
  },
  {
    pattern: /atcoder\.jp\/contests\/([^/]+)\/tasks\/([^/?#]+)/,
    build: ([, contestId = '', taskId = ''], link) => ({
      platformDir: 'AtCoder/Problemset',
      contestId,
      letter: taskId.includes('_') ? (taskId.split('_').pop() ?? taskId).toUpperCase() : taskId,
      filename: taskId,
      link,
      fetchPlatform: 'atcoder',
    }),
  },
  {
    pattern: /judge\.yosupo\.jp\/problem\/([^/?#]+)/,
    build: ([, name = ''], link) => ({
      platformDir: 'Yosupo',
      contestId: name,
      letter: name,
      filename: name,
      link,
      fetchPlatform: 'yosupo',
    }),
  },
  {
    pattern: /cses\.fi\/problemset\/task\/(\d+)/,
    build: ([, taskId = ''], link) => ({
      platformDir: 'CSES',
      contestId: 'problemset',
      letter: taskId,
      filename: taskId,
      link,
      fetchPlatform: 'cses',
    }),
  },
];

export function parseProblemUrl(url: string): ParsedProblemUrl | null {
  const link = url.trim();
  for (const { pattern, build } of PROBLEM_PATTERNS) {
    const match = pattern.exec(link);
    if (match) {
      return build(match, link);
    }
  }
  return null;
}

const PROBLEM_LETTER = /(?:problem\/|tasks\/[^/]+_)([A-Za-z])/;

export function parseContestUrl(url: string): ParsedContestUrl | null {
  const trimmed = url.trim();
  const letter = PROBLEM_LETTER.exec(trimmed)?.[1];
  const defaultRange = letter ? `A~${letter.toUpperCase()}` : null;

  let match = /codeforces\.com\/group\/([^/]+)\/contest\/(\d+)/.exec(trimmed);
  if (match) {
    return {
      platform: 'Trainings',
      contestId: match[2] ?? '',
      groupId: match[1] ?? null,
      isTraining: true,
      problemUrlTemplate: 'https://codeforces.com/group/{groupId}/contest/{id}/problem/{char}',
      defaultRange,
    };
  }

  const simple: Array<[RegExp, string, string]> = [
    [/codeforces\.com\/gym\/(\d+)/, 'Codeforces/Gym', 'https://codeforces.com/gym/{id}/problem/{char}'],
    [/codeforces\.com\/contest\/(\d+)/, 'Codeforces', 'https://codeforces.com/contest/{id}/problem/{char}'],
    [/vjudge\.net\/contest\/(\d+)/, 'vJudge', 'https://vjudge.net/contest/{id}#problem/{char}'],
    [/atcoder\.jp\/contests\/([^/?#]+)/, 'AtCoder', 'https://atcoder.jp/contests/{id}/tasks/{id}_{char}'],
  ];
  for (const [pattern, platform, problemUrlTemplate] of simple) {
    match = pattern.exec(trimmed);
    if (match?.[1]) {
      return { platform, contestId: match[1], groupId: null, isTraining: false, problemUrlTemplate, defaultRange };
    }
  }

  return null;
}

/**
 * Fills a contest's problem URL template. AtCoder task ids use a lowercase
 * letter, the others keep it as given.
 */
export function contestProblemUrl(contest: ParsedContestUrl, char: string): string {
  const letter = contest.platform === 'AtCoder' ? char.toLowerCase() : char;
  return contest.problemUrlTemplate
    .replaceAll('{groupId}', contest.groupId ?? '')
    .replaceAll('{id}', contest.contestId)
    .replaceAll('{char}', letter);
}
