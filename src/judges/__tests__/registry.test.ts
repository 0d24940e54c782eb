import { describe, expect, it } from "vitest";
import { createJudges, detectJudge, getAvailablePlatforms } from "../index.js";
import type { Judge } from "../../types/judge.types.js";
import { FakeFetcher } from "../../../tests/fakes.js";

function stubJudge(platformName: string, matches: (url: string) => boolean): Judge {
  return {
    platformName,
    requiresAuth: false,
    detect: matches,
    isPrivateUrl: () => false,
    needsAuthentication: () => false,
    fetchProblemName: async () => null,
    fetchContestProblems: async () => ({}),
    fetchSamples: async () => null,
  };
}

describe("judge registry", () => {
  const judges = createJudges(new FakeFetcher());

  it("registers the judges in a fixed order", () => {
    expect(getAvailablePlatforms(judges)).toEqual(["Codeforces", "AtCoder", "CSES", "Yosupo", "vJudge"]);
  });

  it.each([
    ["https://codeforces.com/contest/1900/problem/A", "Codeforces"],
    ["codeforces.com/gym/104114/problem/C", "Codeforces"],
    ["https://atcoder.jp/contests/abc300/tasks/abc300_a", "AtCoder"],
    ["https://cses.fi/problemset/task/1068", "CSES"],
    ["https://judge.yosupo.jp/problem/unionfind", "Yosupo"],
    ["https://vjudge.net/contest/555", "vJudge"],
  ])("routes %s to %s", (url, platform) => {
    expect(detectJudge(url, judges)?.platformName).toBe(platform);
  });

  it("returns null for unsupported or malformed URLs", () => {
    expect(detectJudge("https://example.com/problem/1", judges)).toBeNull();
    expect(detectJudge("not a url", judges)).toBeNull();
    expect(detectJudge("", judges)).toBeNull();
  });

  it("does not match hosts that merely end with a judge's name", () => {
    expect(detectJudge("https://notcodeforces.com/contest/1", judges)).toBeNull();
  });

  it("returns the first registered judge when several match", () => {
    const specific = stubJudge("Specific", (url) => url.includes("/special/"));
    const general = stubJudge("General", () => true);

    expect(detectJudge("https://x.test/special/1", [specific, general])?.platformName).toBe("Specific");
    expect(detectJudge("https://x.test/special/1", [general, specific])?.platformName).toBe("General");
    expect(detectJudge("https://x.test/other", [specific, general])?.platformName).toBe("General");
  });
});
