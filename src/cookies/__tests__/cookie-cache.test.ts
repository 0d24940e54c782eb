import { describe, expect, it } from "vitest";
import { CookieCache, isStale } from "../cookie-cache.js";
import { eventBus } from "../../shared/events.js";
import type { CookieCacheEntry, CookieCacheStore } from "../../types/cookie.types.js";
import { FakeClock, FakeCookieSource } from "../../../tests/fakes.js";

const HOUR = 3_600_000;
const DOMAIN = "codeforces.com";

class MemoryStore implements CookieCacheStore {
  saved: CookieCacheEntry[] = [];
  saves = 0;
  loads = 0;

  constructor(initial: CookieCacheEntry[] = []) {
    this.saved = initial;
  }

  load(): CookieCacheEntry[] {
    this.loads++;
    return this.saved;
  }

  save(entries: CookieCacheEntry[]): void {
    this.saves++;
    this.saved = entries.map((entry) => ({ ...entry }));
  }
}

describe("isStale", () => {
  const entry: CookieCacheEntry = { domain: DOMAIN, cookies: {}, browser: "firefox", fetchedAt: 0 };

  it("is stale only strictly after the TTL", () => {
    expect(isStale(entry, 24, 24 * HOUR)).toBe(false);
    expect(isStale(entry, 24, 24 * HOUR + 1)).toBe(true);
  });

  it("never expires with -1", () => {
    expect(isStale(entry, -1, 10 * 365 * 24 * HOUR)).toBe(false);
  });
});

describe("CookieCache", () => {
  it("extracts once within the TTL and again after it", async () => {
    const clock = new FakeClock();
    const source = new FakeCookieSource(
      { cookies: { sid: "one" }, browser: "firefox" },
      { cookies: { sid: "two" }, browser: "firefox" },
    );
    const cache = new CookieCache({ source, maxAgeHours: 24, now: clock.now });

    await expect(cache.getCookies(DOMAIN)).resolves.toEqual({ sid: "one" });
    clock.advance(23 * HOUR);
    await expect(cache.getCookies(DOMAIN)).resolves.toEqual({ sid: "one" });
    expect(source.calls).toHaveLength(1);

    clock.advance(HOUR + 1);
    await expect(cache.getCookies(DOMAIN)).resolves.toEqual({ sid: "two" });
    expect(source.calls).toHaveLength(2);
  });

  it("keeps entries forever with -1 until invalidated", async () => {
    const clock = new FakeClock();
    const source = new FakeCookieSource({ cookies: { sid: "one" }, browser: "chrome" });
    const cache = new CookieCache({ source, maxAgeHours: -1, now: clock.now });

    await cache.getCookies(DOMAIN);
    clock.advance(5 * 365 * 24 * HOUR);
    await cache.getCookies(DOMAIN);
    expect(source.calls).toHaveLength(1);

    expect(cache.invalidate(DOMAIN)).toBe(true);
    expect(cache.invalidate(DOMAIN)).toBe(false);
    await cache.getCookies(DOMAIN);
    expect(source.calls).toHaveLength(2);
  });

  it("re-extracts on a forced refresh and overwrites the entry", async () => {
    const clock = new FakeClock();
    const source = new FakeCookieSource(
      { cookies: { sid: "old" }, browser: "firefox" },
      { cookies: { sid: "new" }, browser: "zen" },
    );
    const cache = new CookieCache({ source, now: clock.now });

    await cache.getCookies(DOMAIN);
    clock.advance(1_000);
    await expect(cache.getCookies(DOMAIN, { forceRefresh: true })).resolves.toEqual({ sid: "new" });

    expect(cache.domains()).toEqual([DOMAIN]);
    expect(cache.peek(DOMAIN)).toEqual({
      domain: DOMAIN,
      cookies: { sid: "new" },
      browser: "zen",
      fetchedAt: clock.now(),
    });
  });

  it("always extracts and stores nothing when disabled", async () => {
    const store = new MemoryStore();
    const source = new FakeCookieSource({ cookies: { sid: "x" }, browser: "firefox" });
    const cache = new CookieCache({ source, enabled: false, store });

    await cache.getCookies(DOMAIN);
    await cache.getCookies(DOMAIN);

    expect(source.calls).toHaveLength(2);
    expect(cache.peek(DOMAIN)).toBeUndefined();
    expect(store.saves).toBe(0);
  });

  it("leaves a persisted cache untouched when disabled", async () => {
    const seeded: CookieCacheEntry = { domain: DOMAIN, cookies: { sid: "kept" }, browser: "firefox", fetchedAt: 0 };
    const store = new MemoryStore([seeded]);
    const cache = new CookieCache({
      source: new FakeCookieSource({ cookies: { sid: "x" }, browser: "firefox" }),
      enabled: false,
      store,
    });

    await expect(cache.getCookies(DOMAIN)).resolves.toEqual({ sid: "x" });
    expect(cache.invalidate(DOMAIN)).toBe(false);
    cache.clear();

    expect(store.loads).toBe(0);
    expect(store.saves).toBe(0);
    expect(store.saved).toEqual([seeded]);
  });

  it("keeps one entry per domain", async () => {
    const source = new FakeCookieSource({ cookies: { sid: "x" }, browser: "firefox" });
    const cache = new CookieCache({ source });

    await cache.getCookies("codeforces.com");
    await cache.getCookies("atcoder.jp");
    await cache.getCookies("codeforces.com", { forceRefresh: true });

    expect(cache.domains().sort()).toEqual(["atcoder.jp", "codeforces.com"]);
    cache.clear();
    expect(cache.domains()).toEqual([]);
  });

  it("loads persisted entries and saves changes back", async () => {
    const clock = new FakeClock();
    const store = new MemoryStore([
      { domain: DOMAIN, cookies: { sid: "persisted" }, browser: "firefox", fetchedAt: clock.now() - HOUR },
    ]);
    const source = new FakeCookieSource({ cookies: { sid: "fresh" }, browser: "firefox" });
    const cache = new CookieCache({ source, store, now: clock.now });

    await expect(cache.getCookies(DOMAIN)).resolves.toEqual({ sid: "persisted" });
    expect(source.calls).toHaveLength(0);

    cache.invalidate(DOMAIN);
    expect(store.saved).toEqual([]);
  });

  it("announces cache hits and extractions", async () => {
    const events: string[] = [];
    eventBus.on("cookies:extracted", ({ domain, browser, forced }) => events.push(`extracted ${domain} ${browser} ${forced}`));
    eventBus.on("cookies:cache-hit", ({ domain }) => events.push(`hit ${domain}`));
    const cache = new CookieCache({ source: new FakeCookieSource({ cookies: { sid: "x" }, browser: "brave" }) });

    await cache.getCookies(DOMAIN);
    await cache.getCookies(DOMAIN);
    await cache.getCookies(DOMAIN, { forceRefresh: true });

    expect(events).toEqual([
      "extracted codeforces.com brave false",
      "hit codeforces.com",
      "extracted codeforces.com brave true",
    ]);
  });
});
