import { describe, expect, it } from "vitest";
import { HttpClient, looksLikeLoginPage, toCookieHeader } from "../http-client.js";
import { CookieCache } from "../../cookies/cookie-cache.js";
import { NetworkError, ParseError, PlatformError } from "../../shared/errors.js";
import { eventBus } from "../../shared/events.js";
import { DEFAULT_HEADERS } from "../../shared/constants.js";
import { FakeCookieSource, FakeTransport, ok, transportError } from "../../../tests/fakes.js";

const URL_A = "https://judge.test/problem/1";
const GROUP_URL = "https://codeforces.com/group/AbCdE/contest/4321/problem/B";
const LOGIN_MARKERS = [/id=["']enterForm["']/];
const LOGIN_PAGE = '<html><form id="enterForm" method="post"></form></html>';

function setup(...cookies: ConstructorParameters<typeof FakeCookieSource>) {
  const fake = new FakeTransport();
  const source = new FakeCookieSource(...cookies);
  const cache = new CookieCache({ source });
  const client = new HttpClient({ cookieCache: cache, transport: fake.transport, retryDelayMs: 0 });
  return { fake, source, cache, client };
}

describe("toCookieHeader", () => {
  it("joins name=value pairs", () => {
    expect(toCookieHeader({ JSESSIONID: "abc", "39ce7": "xyz" })).toBe("JSESSIONID=abc; 39ce7=xyz");
  });
});

describe("looksLikeLoginPage", () => {
  it("matches any marker and nothing without markers", () => {
    expect(looksLikeLoginPage(LOGIN_PAGE, LOGIN_MARKERS)).toBe(true);
    expect(looksLikeLoginPage("<p>statement</p>", LOGIN_MARKERS)).toBe(false);
    expect(looksLikeLoginPage(LOGIN_PAGE, [])).toBe(false);
  });
});

describe("HttpClient.fetchUrl", () => {
  it("returns the body and sends the default headers without cookies", async () => {
    const { fake, client } = setup({ cookies: {}, browser: "firefox" });
    fake.on(URL_A, ok("<html>statement</html>"));

    await expect(client.fetchUrl(URL_A, 1_000)).resolves.toBe("<html>statement</html>");
    expect(fake.requests).toEqual([{ url: URL_A, headers: { ...DEFAULT_HEADERS }, timeoutMs: 1_000 }]);
  });

  it("rejects non-2xx responses with the status code", async () => {
    const { client } = setup({ cookies: {}, browser: "firefox" });

    const error = await client.fetchUrl(URL_A).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      code: "HTTP_STATUS",
      statusCode: 404,
      url: URL_A,
      message: `HTTP 404 fetching ${URL_A}`,
    });
  });

  it("reports timeouts without retrying", async () => {
    const { fake, client } = setup({ cookies: {}, browser: "firefox" });
    fake.on(URL_A, transportError("ETIMEDOUT", "Timeout awaiting 'request' for 15000ms"));

    await expect(client.fetchUrl(URL_A, 15_000)).rejects.toMatchObject({
      code: "TIMEOUT",
      message: `Timed out after 15000ms fetching ${URL_A}`,
    });
    expect(fake.requests).toHaveLength(1);
  });

  it("retries a connection reset once", async () => {
    const { fake, client } = setup({ cookies: {}, browser: "firefox" });
    fake.on(URL_A, transportError("ECONNRESET", "socket hang up"), ok("second try"));

    await expect(client.fetchUrl(URL_A)).resolves.toBe("second try");
    expect(fake.requests).toHaveLength(2);
  });

  it("gives up after the configured attempts", async () => {
    const { fake, client } = setup({ cookies: {}, browser: "firefox" });
    fake.on(URL_A, transportError("ECONNREFUSED", "connect ECONNREFUSED 127.0.0.1:443"));

    await expect(client.fetchUrl(URL_A)).rejects.toMatchObject({
      code: "NETWORK_ERROR",
      message: `Network error fetching ${URL_A}: connect ECONNREFUSED 127.0.0.1:443`,
    });
    expect(fake.requests).toHaveLength(2);
  });
});

describe("HttpClient.fetchJson", () => {
  it("parses JSON bodies", async () => {
    const { fake, client } = setup({ cookies: {}, browser: "firefox" });
    fake.on(URL_A, ok('{"status":"OK","result":[]}'));

    await expect(client.fetchJson(URL_A)).resolves.toEqual({ status: "OK", result: [] });
    expect(fake.requests[0]?.timeoutMs).toBe(10_000);
  });

  it("rejects malformed JSON with ParseError", async () => {
    const { fake, client } = setup({ cookies: {}, browser: "firefox" });
    fake.on(URL_A, ok("<html>maintenance</html>"));

    const error = await client.fetchJson(URL_A).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ code: "PARSE_ERROR", url: URL_A });
  });
});

describe("HttpClient.fetchUrlWithAuth", () => {
  it("sends the cached cookies and returns the page when logged in", async () => {
    const { fake, source, client } = setup({ cookies: { JSESSIONID: "s1" }, browser: "firefox" });
    fake.on(GROUP_URL, ok("<div class='sample-test'></div>"));

    await client.fetchUrlWithAuth(GROUP_URL, { loginMarkers: LOGIN_MARKERS });
    await client.fetchUrlWithAuth(GROUP_URL, { loginMarkers: LOGIN_MARKERS });

    expect(source.calls).toEqual(["codeforces.com"]);
    expect(fake.requests.map((request) => request.headers["Cookie"])).toEqual(["JSESSIONID=s1", "JSESSIONID=s1"]);
  });

  it("refreshes cookies and retries exactly once after a login page", async () => {
    const { fake, source, cache, client } = setup(
      { cookies: { JSESSIONID: "expired" }, browser: "firefox" },
      { cookies: { JSESSIONID: "fresh" }, browser: "firefox" },
    );
    fake.on(GROUP_URL, ok(LOGIN_PAGE), ok("<p>statement</p>"));
    const retries: string[] = [];
    eventBus.on("auth:retry", ({ domain }) => retries.push(domain));

    await expect(client.fetchUrlWithAuth(GROUP_URL, { loginMarkers: LOGIN_MARKERS })).resolves.toBe("<p>statement</p>");

    expect(source.calls).toEqual(["codeforces.com", "codeforces.com"]);
    expect(fake.requests.map((request) => request.headers["Cookie"])).toEqual([
      "JSESSIONID=expired",
      "JSESSIONID=fresh",
    ]);
    expect(retries).toEqual(["codeforces.com"]);
    expect(cache.peek("codeforces.com")?.cookies).toEqual({ JSESSIONID: "fresh" });
  });

  it("fails with AUTH_FAILED after the second login page and makes no third request", async () => {
    const { fake, source, cache, client } = setup({ cookies: { JSESSIONID: "stale" }, browser: "chrome" });
    fake.on(GROUP_URL, ok(LOGIN_PAGE));

    const error = await client.fetchUrlWithAuth(GROUP_URL, { loginMarkers: LOGIN_MARKERS }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlatformError);
    expect(error).toMatchObject({ code: "AUTH_FAILED", domain: "codeforces.com" });
    expect(fake.requests).toHaveLength(2);
    expect(source.calls).toHaveLength(2);
    expect(cache.peek("codeforces.com")).toBeUndefined();
  });

  it("starts from a forced extraction when asked, leaving a single attempt", async () => {
    const { fake, source, cache, client } = setup({ cookies: { JSESSIONID: "s1" }, browser: "firefox" });
    await cache.getCookies("codeforces.com");
    fake.on(GROUP_URL, ok(LOGIN_PAGE));

    await expect(
      client.fetchUrlWithAuth(GROUP_URL, { loginMarkers: LOGIN_MARKERS, forceRefresh: true }),
    ).rejects.toMatchObject({ code: "AUTH_FAILED" });

    expect(source.calls).toHaveLength(2);
    expect(fake.requests).toHaveLength(1);
  });

  it("uses the explicit domain and strips www. otherwise", async () => {
    const { fake, source, client } = setup({ cookies: { sid: "1" }, browser: "firefox" });
    fake.on("https://www.judge.test/private", ok("ok"));

    await client.fetchUrlWithAuth("https://www.judge.test/private");
    await client.fetchUrlWithAuth("https://www.judge.test/private", { domain: "accounts.judge.test" });

    expect(source.calls).toEqual(["judge.test", "accounts.judge.test"]);
  });

  it("propagates NO_BROWSER_COOKIES from the cookie source", async () => {
    const { fake, client } = setup(
      new PlatformError("No browser cookies found for codeforces.com.", "NO_BROWSER_COOKIES", "codeforces.com"),
    );

    await expect(client.fetchUrlWithAuth(GROUP_URL, { loginMarkers: LOGIN_MARKERS })).rejects.toMatchObject({
      code: "NO_BROWSER_COOKIES",
    });
    expect(fake.requests).toHaveLength(0);
  });
});
