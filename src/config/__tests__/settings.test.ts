import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_SETTINGS, loadSettings, parseSettings } from "../settings.js";
import { ValidationError } from "../../shared/errors.js";

describe("parseSettings", () => {
  it("fills in defaults for missing keys", () => {
    expect(parseSettings({})).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS).toEqual({ cookieCacheEnabled: true, cookieCacheMaxAgeHours: 24, preferredBrowser: null });
  });

  it("accepts -1 and a known browser, ignoring unrelated keys", () => {
    expect(
      parseSettings({ cookie_cache_max_age_hours: -1, preferred_browser: "brave", editor: "vim" }),
    ).toEqual({ cookieCacheEnabled: true, cookieCacheMaxAgeHours: -1, preferredBrowser: "brave" });
  });

  it.each([
    [{ cookie_cache_max_age_hours: -2 }, "cookie_cache_max_age_hours"],
    [{ cookie_cache_max_age_hours: 1.5 }, "cookie_cache_max_age_hours"],
    [{ cookie_cache_enabled: "yes" }, "cookie_cache_enabled"],
    [{ preferred_browser: "netscape" }, "preferred_browser"],
  ])("rejects %j naming the field", (raw, field) => {
    const act = (): unknown => parseSettings(raw);
    expect(act).toThrow(ValidationError);
    expect(act).toThrow(`Invalid setting "${field}"`);
  });
});

describe("loadSettings", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cpfetch-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the file with defaults when it is missing", () => {
    const path = join(dir, "cpfetch", "config.json");

    expect(loadSettings(path)).toEqual(DEFAULT_SETTINGS);
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, "utf8")).toBe(
      '{\n    "cookie_cache_enabled": true,\n    "cookie_cache_max_age_hours": 24,\n    "preferred_browser": null\n}\n',
    );
  });

  it("reads an existing file", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ cookie_cache_enabled: false }));

    expect(loadSettings(path)).toEqual({ ...DEFAULT_SETTINGS, cookieCacheEnabled: false });
  });

  it("rejects a file that is not JSON", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, "cookie_cache_enabled = true");

    expect(() => loadSettings(path)).toThrow(ValidationError);
  });
});
