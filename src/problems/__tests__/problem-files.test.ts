import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseProblemHeader, readProblemHeader } from "../problem-header.js";
import { findSourceFile, saveSamples } from "../sample-files.js";

const HEADER = `/**
 * Author:      tester
 * Problem:     A - Watermelon
 * Link:        https://codeforces.com/problemset/problem/4/A
 * Status:      AC
 * Created:     31-01-2026 12:00:00
 **/

#include <bits/stdc++.h>
`;

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "cpfetch-problem-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("problem header", () => {
  it("parses the metadata fields", () => {
    expect(parseProblemHeader(HEADER)).toEqual({
      problem: "A - Watermelon",
      link: "https://codeforces.com/problemset/problem/4/A",
      status: "AC",
      created: "31-01-2026 12:00:00",
    });
  });

  it("strips a closing comment on the same line and defaults the status", () => {
    expect(parseProblemHeader("/* Link: https://cses.fi/problemset/task/1068 */")).toEqual({
      problem: null,
      link: "https://cses.fi/problemset/task/1068",
      status: "~",
      created: null,
    });
  });

  it("reads the header from a file", async () => {
    const path = join(dir, "A.cpp");
    writeFileSync(path, HEADER);
    await expect(readProblemHeader(path)).resolves.toMatchObject({ link: "https://codeforces.com/problemset/problem/4/A" });
  });

  it("only looks at the start of the file", async () => {
    const path = join(dir, "B.cpp");
    writeFileSync(path, `${"/".repeat(600)}\n * Link: https://codeforces.com/problemset/problem/4/B\n`);
    await expect(readProblemHeader(path)).resolves.toMatchObject({ link: null });
  });

  it("returns null for a missing file", async () => {
    await expect(readProblemHeader(join(dir, "missing.cpp"))).resolves.toBeNull();
  });
});

describe("saveSamples", () => {
  it("numbers files from 1 and skips empty or missing outputs", async () => {
    const count = await saveSamples(dir, "A", [
      { input: "1 2", output: "3" },
      { input: "5", output: null },
      { input: "7", output: "" },
    ]);

    expect(count).toBe(3);
    expect(readFileSync(join(dir, "A_1.in"), "utf8")).toBe("1 2\n");
    expect(readFileSync(join(dir, "A_1.out"), "utf8")).toBe("3\n");
    expect(readFileSync(join(dir, "A_2.in"), "utf8")).toBe("5\n");
    expect(existsSync(join(dir, "A_2.out"))).toBe(false);
    expect(readFileSync(join(dir, "A_3.in"), "utf8")).toBe("7\n");
    expect(existsSync(join(dir, "A_3.out"))).toBe(false);
  });

  it("saves nothing for an empty list", async () => {
    await expect(saveSamples(dir, "B", [])).resolves.toBe(0);
  });
});

describe("findSourceFile", () => {
  it("matches the .cpp file ignoring case", async () => {
    writeFileSync(join(dir, "A.cpp"), "");

    await expect(findSourceFile(dir, "a")).resolves.toBe(join(dir, "A.cpp"));
    await expect(findSourceFile(dir, "A.CPP")).resolves.toBe(join(dir, "A.cpp"));
    await expect(findSourceFile(dir, "B")).resolves.toBeNull();
  });

  it("returns null when the directory does not exist", async () => {
    await expect(findSourceFile(join(dir, "nope"), "A")).resolves.toBeNull();
  });
});
