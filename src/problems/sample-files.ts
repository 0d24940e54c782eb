import { readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { SampleTest } from '../types/judge.types.js';

/**
 * Writes samples as `<problem>_1.in`, `<problem>_1.out`, `<problem>_2.in`...
 * numbered from 1. An `.out` file is only written when the sample has a
 * non-empty output. Returns the number of samples saved.
 */
export async function saveSamples(directory: string, problem: string, samples: readonly SampleTest[]): Promise<number> {
  let saved = 0;
  for (const [i, sample] of samples.entries()) {
    const base = join(directory, `${problem}_${i + 1}`);
    await writeFile(`${base}.in`, `${sample.input}\n`, 'utf8');
    if (sample.output) {
      await writeFile(`${base}.out`, `${sample.output}\n`, 'utf8');
    }
    saved++;
  }
  return saved;
}

/**
 * Finds `<target>.cpp` in `directory` ignoring case ("a" finds "A.cpp").
 * Returns null when the directory or the file does not exist.
 */
export async function findSourceFile(directory: string, target: string): Promise<string | null> {
  const wanted = (target.toLowerCase().endsWith('.cpp') ? target : `${target}.cpp`).toLowerCase();

  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }

  const match = entries.find((entry) => entry.toLowerCase() === wanted);
  return match ? join(directory, match) : null;
}
