import { open, type FileHandle } from 'node:fs/promises';
import { getLogger } from '../shared/logger.js';

const log = getLogger('problems', { component: 'header' });

/** The header block is expected within the first bytes of the file. */
const HEADER_BYTES = 500;

export interface ProblemHeader {
  problem: string | null;
  link: string | null;
  status: string;
  created: string | null;
}

const FIELDS = [
  ['Problem:', 'problem'],
  ['Link:', 'link'],
  ['Status:', 'status'],
  ['Created:', 'created'],
] as const;

/**
 * Parses the metadata comment at the top of a solution file:
 *
 *   /**
 *    * Problem:     A - Watermelon
 *    * Link:        https://codeforces.com/contest/4/problem/A
 *    * Status:      ~
 *    * Created:     31-01-2026 12:00:00
 *    *\/
 */
export function parseProblemHeader(content: string): ProblemHeader {
  const header: ProblemHeader = { problem: null, link: null, status: '~', created: null };

  for (const line of content.split('\n')) {
    const field = FIELDS.find(([label]) => line.includes(label));
    if (!field) {
      continue;
    }
    const [label, key] = field;
    const value = line.slice(line.indexOf(label) + label.length).replace('*/', '').trim();
    header[key] = value;
  }

  return header;
}

/**
 * Reads the header of `path`. Returns null when the file cannot be read.
 */
export async function readProblemHeader(path: string): Promise<ProblemHeader | null> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(path, 'r');
    const buffer = Buffer.alloc(HEADER_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, HEADER_BYTES, 0);
    return parseProblemHeader(buffer.subarray(0, bytesRead).toString('utf8'));
  } catch (error) {
    log.debug({ path, err: error }, 'Could not read problem header');
    return null;
  } finally {
    await handle?.close();
  }
}
