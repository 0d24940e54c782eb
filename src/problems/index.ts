export { parseProblemUrl, parseContestUrl, contestProblemUrl } from './url-parser.js';
export type { ParsedProblemUrl, ParsedContestUrl, FetchPlatform } from './url-parser.js';
export { parseProblemRange } from './problem-range.js';
export { parseProblemHeader, readProblemHeader } from './problem-header.js';
export type { ProblemHeader } from './problem-header.js';
export { saveSamples, findSourceFile } from './sample-files.js';
