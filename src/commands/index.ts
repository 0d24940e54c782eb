export { fetchCommand } from './fetch.js';
export type { FetchSummary } from './fetch.js';
export { infoCommand } from './info.js';
export { contestCommand } from './contest.js';
export { clearCookiesCommand } from './cookies.js';
export type { CommandContext, Printer } from './context.js';
