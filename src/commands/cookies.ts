import { extractDomain } from '../shared/utils.js';
import type { CommandContext } from './context.js';

/**
 * `cpfetch cookies clear [domain]`: drops one domain (a bare host or a URL)
 * or the whole cookie cache.
 */
export function clearCookiesCommand(domain: string | undefined, ctx: CommandContext): void {
  const cache = ctx.engine.cookieCache;

  if (domain) {
    const target = extractDomain(domain);
    ctx.print(cache.invalidate(target) ? `Cleared cookies for ${target}.` : `No cached cookies for ${target}.`);
    return;
  }

  const count = cache.domains().length;
  cache.clear();
  ctx.print(`Cleared ${count} cached domain(s).`);
}
