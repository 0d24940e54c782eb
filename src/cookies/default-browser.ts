import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { getLogger } from '../shared/logger.js';
import { BROWSER_NAMES } from '../shared/constants.js';
import type { BrowserName } from '../shared/constants.js';

const execFileAsync = promisify(execFile);
const logger = getLogger('cookies', { component: 'default-browser' });

/** Checked in order: "chromium" must come before "chrome". */
const DESKTOP_FILE_HINTS: ReadonlyArray<[string, BrowserName]> = [
  ['zen', BROWSER_NAMES.ZEN],
  ['librewolf', BROWSER_NAMES.LIBREWOLF],
  ['firefox', BROWSER_NAMES.FIREFOX],
  ['chromium', BROWSER_NAMES.CHROMIUM],
  ['chrome', BROWSER_NAMES.CHROME],
  ['brave', BROWSER_NAMES.BRAVE],
  ['edge', BROWSER_NAMES.EDGE],
  ['vivaldi', BROWSER_NAMES.VIVALDI],
  ['opera', BROWSER_NAMES.OPERA],
];

/**
 * Maps a desktop entry such as "firefox_firefox.desktop" to a browser.
 */
export function browserFromDesktopEntry(entry: string): BrowserName | null {
  const normalised = entry.trim().toLowerCase();
  const hit = DESKTOP_FILE_HINTS.find(([hint]) => normalised.includes(hint));
  return hit ? hit[1] : null;
}

/**
 * Asks the desktop environment for the default browser. Only Linux
 * (xdg-settings) is supported; elsewhere the priority order applies.
 */
export async function detectDefaultBrowser(platform: NodeJS.Platform = process.platform): Promise<BrowserName | null> {
  if (platform !== 'linux') {
    return null;
  }

  try {
    const { stdout } = await execFileAsync('xdg-settings', ['get', 'default-web-browser'], { timeout: 2_000 });
    const browser = browserFromDesktopEntry(stdout);
    logger.debug({ entry: stdout.trim(), browser }, 'Default browser detected');
    return browser;
  } catch (error) {
    logger.debug({ err: error }, 'Default browser detection failed');
    return null;
  }
}
