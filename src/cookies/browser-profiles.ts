/**
 * Where each supported browser keeps its cookie store, per OS.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { BROWSER_NAMES } from '../shared/constants.js';
import type { BrowserName } from '../shared/constants.js';
import type { BrowserCookieReader } from '../types/cookie.types.js';
import { FirefoxCookieReader } from './firefox-reader.js';
import { ChromiumCookieReader, linuxKeyProvider, macKeychainKeyProvider } from './chromium-reader.js';
import type { KeyProvider } from './chromium-reader.js';

export interface ProfileEnvironment {
  platform: NodeJS.Platform;
  home: string;
  /** %APPDATA% on Windows */
  appData?: string;
  /** %LOCALAPPDATA% on Windows */
  localAppData?: string;
}

type FirefoxFamily = typeof BROWSER_NAMES.ZEN | typeof BROWSER_NAMES.FIREFOX | typeof BROWSER_NAMES.LIBREWOLF;
type ChromiumFamily = Exclude<BrowserName, FirefoxFamily>;

interface ChromiumLayout {
  linux: string;
  darwin: string;
  win32: string;
  /** Keychain service on macOS */
  safeStorage: string;
  /** Opera keeps cookies directly in the user data dir */
  flatProfile?: boolean;
}

const CHROMIUM_LAYOUTS: Record<ChromiumFamily, ChromiumLayout> = {
  chrome: { linux: 'google-chrome', darwin: 'Google/Chrome', win32: 'Google/Chrome/User Data', safeStorage: 'Chrome Safe Storage' },
  chromium: { linux: 'chromium', darwin: 'Chromium', win32: 'Chromium/User Data', safeStorage: 'Chromium Safe Storage' },
  edge: { linux: 'microsoft-edge', darwin: 'Microsoft Edge', win32: 'Microsoft/Edge/User Data', safeStorage: 'Microsoft Edge Safe Storage' },
  brave: { linux: 'BraveSoftware/Brave-Browser', darwin: 'BraveSoftware/Brave-Browser', win32: 'BraveSoftware/Brave-Browser/User Data', safeStorage: 'Brave Safe Storage' },
  opera: { linux: 'opera', darwin: 'com.operasoftware.Opera', win32: 'Opera Software/Opera Stable', safeStorage: 'Opera Safe Storage', flatProfile: true },
  vivaldi: { linux: 'vivaldi', darwin: 'Vivaldi', win32: 'Vivaldi/User Data', safeStorage: 'Vivaldi Safe Storage' },
};

/** Directory names of the Firefox-family profile roots. */
const FIREFOX_LAYOUTS: Record<FirefoxFamily, { linux: string; darwin: string; win32: string }> = {
  zen: { linux: '.zen', darwin: 'zen/Profiles', win32: 'zen/Profiles' },
  firefox: { linux: '.mozilla/firefox', darwin: 'Firefox/Profiles', win32: 'Mozilla/Firefox/Profiles' },
  librewolf: { linux: '.librewolf', darwin: 'librewolf/Profiles', win32: 'librewolf/Profiles' },
};

export function currentProfileEnvironment(): ProfileEnvironment {
  return {
    platform: process.platform,
    home: homedir(),
    appData: process.env['APPDATA'],
    localAppData: process.env['LOCALAPPDATA'],
  };
}

export function firefoxProfileRoots(browser: FirefoxFamily, env: ProfileEnvironment): string[] {
  const layout = FIREFOX_LAYOUTS[browser];
  switch (env.platform) {
    case 'darwin':
      return [join(env.home, 'Library', 'Application Support', layout.darwin)];
    case 'win32':
      return [join(env.appData ?? join(env.home, 'AppData', 'Roaming'), layout.win32)];
    default:
      return [join(env.home, layout.linux)];
  }
}

export function chromiumCookieFiles(browser: ChromiumFamily, env: ProfileEnvironment): string[] {
  const layout = CHROMIUM_LAYOUTS[browser];
  let userData: string;
  switch (env.platform) {
    case 'darwin':
      userData = join(env.home, 'Library', 'Application Support', layout.darwin);
      break;
    case 'win32':
      userData = join(
        browser === 'opera'
          ? env.appData ?? join(env.home, 'AppData', 'Roaming')
          : env.localAppData ?? join(env.home, 'AppData', 'Local'),
        layout.win32,
      );
      break;
    default:
      userData = join(env.home, '.config', layout.linux);
  }

  const profile = layout.flatProfile ? userData : join(userData, 'Default');
  // Newer releases moved the store under Network/
  return [join(profile, 'Network', 'Cookies'), join(profile, 'Cookies')];
}

function keyProviderFor(browser: ChromiumFamily, env: ProfileEnvironment): KeyProvider {
  if (env.platform === 'darwin') {
    return macKeychainKeyProvider(CHROMIUM_LAYOUTS[browser].safeStorage);
  }
  if (env.platform === 'win32') {
    return async () => null;
  }
  return linuxKeyProvider();
}

/**
 * Builds one reader per supported browser for the given environment.
 */
export function createBrowserReaders(
  env: ProfileEnvironment = currentProfileEnvironment(),
): Record<BrowserName, BrowserCookieReader> {
  const firefox = (browser: FirefoxFamily): BrowserCookieReader =>
    new FirefoxCookieReader(browser, firefoxProfileRoots(browser, env));
  const chromium = (browser: ChromiumFamily): BrowserCookieReader =>
    new ChromiumCookieReader(browser, chromiumCookieFiles(browser, env), keyProviderFor(browser, env));

  return {
    zen: firefox('zen'),
    firefox: firefox('firefox'),
    librewolf: firefox('librewolf'),
    chrome: chromium('chrome'),
    chromium: chromium('chromium'),
    edge: chromium('edge'),
    brave: chromium('brave'),
    opera: chromium('opera'),
    vivaldi: chromium('vivaldi'),
  };
}
