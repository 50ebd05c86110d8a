import { homedir } from 'node:os';
import * as path from 'node:path';

const APP_DIR = '.asc';
const SHARE_DIR_NAME = 'asc';

export function resolveHomeDir(): string {
  const explicitHome = process.env.HOME;
  if (explicitHome) {
    return explicitHome;
  }

  if (process.platform === 'win32') {
    const userProfileHome = process.env.USERPROFILE;
    if (userProfileHome) {
      return userProfileHome;
    }

    const homedrive = process.env.HOMEDRIVE;
    const homepath = process.env.HOMEPATH;
    if (homedrive && homepath) {
      return path.join(homedrive, homepath);
    }
  }

  return homedir();
}

export function resolveConfigPath(): string {
  return path.join(resolveHomeDir(), APP_DIR, 'config.toml');
}

export function defaultDataDir(): string {
  return path.join(resolveHomeDir(), APP_DIR, 'data');
}

/**
 * Style file and context live here: `$XDG_DATA_HOME/asc`, falling back to
 * `~/.local/share/asc`.
 */
export function resolveShareDir(): string {
  const xdgDataHome = process.env.XDG_DATA_HOME;
  if (xdgDataHome) {
    return path.join(xdgDataHome, SHARE_DIR_NAME);
  }
  return path.join(resolveHomeDir(), '.local', 'share', SHARE_DIR_NAME);
}

export function conversationsDir(dataDir: string): string {
  return path.join(dataDir, 'conversations');
}

/** Expands a leading `~` against the home directory. */
export function expandHome(input: string): string {
  if (input === '~') {
    return resolveHomeDir();
  }
  if (input.startsWith('~/') || input.startsWith('~\\')) {
    return path.join(resolveHomeDir(), input.slice(2));
  }
  return input;
}
