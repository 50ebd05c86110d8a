import { homedir } from 'node:os';
import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { conversationsDir, defaultDataDir, expandHome, resolveConfigPath, resolveHomeDir, resolveShareDir } from './paths';

function withEnv(values: Record<string, string | undefined>, run: () => void): void {
  const previousValues: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(values)) {
    previousValues[key] = process.env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  try {
    run();
  } finally {
    for (const [key, value] of Object.entries(previousValues)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

describe('resolveHomeDir', () => {
  it('uses HOME when present', () => {
    withEnv({ HOME: '/home/custom', USERPROFILE: '/windows/profile' }, () => {
      expect(resolveHomeDir()).toBe('/home/custom');
    });
  });

  if (process.platform !== 'win32') {
    it('falls back to os.homedir when HOME is missing', () => {
      withEnv({ HOME: undefined }, () => {
        expect(resolveHomeDir()).toBe(homedir());
      });
    });
  }
});

describe('app directories', () => {
  it('keeps config and data under ~/.asc', () => {
    withEnv({ HOME: '/home/tester' }, () => {
      expect(resolveConfigPath()).toBe(path.join('/home/tester', '.asc', 'config.toml'));
      expect(defaultDataDir()).toBe(path.join('/home/tester', '.asc', 'data'));
      expect(conversationsDir('/data')).toBe(path.join('/data', 'conversations'));
    });
  });

  it('prefers XDG_DATA_HOME for the share directory', () => {
    withEnv({ HOME: '/home/tester', XDG_DATA_HOME: '/xdg' }, () => {
      expect(resolveShareDir()).toBe(path.join('/xdg', 'asc'));
    });
    withEnv({ HOME: '/home/tester', XDG_DATA_HOME: undefined }, () => {
      expect(resolveShareDir()).toBe(path.join('/home/tester', '.local', 'share', 'asc'));
    });
  });

  it('expands a leading tilde only', () => {
    withEnv({ HOME: '/home/tester' }, () => {
      expect(expandHome('~')).toBe('/home/tester');
      expect(expandHome('~/notes')).toBe(path.join('/home/tester', 'notes'));
      expect(expandHome('/abs/~/x')).toBe('/abs/~/x');
      expect(expandHome('~other')).toBe('~other');
    });
  });
});
