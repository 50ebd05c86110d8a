import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { readPackageVersion } from '../../core/version';

describe('readPackageVersion', () => {
  it('reads the version of this package', () => {
    expect(readPackageVersion()).toBe('0.1.0');
  });

  it('falls back to dev when the manifest is missing or has no version', () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'asc-version-'));
    try {
      expect(readPackageVersion(path.join(dir, 'package.json'))).toBe('dev');
      writeFileSync(path.join(dir, 'package.json'), '{"name":"x"}');
      expect(readPackageVersion(path.join(dir, 'package.json'))).toBe('dev');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
