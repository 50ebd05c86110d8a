import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { RenderError } from '../../core/errors';
import {
  buildGlowArgs,
  GlowRenderer,
  resolveRenderWidth,
  resolveStylePath,
  STYLE_FILE_NAME,
} from '../../core/renderer';

function writeScript(dir: string, body: string): string {
  const script = path.join(dir, 'fake-glow');
  writeFileSync(script, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return script;
}

describe('buildGlowArgs', () => {
  it('adds width and style only when given', () => {
    expect(buildGlowArgs()).toEqual([]);
    expect(buildGlowArgs({ width: 78 })).toEqual(['-w', '78']);
    expect(buildGlowArgs({ width: 78, stylePath: '/s.json' })).toEqual(['-w', '78', '--style', '/s.json']);
  });
});

describe('resolveRenderWidth', () => {
  it('subtracts the margin from the terminal width', () => {
    expect(resolveRenderWidth(100, 2)).toBe(98);
  });

  it('falls back to 80 columns and keeps a minimum width', () => {
    expect(resolveRenderWidth(undefined, 2)).toBe(78);
    expect(resolveRenderWidth(0, 0)).toBe(80);
    expect(resolveRenderWidth(15, 2)).toBe(20);
  });
});

describe('resolveStylePath', () => {
  it('prefers an explicit path, then the share-dir style file', () => {
    const shareDir = mkdtempSync(path.join(tmpdir(), 'asc-share-'));
    try {
      expect(resolveStylePath(shareDir)).toBeUndefined();
      expect(resolveStylePath(shareDir, '/custom.json')).toBe('/custom.json');

      writeFileSync(path.join(shareDir, STYLE_FILE_NAME), '{}');
      expect(resolveStylePath(shareDir)).toBe(path.join(shareDir, STYLE_FILE_NAME));
    } finally {
      rmSync(shareDir, { recursive: true, force: true });
    }
  });
});

describe('GlowRenderer', () => {
  it('pipes markdown through the command and splits its output', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'asc-glow-'));
    try {
      const command = writeScript(dir, 'printf "args:%s|" "$*"; printf "color:%s\\n" "$CLICOLOR_FORCE"; cat');
      const renderer = new GlowRenderer({ command });

      const lines = await renderer.render('# hi\n', { width: 40 });

      expect(lines).toEqual(['args:-w 40|color:1', '# hi', '']);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('raises a RenderError with stderr on a non-zero exit', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'asc-glow-'));
    try {
      const command = writeScript(dir, 'echo "bad style" >&2; exit 4');
      const failure = await new GlowRenderer({ command }).render('x').catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(RenderError);
      if (failure instanceof RenderError) {
        expect(failure.message).toBe(`${command} exited with status 4: bad style`);
        expect(failure.status).toBe(4);
        expect(failure.fragmentIndex).toBe(-1);
      }
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('times out a hanging renderer', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'asc-glow-'));
    try {
      const command = writeScript(dir, 'exec sleep 5');
      await expect(new GlowRenderer({ command, timeoutMs: 50 }).render('x')).rejects.toThrow(
        `${command} timed out after 50ms`,
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports a command that cannot be started', async () => {
    await expect(new GlowRenderer({ command: 'asc-missing-glow' }).render('x')).rejects.toThrow(
      'Failed to execute asc-missing-glow: spawn asc-missing-glow ENOENT',
    );
  });
});
