import type { ChildProcess } from 'node:child_process';
import { existsSync } from 'node:fs';
import * as path from 'node:path';
import { errorMessage, RenderError } from './errors';
import { logger } from './logger';
import { type CapturedProcessResult, runCapturedProcess } from './process-runner';
import { formatShort } from './text';

export const STYLE_FILE_NAME = 'ggpt_glow_style.json';
export const DEFAULT_RENDER_TIMEOUT_MS = 30_000;
export const MIN_RENDER_WIDTH = 20;

export type RenderOptions = {
  width?: number;
  stylePath?: string;
};

/** Turns markdown into terminal lines. Implementations must be deterministic. */
export interface MarkdownRenderer {
  render(text: string, options?: RenderOptions): Promise<string[]>;
}

type GlowRendererOptions = {
  command?: string;
  timeoutMs?: number;
  onChildChange?: (child: ChildProcess | null) => void;
};

export function buildGlowArgs(options: RenderOptions = {}): string[] {
  const args: string[] = [];
  if (options.width !== undefined) {
    args.push('-w', String(options.width));
  }
  if (options.stylePath) {
    args.push('--style', options.stylePath);
  }
  return args;
}

/** Runs glow once per call with the markdown on stdin. */
export class GlowRenderer implements MarkdownRenderer {
  readonly command: string;
  private readonly timeoutMs: number;
  private readonly onChildChange?: (child: ChildProcess | null) => void;

  constructor({ command = 'glow', timeoutMs = DEFAULT_RENDER_TIMEOUT_MS, onChildChange }: GlowRendererOptions = {}) {
    this.command = command;
    this.timeoutMs = timeoutMs;
    this.onChildChange = onChildChange;
  }

  async render(text: string, options: RenderOptions = {}): Promise<string[]> {
    let result: CapturedProcessResult;
    try {
      result = await runCapturedProcess({
        command: this.command,
        args: buildGlowArgs(options),
        input: text,
        env: { ...process.env, CLICOLOR_FORCE: '1' },
        timeoutMs: this.timeoutMs,
        onChildChange: this.onChildChange,
      });
    } catch (error) {
      throw new RenderError(`Failed to execute ${this.command}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (result.timedOut) {
      throw new RenderError(`${this.command} timed out after ${this.timeoutMs}ms`, {
        status: result.status,
        stderr: result.stderr,
      });
    }
    if (result.status !== 0) {
      const detail = result.stderr.trim() ? `: ${formatShort(result.stderr, 200)}` : '';
      throw new RenderError(`${this.command} exited with status ${result.status}${detail}`, {
        status: result.status,
        stderr: result.stderr,
      });
    }
    return result.stdout.split('\n');
  }
}

/** Explicit style path, else the share-dir style file when it exists. */
export function resolveStylePath(shareDir: string, explicit?: string): string | undefined {
  if (explicit) {
    return explicit;
  }
  const candidate = path.join(shareDir, STYLE_FILE_NAME);
  if (existsSync(candidate)) {
    logger.debug('Using custom style', { path: candidate });
    return candidate;
  }
  return undefined;
}

export function resolveRenderWidth(columns: number | undefined, margin: number): number {
  const available = (columns && columns > 0 ? columns : 80) - margin;
  return Math.max(MIN_RENDER_WIDTH, available);
}
