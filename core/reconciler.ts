import { errorMessage, RenderError } from './errors';
import type { MarkdownRenderer, RenderOptions } from './renderer';

export const DEFAULT_HELD_OUT_LINE_COUNT = 4;

export type ReconcilerState = 'idle' | 'streaming' | 'completed' | 'failed';

export type EmitRange = {
  start: number;
  end: number;
};

type StreamReconcilerOptions = {
  renderer: MarkdownRenderer;
  heldOutLines?: number;
  renderOptions?: RenderOptions;
  writeLine?: (line: string) => void;
};

/**
 * Lines between the previous and the current withheld window. The range is
 * empty when `end <= start`.
 */
export function computeEmitRange(
  previousLength: number,
  currentLength: number,
  heldOutLines: number,
): EmitRange {
  return {
    start: Math.max(0, previousLength - heldOutLines),
    end: currentLength - heldOutLines,
  };
}

function sameLines(left: readonly string[], right: readonly string[]): boolean {
  if (left.length !== right.length) {
    return false;
  }
  return left.every((line, index) => line === right[index]);
}

function trimTrailingNewlines(text: string): string {
  return text.replace(/[\r\n]+$/, '');
}

const writeStdoutLine = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

/**
 * Re-renders the accumulated stream on every fragment and prints only the
 * lines that moved out of the trailing withheld window. The tail is printed
 * by `onComplete`.
 */
export class StreamReconciler {
  private readonly renderer: MarkdownRenderer;
  private readonly heldOutLines: number;
  private readonly renderOptions: RenderOptions;
  private readonly writeLine: (line: string) => void;
  private accumulator = '';
  private renderState: string[] = [];
  private fragments = 0;
  private current: ReconcilerState = 'idle';

  constructor({
    renderer,
    heldOutLines = DEFAULT_HELD_OUT_LINE_COUNT,
    renderOptions = {},
    writeLine = writeStdoutLine,
  }: StreamReconcilerOptions) {
    if (!Number.isInteger(heldOutLines) || heldOutLines <= 0) {
      throw new RangeError(`heldOutLines must be a positive integer, got ${heldOutLines}`);
    }
    this.renderer = renderer;
    this.heldOutLines = heldOutLines;
    this.renderOptions = renderOptions;
    this.writeLine = writeLine;
  }

  get state(): ReconcilerState {
    return this.current;
  }

  get fragmentCount(): number {
    return this.fragments;
  }

  get renderedLines(): readonly string[] {
    return this.renderState;
  }

  async onFragment(fragment: string): Promise<string[]> {
    this.assertOpen('onFragment');
    const fragmentIndex = this.fragments;
    this.current = 'streaming';
    this.fragments += 1;
    this.accumulator += `${fragment}\n`;

    let lines: string[];
    try {
      lines = await this.renderer.render(this.accumulator, this.renderOptions);
    } catch (error) {
      this.current = 'failed';
      if (error instanceof RenderError) {
        throw error.atFragment(fragmentIndex);
      }
      throw new RenderError(`Renderer failed: ${errorMessage(error)} (fragment ${fragmentIndex})`, {
        fragmentIndex,
        cause: error,
      });
    }

    if (sameLines(lines, this.renderState)) {
      return [];
    }

    const { start, end } = computeEmitRange(this.renderState.length, lines.length, this.heldOutLines);
    const emitted = lines.slice(start, Math.max(start, end));
    for (const line of emitted) {
      this.writeLine(line);
    }
    this.renderState = lines;
    return emitted;
  }

  /** Flushes the withheld tail and returns the accumulated text. */
  onComplete(): string {
    this.assertOpen('onComplete');
    const start = Math.max(0, this.renderState.length - this.heldOutLines);
    for (const line of this.renderState.slice(start)) {
      this.writeLine(line);
    }
    this.current = 'completed';
    const result = trimTrailingNewlines(this.accumulator);
    this.accumulator = '';
    return result;
  }

  /** Marks the session failed; the withheld tail is dropped. */
  fail(): void {
    if (this.current === 'completed') {
      return;
    }
    this.current = 'failed';
    this.accumulator = '';
  }

  private assertOpen(operation: string): void {
    if (this.current === 'completed' || this.current === 'failed') {
      throw new Error(`Cannot call ${operation} on a ${this.current} reconciler`);
    }
  }
}
