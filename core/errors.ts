type AscErrorOptions = {
  cause?: unknown;
};

export class AscError extends Error {
  constructor(message: string, options: AscErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

/** The query process could not be started or ended before a clean exit. */
export class SourceError extends AscError {
  readonly command: string;
  readonly status: number | null;
  readonly fragmentCount: number;

  constructor(
    message: string,
    details: { command: string; status?: number | null; fragmentCount?: number; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.command = details.command;
    this.status = details.status ?? null;
    this.fragmentCount = details.fragmentCount ?? 0;
  }
}

/**
 * The markdown renderer failed. `fragmentIndex` is the 0-based fragment whose
 * render failed, or -1 when the render was not part of a stream.
 */
export class RenderError extends AscError {
  readonly fragmentIndex: number;
  readonly status: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    details: { fragmentIndex?: number; status?: number | null; stderr?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: details.cause });
    this.fragmentIndex = details.fragmentIndex ?? -1;
    this.status = details.status ?? null;
    this.stderr = details.stderr ?? '';
  }

  atFragment(fragmentIndex: number): RenderError {
    return new RenderError(`${this.message} (fragment ${fragmentIndex})`, {
      fragmentIndex,
      status: this.status,
      stderr: this.stderr,
      cause: this.cause,
    });
  }
}

export class PersistenceError extends AscError {
  readonly path: string;

  constructor(message: string, details: { path: string; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.path = details.path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
