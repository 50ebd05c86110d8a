import { ChildProcess, spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import * as path from 'node:path';
import { errorMessage, SourceError } from './errors';
import { logger } from './logger';
import type { StreamResult } from './types';

type ChildChangeHandler = (child: ChildProcess | null) => void;

type StreamProcessArgs = {
  command: string;
  args: string[];
  formatCommandHint: (command: string) => string;
  onChildChange?: ChildChangeHandler;
};

type CaptureProcessArgs = {
  command: string;
  args: string[];
  input: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  onChildChange?: ChildChangeHandler;
};

export type CapturedProcessResult = StreamResult & {
  timedOut: boolean;
};

type ProcessExit = {
  status: number | null;
  signal: NodeJS.Signals | null;
  error: Error | null;
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function resolveCommandExecutable(command: string): string | null {
  if (!command) {
    return null;
  }

  const isWindows = process.platform === 'win32';
  const pathExtEntries = (process.env.PATHEXT ?? '.COM;.EXE;.BAT;.CMD')
    .split(';')
    .map((entry) => entry.toLowerCase())
    .filter(Boolean);

  const resolveWindowsBase = (basePath: string): string | null => {
    const ext = path.extname(basePath).toLowerCase();
    if (ext) {
      return existsSync(basePath) ? basePath : null;
    }
    for (const extension of pathExtEntries) {
      const withExt = `${basePath}${extension}`;
      if (existsSync(withExt)) {
        return withExt;
      }
    }
    return existsSync(basePath) ? basePath : null;
  };

  if (path.isAbsolute(command) || command.includes(path.sep)) {
    const absolute = path.isAbsolute(command) ? command : path.resolve(process.cwd(), command);
    return isWindows ? resolveWindowsBase(absolute) : existsSync(absolute) ? absolute : null;
  }

  const pathEntries = (process.env.PATH ?? '')
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter(Boolean);

  for (const dir of pathEntries) {
    const base = path.join(dir, command);
    if (isWindows) {
      const resolved = resolveWindowsBase(base);
      if (resolved) {
        return resolved;
      }
      continue;
    }
    if (existsSync(base)) {
      return base;
    }
  }

  return null;
}

/** Throws when `command` cannot be found on PATH. */
export function requireCommand(command: string, formatCommandHint: (command: string) => string): string {
  const resolved = resolveCommandExecutable(command);
  if (resolved) {
    logger.debug('Resolved command', { command, path: resolved });
    return resolved;
  }
  throw new Error(`Required command not found: "${command}". ${formatCommandHint(command)}.`);
}

export async function terminateChildProcess(child: ChildProcess): Promise<void> {
  const pid = child.pid;
  if (!pid || child.exitCode !== null) {
    return;
  }

  if (process.platform === 'win32') {
    await new Promise<void>((resolve) => {
      const killer = spawn('taskkill', ['/PID', String(pid), '/T', '/F'], {
        stdio: 'ignore',
      });
      killer.on('close', () => resolve());
      killer.on('error', (error) => {
        logger.debug('taskkill failed, falling back to kill()', { pid, error });
        child.kill();
        resolve();
      });
    });
    return;
  }

  if (!child.kill('SIGTERM')) {
    return;
  }

  await sleep(300);
  if (child.exitCode === null && child.signalCode === null) {
    child.kill('SIGKILL');
  }
}

function describeExit(command: string, exit: ProcessExit): string {
  if (exit.signal) {
    return `"${command}" was terminated by ${exit.signal}`;
  }
  return `"${command}" exited with status ${exit.status}`;
}

/**
 * Spawns `command` and yields its stdout line by line. The generator finishes
 * only after the process exits with status 0; any other outcome throws a
 * `SourceError`. Returning early terminates the process.
 */
export async function* streamProcessLines({
  command,
  args,
  formatCommandHint,
  onChildChange,
}: StreamProcessArgs): AsyncGenerator<string, void, undefined> {
  let child: ChildProcess;
  try {
    child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'inherit'],
    });
  } catch (error) {
    throw new SourceError(`Unable to spawn "${command}": ${errorMessage(error)}`, {
      command,
      cause: error,
    });
  }
  onChildChange?.(child);

  const queue: string[] = [];
  let stdoutBuffer = '';
  const outcome: { exit: ProcessExit | null } = { exit: null };
  let wake: (() => void) | null = null;
  let yielded = 0;

  const notify = () => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  child.stdout?.setEncoding('utf8');
  child.stdout?.on('data', (chunk: string) => {
    stdoutBuffer += chunk;
    const lines = stdoutBuffer.split(/\r?\n/);
    stdoutBuffer = lines.pop() ?? '';
    queue.push(...lines);
    notify();
  });
  child.stdout?.on('end', () => {
    if (stdoutBuffer.length > 0) {
      queue.push(stdoutBuffer);
    }
    stdoutBuffer = '';
    notify();
  });
  child.once('error', (error) => {
    outcome.exit ??= { status: null, signal: null, error };
    notify();
  });
  child.once('close', (status, signal) => {
    outcome.exit ??= { status, signal, error: null };
    notify();
  });

  try {
    while (true) {
      const line = queue.shift();
      if (line !== undefined) {
        yielded += 1;
        yield line;
        continue;
      }
      if (outcome.exit) {
        break;
      }
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  } finally {
    if (!outcome.exit) {
      await terminateChildProcess(child);
    }
    onChildChange?.(null);
  }

  const finished = outcome.exit;
  if (!finished) {
    return;
  }
  if (finished.error) {
    const code = 'code' in finished.error ? finished.error.code : undefined;
    const reason =
      code === 'ENOENT'
        ? `Unable to spawn "${command}". ${formatCommandHint(command)}.`
        : `Unable to spawn "${command}": ${finished.error.message}`;
    throw new SourceError(reason, { command, fragmentCount: yielded, cause: finished.error });
  }
  if (finished.status !== 0) {
    throw new SourceError(describeExit(command, finished), {
      command,
      status: finished.status,
      fragmentCount: yielded,
    });
  }
}

/** Runs `command` to completion with `input` on stdin and collects its output. */
export function runCapturedProcess({
  command,
  args,
  input,
  env,
  timeoutMs,
  onChildChange,
}: CaptureProcessArgs): Promise<CapturedProcessResult> {
  return new Promise((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        env: env ?? process.env,
      });
      onChildChange?.(child);
    } catch (error) {
      reject(error);
      return;
    }

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timedOut = false;
    const timer =
      timeoutMs && timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            void terminateChildProcess(child);
          }, timeoutMs)
        : null;

    const settle = () => {
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      onChildChange?.(null);
    };

    child.on('error', (error) => {
      if (settled) {
        return;
      }
      settle();
      reject(error);
    });

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('close', (status) => {
      if (settled) {
        return;
      }
      settle();
      resolve({ status, stdout, stderr, timedOut });
    });

    child.stdin?.on('error', (error) => {
      logger.debug('stdin closed early', { command, error });
    });
    child.stdin?.end(input);
  });
}

/** Hands the terminal to `command` and resolves with its exit status. */
export function runInteractiveProcess(command: string, args: string[]): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', (status) => resolve(status));
  });
}
