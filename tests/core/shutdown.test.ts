import { type ChildProcess, spawn } from 'node:child_process';
import { describe, expect, it } from 'vitest';
import { exitCodeForSignal, installSessionShutdownGuard } from '../../core/shutdown';

function waitForClose(child: ChildProcess): Promise<NodeJS.Signals | null> {
  return new Promise((resolve) => {
    child.once('close', (_status, signal) => resolve(signal));
  });
}

describe('exitCodeForSignal', () => {
  it('maps SIGINT to 130 and SIGTERM to 143', () => {
    expect(exitCodeForSignal('SIGINT')).toBe(130);
    expect(exitCodeForSignal('SIGTERM')).toBe(143);
  });
});

describe('installSessionShutdownGuard', () => {
  it('removes its signal handlers on finalize', async () => {
    const before = process.listenerCount('SIGINT');
    const guard = installSessionShutdownGuard({ exit: () => undefined, announce: () => undefined });
    expect(process.listenerCount('SIGINT')).toBe(before + 1);

    await guard.finalize();
    expect(process.listenerCount('SIGINT')).toBe(before);
  });

  it('terminates tracked children and exits with the signal code', async () => {
    const exits: number[] = [];
    const messages: string[] = [];
    let exited: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      exited = resolve;
    });
    const guard = installSessionShutdownGuard({
      exit: (code) => {
        exits.push(code);
        exited();
      },
      announce: (message) => messages.push(message),
    });
    const child = spawn('sleep', ['5'], { stdio: 'ignore' });
    const closed = waitForClose(child);
    try {
      guard.track('query', child);
      guard.onSignal('SIGINT');
      guard.onSignal('SIGINT');

      await done;
      expect(await closed).toBe('SIGTERM');
      expect(exits).toEqual([130]);
      expect(guard.isShuttingDown()).toBe(true);
      expect(messages).toHaveLength(2);
    } finally {
      await guard.finalize();
    }
  });
});
