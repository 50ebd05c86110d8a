import type { ChildProcess } from 'node:child_process';

import { terminateChildProcess } from './process-runner';
import { badge } from './terminal-ui';

export type SessionShutdownGuard = {
  isShuttingDown: () => boolean;
  track: (slot: string, child: ChildProcess | null) => void;
  onSignal: (signal: NodeJS.Signals) => void;
  finalize: () => Promise<void>;
};

type ShutdownGuardOptions = {
  exit?: (code: number) => void;
  announce?: (message: string) => void;
};

export function exitCodeForSignal(signal: NodeJS.Signals): number {
  return signal === 'SIGINT' ? 130 : 143;
}

async function cleanupActiveChildren(activeChildren: Map<string, ChildProcess>): Promise<number> {
  if (activeChildren.size === 0) {
    return 0;
  }

  const count = activeChildren.size;
  await Promise.all([...activeChildren.values()].map((child) => terminateChildProcess(child)));
  activeChildren.clear();
  return count;
}

/**
 * Tracks the query and renderer processes of one session and terminates them
 * on SIGINT/SIGTERM before exiting.
 */
export function installSessionShutdownGuard({
  exit = (code) => process.exit(code),
  announce = (message) => process.stderr.write(`${message}\n`),
}: ShutdownGuardOptions = {}): SessionShutdownGuard {
  const activeChildren = new Map<string, ChildProcess>();
  let shuttingDown = false;

  const stop = async (signal: NodeJS.Signals) => {
    announce(`${badge('SHUTDOWN', 'warn', process.stderr)} received ${signal}, cleaning up...`);
    const terminated = await cleanupActiveChildren(activeChildren);
    if (terminated > 0) {
      announce(
        `${badge('CLEANUP', 'success', process.stderr)} terminated ${terminated} running child process(es).`,
      );
    }
    exit(exitCodeForSignal(signal));
  };

  const onSignal = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    void stop(signal);
  };

  const removeSignalHandlers = () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return {
    isShuttingDown: () => shuttingDown,
    track: (slot, child) => {
      if (child) {
        activeChildren.set(slot, child);
      } else {
        activeChildren.delete(slot);
      }
    },
    onSignal,
    finalize: async () => {
      await cleanupActiveChildren(activeChildren);
      removeSignalHandlers();
    },
  };
}
