import { parseArgs } from './core/cli';
import { clearContext, loadContext, saveContext } from './core/context-store';
import { errorMessage } from './core/errors';
import { runHistoryBrowser } from './core/history';
import { logger, setLogLevel } from './core/logger';
import { checkRequiredCommands, runChatSession } from './core/session';
import { ANSI, badge, colorize } from './core/terminal-ui';
import type { CliOptions } from './core/types';
import { readPackageVersion } from './core/version';
import { getProviderAdapter } from './providers/registry';

function runContextCommand(options: CliOptions): void {
  if (options.contextAction === 'set') {
    saveContext(options.shareDir, options.contextText);
    console.log(`${badge('CONTEXT', 'success')} saved (${options.contextText.length} chars)`);
    return;
  }
  if (options.contextAction === 'clear') {
    clearContext(options.shareDir);
    console.log(`${badge('CONTEXT', 'success')} cleared`);
    return;
  }
  const context = loadContext(options.shareDir);
  if (!context.trim()) {
    console.log(`${badge('CONTEXT', 'muted')} ${colorize('no context set', ANSI.dim)}`);
    return;
  }
  console.log(`${badge('CONTEXT', 'info')}\n${context}`);
}

async function main(): Promise<void> {
  const options = parseArgs();
  if (options.debug) {
    setLogLevel('debug');
  }

  switch (options.command) {
    case 'version':
      console.log(`asc version ${readPackageVersion()}`);
      return;
    case 'context':
      runContextCommand(options);
      return;
    case 'view':
      await runHistoryBrowser(options);
      return;
    case 'new': {
      checkRequiredCommands(options, getProviderAdapter(options.provider));
      const { conversation } = await runChatSession(options, options.message);
      if (options.verbose) {
        process.stderr.write(`${badge('SAVED', 'success', process.stderr)} ${conversation.filePath}\n`);
      }
      return;
    }
  }
}

main().catch((error: unknown) => {
  logger.error(errorMessage(error));
  if (error instanceof Error && error.cause !== undefined) {
    logger.debug('Caused by', { cause: errorMessage(error.cause) });
  }
  process.exit(1);
});
