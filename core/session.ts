import { getProviderAdapter } from '../providers/registry';
import type { ProviderAdapter } from '../providers/types';
import { buildPromptWithContext, loadContext } from './context-store';
import { saveConversation } from './conversation-store';
import { errorMessage, PersistenceError, RenderError, SourceError } from './errors';
import { logger } from './logger';
import { requireCommand, streamProcessLines } from './process-runner';
import { StreamReconciler } from './reconciler';
import { GlowRenderer, type MarkdownRenderer, resolveRenderWidth, resolveStylePath } from './renderer';
import { installSessionShutdownGuard, type SessionShutdownGuard } from './shutdown';
import { badge, terminalColumns } from './terminal-ui';
import type { CliOptions, Conversation, NewConversation } from './types';

export type ChatSessionDependencies = {
  renderer: MarkdownRenderer;
  openSource: (command: string, args: string[]) => AsyncIterable<string>;
  loadContext: (shareDir: string) => string;
  saveConversation: (dataDir: string, record: NewConversation) => Conversation;
  writeLine: (line: string) => void;
  columns: () => number;
};

export type ChatSessionResult = {
  conversation: Conversation;
  fragmentCount: number;
};

export type SessionOptions = Omit<CliOptions, 'command' | 'message' | 'contextAction' | 'contextText'>;

export function formatRendererHint(command: string): string {
  return `Install glow (https://github.com/charmbracelet/glow) or set renderCommand (tried "${command}")`;
}

/** Fails fast when the renderer or the provider command is missing. */
export function checkRequiredCommands(options: SessionOptions, provider: ProviderAdapter): void {
  requireCommand(options.renderCommand, formatRendererHint);
  requireCommand(options.queryCommand, provider.formatCommandHint);
}

function printSessionSummary(
  options: SessionOptions,
  provider: ProviderAdapter,
  width: number,
  stylePath?: string,
): void {
  const lines = [
    `${badge('PROVIDER', 'neutral', process.stderr)} ${provider.displayName} (${options.queryCommand})`,
    `${badge('RENDER', 'neutral', process.stderr)} ${options.renderCommand} width=${width} held=${options.heldOutLines}`,
    `${badge('STYLE', stylePath ? 'neutral' : 'muted', process.stderr)} ${stylePath ?? 'default'}`,
  ];
  if (options.model.trim()) {
    lines.push(`${badge('MODEL', 'neutral', process.stderr)} ${options.model.trim()}`);
  }
  process.stderr.write(`${lines.join('\n')}\n`);
}

function createDefaultDependencies(
  options: SessionOptions,
  provider: ProviderAdapter,
  guard: SessionShutdownGuard,
): ChatSessionDependencies {
  return {
    renderer: new GlowRenderer({
      command: options.renderCommand,
      timeoutMs: options.renderTimeoutMs,
      onChildChange: (child) => guard.track('render', child),
    }),
    openSource: (command, args) =>
      streamProcessLines({
        command,
        args,
        formatCommandHint: provider.formatCommandHint,
        onChildChange: (child) => guard.track('query', child),
      }),
    loadContext,
    saveConversation,
    writeLine: (line) => {
      process.stdout.write(`${line}\n`);
    },
    columns: terminalColumns,
  };
}

/**
 * Asks the provider, streams the rendered answer to the terminal and saves
 * the exchange. Nothing is saved when the source or the renderer fails.
 */
export async function runChatSession(
  options: SessionOptions,
  message: string,
  overrides: Partial<ChatSessionDependencies> = {},
): Promise<ChatSessionResult> {
  const provider = getProviderAdapter(options.provider);
  const guard = installSessionShutdownGuard();
  const deps: ChatSessionDependencies = {
    ...createDefaultDependencies(options, provider, guard),
    ...overrides,
  };

  try {
    const context = deps.loadContext(options.shareDir);
    const prompt = provider.acceptsContext ? buildPromptWithContext(message, context) : message;
    const width = resolveRenderWidth(deps.columns(), options.widthMargin);
    const stylePath = resolveStylePath(options.shareDir, options.stylePath);
    if (options.verbose) {
      printSessionSummary(options, provider, width, stylePath);
    }

    const reconciler = new StreamReconciler({
      renderer: deps.renderer,
      heldOutLines: options.heldOutLines,
      renderOptions: { width, stylePath },
      writeLine: deps.writeLine,
    });

    logger.debug('Starting new conversation', {
      provider: provider.name,
      command: options.queryCommand,
      contextChars: context.length,
    });

    const source = deps.openSource(options.queryCommand, provider.buildExecArgs(prompt, options));
    try {
      for await (const fragment of source) {
        await reconciler.onFragment(fragment);
      }
    } catch (error) {
      reconciler.fail();
      if (error instanceof RenderError || error instanceof SourceError) {
        throw error;
      }
      throw new SourceError(`Error reading ${options.queryCommand} output: ${errorMessage(error)}`, {
        command: options.queryCommand,
        fragmentCount: reconciler.fragmentCount,
        cause: error,
      });
    }

    const response = reconciler.onComplete();
    logger.debug('Stream completed', { fragments: reconciler.fragmentCount, chars: response.length });

    let conversation: Conversation;
    try {
      conversation = deps.saveConversation(options.dataDir, {
        message,
        response,
        context: context || undefined,
      });
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(`Failed to save conversation: ${errorMessage(error)}`, {
        path: options.dataDir,
        cause: error,
      });
    }
    return { conversation, fragmentCount: reconciler.fragmentCount };
  } finally {
    await guard.finalize();
  }
}
