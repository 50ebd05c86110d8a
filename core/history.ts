import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { getProviderAdapter } from '../providers/registry';
import { browseHistory, type BrowseResult } from '../tui/history-browser';
import { deleteConversation, formatConversationMarkdown, listConversations } from './conversation-store';
import { errorMessage } from './errors';
import { logger } from './logger';
import { runInteractiveProcess } from './process-runner';
import { buildGlowArgs, resolveRenderWidth, resolveStylePath } from './renderer';
import { checkRequiredCommands, runChatSession, type SessionOptions } from './session';
import { terminalColumns } from './terminal-ui';
import type { Conversation } from './types';

export type PagerKind = 'glow' | 'less';

export type HistoryDependencies = {
  listConversations: (dataDir: string) => Conversation[];
  deleteConversation: (dataDir: string, id: string) => void;
  browse: (input: {
    conversations: Conversation[];
    cursor: number;
    terminalWidth: number;
    onDelete: (conversation: Conversation) => boolean;
  }) => Promise<BrowseResult>;
  showConversation: (conversation: Conversation, pager: PagerKind) => Promise<void>;
  editMessage: (message: string) => Promise<string | null>;
  startSession: (message: string) => Promise<void>;
  columns: () => number;
};

function withTempFile<T>(name: string, contents: string, run: (filePath: string) => Promise<T>): Promise<T> {
  const dir = mkdtempSync(path.join(tmpdir(), 'asc-'));
  const filePath = path.join(dir, name);
  writeFileSync(filePath, contents, 'utf8');
  return run(filePath).finally(() => {
    rmSync(dir, { recursive: true, force: true });
  });
}

/** Pager arguments for viewing `filePath`. */
export function buildPagerArgs(
  pager: PagerKind,
  filePath: string,
  options: { width: number; stylePath?: string },
): string[] {
  if (pager === 'less') {
    return ['-SR', filePath];
  }
  return ['-p', ...buildGlowArgs(options), filePath];
}

/** Splits `$EDITOR` into a command and its leading arguments. */
export function parseEditorCommand(editor: string | undefined): string[] | null {
  const parts = (editor ?? '').trim().split(/\s+/).filter(Boolean);
  return parts.length > 0 ? parts : null;
}

function createDefaultDependencies(options: SessionOptions): HistoryDependencies {
  return {
    listConversations,
    deleteConversation,
    browse: browseHistory,
    showConversation: (conversation, pager) =>
      withTempFile(`${conversation.id}.md`, formatConversationMarkdown(conversation), async (filePath) => {
        const command = pager === 'glow' ? options.renderCommand : options.pagerCommand;
        const args = buildPagerArgs(pager, filePath, {
          width: resolveRenderWidth(terminalColumns(), options.widthMargin),
          stylePath: resolveStylePath(options.shareDir, options.stylePath),
        });
        const status = await runInteractiveProcess(command, args);
        if (status !== 0) {
          logger.warn('Pager exited with non-zero status', { command, status });
        }
      }),
    editMessage: async (message) => {
      const editor = parseEditorCommand(process.env.EDITOR);
      if (!editor) {
        logger.error('$EDITOR environment variable is not set');
        return null;
      }
      const [command, ...args] = editor;
      return withTempFile('message.md', message, async (filePath) => {
        const status = await runInteractiveProcess(command, [...args, filePath]);
        if (status !== 0) {
          logger.warn('Editor exited with non-zero status', { command, status });
        }
        return readFileSync(filePath, 'utf8').replace(/[\r\n]+$/, '');
      });
    },
    startSession: async (message) => {
      checkRequiredCommands(options, getProviderAdapter(options.provider));
      await runChatSession(options, message);
    },
    columns: terminalColumns,
  };
}

/**
 * Runs the history browser until the user quits. Pager views return to the
 * browser at the same row; an edit that produces text ends the browser and
 * starts a new chat session with it.
 */
export async function runHistoryBrowser(
  options: SessionOptions,
  overrides: Partial<HistoryDependencies> = {},
): Promise<void> {
  const deps: HistoryDependencies = { ...createDefaultDependencies(options), ...overrides };
  const onDelete = (conversation: Conversation): boolean => {
    try {
      deps.deleteConversation(options.dataDir, conversation.id);
      return true;
    } catch (error) {
      logger.error('Failed to delete conversation', { id: conversation.id, error: errorMessage(error) });
      return false;
    }
  };

  let cursor = 0;
  for (;;) {
    const conversations = deps.listConversations(options.dataDir);
    const result = await deps.browse({
      conversations,
      cursor,
      terminalWidth: deps.columns(),
      onDelete,
    });
    cursor = result.cursor;
    const { action } = result;

    if (action.type === 'quit') {
      return;
    }
    if (action.type === 'view') {
      try {
        await deps.showConversation(action.conversation, action.pager);
      } catch (error) {
        logger.error('Failed to view conversation', { id: action.conversation.id, error: errorMessage(error) });
      }
      continue;
    }
    if (action.type === 'edit') {
      let edited: string | null;
      try {
        edited = await deps.editMessage(action.conversation.message);
      } catch (error) {
        logger.error('Failed to edit message', { id: action.conversation.id, error: errorMessage(error) });
        continue;
      }
      if (edited === null || !edited.trim()) {
        continue;
      }
      await deps.startSession(edited);
      return;
    }
  }
}
