import { Box, render, Text, useApp, useInput } from 'ink';
import React, { useState } from 'react';
import type { Conversation } from '../core/types';
import {
  buildConversationRow,
  calculateColumnWidths,
  formatTableLine,
  TABLE_HEIGHT,
  visibleWindowStart,
} from './columns';

const SELECTED_FOREGROUND = 'ansi256(229)';
const SELECTED_BACKGROUND = 'ansi256(57)';
const BORDER_COLOR = 'ansi256(240)';

const HELP_LINES = [
  'Keybindings:',
  '  v: View conversation with glow',
  '  V: View conversation with less',
  '  e: Edit conversation',
  '  d: Delete conversation',
  '  q: Quit',
];

export type HistoryInputKey = {
  upArrow?: boolean;
  downArrow?: boolean;
  pageUp?: boolean;
  pageDown?: boolean;
  return?: boolean;
  escape?: boolean;
  ctrl?: boolean;
};

export type HistoryBrowserState = {
  conversations: Conversation[];
  cursor: number;
  confirmDeleteId: string | null;
};

export type HistoryAction =
  | { type: 'quit' }
  | { type: 'view'; conversation: Conversation; pager: 'glow' | 'less' }
  | { type: 'edit'; conversation: Conversation }
  | { type: 'delete'; conversation: Conversation };

export type HistoryTransition = {
  state: HistoryBrowserState;
  action: HistoryAction | null;
};

export type BrowseResult = {
  action: HistoryAction;
  cursor: number;
};

function clampCursor(cursor: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  return Math.max(0, Math.min(total - 1, cursor));
}

export function buildInitialHistoryState(
  conversations: Conversation[],
  cursor = 0,
): HistoryBrowserState {
  return {
    conversations,
    cursor: clampCursor(cursor, conversations.length),
    confirmDeleteId: null,
  };
}

function withCursorDelta(state: HistoryBrowserState, delta: number): HistoryBrowserState {
  const cursor = clampCursor(state.cursor + delta, state.conversations.length);
  return cursor === state.cursor ? state : { ...state, cursor };
}

function transitionConfirm(
  state: HistoryBrowserState,
  input: string,
  key: HistoryInputKey,
): HistoryTransition {
  if (key.escape || input === 'q' || input === 'n') {
    return { state: { ...state, confirmDeleteId: null }, action: null };
  }
  if (key.return || input === 'v') {
    const conversation = state.conversations.find((entry) => entry.id === state.confirmDeleteId);
    if (!conversation) {
      return { state: { ...state, confirmDeleteId: null }, action: null };
    }
    return { state, action: { type: 'delete', conversation } };
  }
  return { state, action: null };
}

/**
 * Pure key handling for the browser. Actions that need the terminal or the
 * filesystem are returned for the caller to perform.
 */
export function transitionHistoryState(
  state: HistoryBrowserState,
  input: string,
  key: HistoryInputKey,
): HistoryTransition {
  if (state.confirmDeleteId !== null) {
    return transitionConfirm(state, input, key);
  }

  if (key.escape || input === 'q') {
    return { state, action: { type: 'quit' } };
  }
  if (key.upArrow || input === 'k') {
    return { state: withCursorDelta(state, -1), action: null };
  }
  if (key.downArrow || input === 'j') {
    return { state: withCursorDelta(state, 1), action: null };
  }
  if (key.pageUp) {
    return { state: withCursorDelta(state, -TABLE_HEIGHT), action: null };
  }
  if (key.pageDown) {
    return { state: withCursorDelta(state, TABLE_HEIGHT), action: null };
  }

  const selected = state.conversations[state.cursor];
  if (!selected) {
    return { state, action: null };
  }
  if (key.return || input === 'v') {
    return { state, action: { type: 'view', conversation: selected, pager: 'glow' } };
  }
  if (input === 'V') {
    return { state, action: { type: 'view', conversation: selected, pager: 'less' } };
  }
  if (input === 'e') {
    return { state, action: { type: 'edit', conversation: selected } };
  }
  if (input === 'd') {
    return { state: { ...state, confirmDeleteId: selected.id }, action: null };
  }
  return { state, action: null };
}

export function removeConversation(state: HistoryBrowserState, id: string): HistoryBrowserState {
  const conversations = state.conversations.filter((entry) => entry.id !== id);
  return {
    conversations,
    cursor: clampCursor(state.cursor, conversations.length),
    confirmDeleteId: null,
  };
}

type HistoryBrowserProps = {
  initialState: HistoryBrowserState;
  terminalWidth: number;
  onDelete: (conversation: Conversation) => boolean;
  onExit: (result: BrowseResult) => void;
};

function ConfirmDelete({ id }: { id: string }): React.JSX.Element {
  return (
    <Box borderStyle="round" borderColor={BORDER_COLOR} paddingX={2} paddingY={1} flexDirection="column">
      <Text>{`Delete conversation ${id}?`}</Text>
      <Text> </Text>
      <Text>Press Enter to confirm, 'n' to cancel</Text>
    </Box>
  );
}

export function HistoryBrowser({
  initialState,
  terminalWidth,
  onDelete,
  onExit,
}: HistoryBrowserProps): React.JSX.Element {
  const { exit } = useApp();
  const [state, setState] = useState(initialState);
  const widths = calculateColumnWidths(terminalWidth);

  useInput((input, key) => {
    const { state: next, action } = transitionHistoryState(state, input, key);
    if (!action) {
      setState(next);
      return;
    }
    if (action.type === 'delete') {
      const deleted = onDelete(action.conversation);
      setState(deleted ? removeConversation(next, action.conversation.id) : { ...next, confirmDeleteId: null });
      return;
    }
    setState(next);
    onExit({ action, cursor: next.cursor });
    exit();
  });

  if (state.confirmDeleteId !== null) {
    return <ConfirmDelete id={state.confirmDeleteId} />;
  }

  const header = formatTableLine(['ID', 'Date', 'Message'], widths);
  const start = visibleWindowStart(state.conversations.length, state.cursor);
  const visible = state.conversations.slice(start, start + TABLE_HEIGHT);

  return (
    <Box flexDirection="column">
      <Text bold>{header}</Text>
      <Text color={BORDER_COLOR}>{'-'.repeat(header.length)}</Text>
      {visible.length === 0 ? <Text dimColor>No conversations yet.</Text> : null}
      {visible.map((conversation, offset) => {
        const line = formatTableLine(buildConversationRow(conversation, widths), widths);
        return start + offset === state.cursor ? (
          <Text key={conversation.id} color={SELECTED_FOREGROUND} backgroundColor={SELECTED_BACKGROUND}>
            {line}
          </Text>
        ) : (
          <Text key={conversation.id}>{line}</Text>
        );
      })}
      <Box borderStyle="round" borderColor={BORDER_COLOR} paddingX={2} paddingY={1} flexDirection="column">
        {HELP_LINES.map((line) => (
          <Text key={line}>{line}</Text>
        ))}
      </Box>
    </Box>
  );
}

type BrowseOptions = {
  conversations: Conversation[];
  cursor: number;
  terminalWidth: number;
  onDelete: (conversation: Conversation) => boolean;
};

/** Mounts the browser and resolves with the action that closed it. */
export async function browseHistory({
  conversations,
  cursor,
  terminalWidth,
  onDelete,
}: BrowseOptions): Promise<BrowseResult> {
  let result: BrowseResult = { action: { type: 'quit' }, cursor };
  const instance = render(
    <HistoryBrowser
      initialState={buildInitialHistoryState(conversations, cursor)}
      terminalWidth={terminalWidth}
      onDelete={onDelete}
      onExit={(next) => {
        result = next;
      }}
    />,
  );
  await instance.waitUntilExit();
  return result;
}
