import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  deleteConversation,
  formatConversationMarkdown,
  listConversations,
  saveConversation,
} from '../../core/conversation-store';
import { PersistenceError } from '../../core/errors';

let dataDir: string;

beforeEach(() => {
  dataDir = mkdtempSync(path.join(tmpdir(), 'asc-store-'));
});

afterEach(() => {
  rmSync(dataDir, { recursive: true, force: true });
});

function conversationsPath(...parts: string[]): string {
  return path.join(dataDir, 'conversations', ...parts);
}

describe('saveConversation', () => {
  it('writes a JSON file named after the local timestamp', () => {
    const now = new Date(2024, 2, 5, 7, 8, 9);
    const saved = saveConversation(dataDir, { message: 'hi', response: 'hello' }, now);

    expect(saved.id).toBe('20240305070809');
    expect(saved.filePath).toBe(conversationsPath('20240305070809.json'));
    expect(JSON.parse(readFileSync(saved.filePath, 'utf8'))).toEqual({
      id: '20240305070809',
      timestamp: now.toISOString(),
      message: 'hi',
      response: 'hello',
      file_path: saved.filePath,
    });
  });

  it('keeps context only when present and suffixes colliding ids', () => {
    const now = new Date(2024, 2, 5, 7, 8, 9);
    saveConversation(dataDir, { message: 'a', response: 'b' }, now);
    const second = saveConversation(dataDir, { message: 'c', response: 'd', context: 'ctx' }, now);
    const third = saveConversation(dataDir, { message: 'e', response: 'f' }, now);

    expect(second.id).toBe('20240305070809-1');
    expect(third.id).toBe('20240305070809-2');
    expect(JSON.parse(readFileSync(second.filePath, 'utf8')).context).toBe('ctx');
  });

  it('raises a PersistenceError when the directory cannot be created', () => {
    const blocker = path.join(dataDir, 'file');
    writeFileSync(blocker, 'not a directory');

    expect(() => saveConversation(blocker, { message: 'a', response: 'b' })).toThrow(PersistenceError);
  });
});

describe('listConversations', () => {
  it('returns nothing when the directory is missing', () => {
    expect(listConversations(path.join(dataDir, 'missing'))).toEqual([]);
  });

  it('lists newest first and skips unreadable entries', () => {
    saveConversation(dataDir, { message: 'older', response: 'r1' }, new Date(2024, 0, 1, 10, 0, 0));
    saveConversation(dataDir, { message: 'newer', response: 'r2' }, new Date(2024, 0, 2, 10, 0, 0));
    writeFileSync(conversationsPath('broken.json'), '{not json');
    writeFileSync(conversationsPath('notes.txt'), 'ignored');
    mkdirSync(conversationsPath('nested.json'));

    const conversations = listConversations(dataDir);

    expect(conversations.map((conversation) => conversation.message)).toEqual(['newer', 'older']);
  });

  it('backfills a missing file_path', () => {
    const filePath = conversationsPath('20230101000000.json');
    mkdirSync(conversationsPath(), { recursive: true });
    writeFileSync(
      filePath,
      JSON.stringify({
        id: '20230101000000',
        timestamp: '2023-01-01T00:00:00.000Z',
        message: 'legacy',
        response: 'answer',
      }),
    );

    const [conversation] = listConversations(dataDir);

    expect(conversation?.filePath).toBe(filePath);
    expect(JSON.parse(readFileSync(filePath, 'utf8')).file_path).toBe(filePath);
  });
});

describe('deleteConversation', () => {
  it('removes the file', () => {
    const saved = saveConversation(dataDir, { message: 'bye', response: 'ok' });
    deleteConversation(dataDir, saved.id);

    expect(listConversations(dataDir)).toEqual([]);
  });

  it('rejects ids that escape the directory and missing files', () => {
    expect(() => deleteConversation(dataDir, '../outside')).toThrow('Invalid conversation id "../outside"');
    expect(() => deleteConversation(dataDir, 'missing')).toThrow(PersistenceError);
  });
});

describe('formatConversationMarkdown', () => {
  const base = {
    id: '20240101120000',
    timestamp: new Date(2024, 0, 1, 12, 0, 0),
    message: 'question',
    response: 'answer',
    filePath: '/tmp/x.json',
  };

  it('renders user and AI sections', () => {
    expect(formatConversationMarkdown(base)).toBe(
      '# Conversation 20240101120000\n\n## User\nquestion\n\n## AI\nanswer',
    );
  });

  it('includes the context section when present', () => {
    expect(formatConversationMarkdown({ ...base, context: 'ctx' })).toBe(
      '# Conversation 20240101120000\n\n## Context\nctx\n\n## User\nquestion\n\n## AI\nanswer',
    );
  });
});
