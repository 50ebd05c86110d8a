import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import { errorMessage, PersistenceError } from './errors';
import { isRecord, safeJsonParse } from './json';
import { logger } from './logger';
import { conversationsDir } from './paths';
import { formatIdStamp } from './text';
import type { Conversation, NewConversation } from './types';

/** On-disk shape; `file_path` keeps the snake_case key older files use. */
type ConversationFile = {
  id: string;
  timestamp: string;
  message: string;
  response: string;
  file_path: string;
  context?: string;
};

function ensureDirectory(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function toFile(conversation: Conversation): ConversationFile {
  const file: ConversationFile = {
    id: conversation.id,
    timestamp: conversation.timestamp.toISOString(),
    message: conversation.message,
    response: conversation.response,
    file_path: conversation.filePath,
  };
  if (conversation.context) {
    file.context = conversation.context;
  }
  return file;
}

function serialize(conversation: Conversation): string {
  return JSON.stringify(toFile(conversation), null, 2);
}

function fromFile(input: unknown, filePath: string): Conversation | null {
  if (!isRecord(input)) {
    return null;
  }
  const { id, timestamp, message, response } = input;
  if (
    typeof id !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof message !== 'string' ||
    typeof response !== 'string'
  ) {
    return null;
  }
  const parsedTimestamp = new Date(timestamp);
  if (Number.isNaN(parsedTimestamp.getTime())) {
    return null;
  }
  const storedPath = typeof input.file_path === 'string' ? input.file_path : '';
  const context = typeof input.context === 'string' && input.context ? input.context : undefined;
  return {
    id,
    timestamp: parsedTimestamp,
    message,
    response,
    filePath: storedPath || filePath,
    ...(context ? { context } : {}),
  };
}

function nextConversationId(dir: string, now: Date): string {
  const base = formatIdStamp(now);
  let candidate = base;
  for (let suffix = 1; existsSync(path.join(dir, `${candidate}.json`)); suffix++) {
    candidate = `${base}-${suffix}`;
  }
  return candidate;
}

export function saveConversation(
  dataDir: string,
  record: NewConversation,
  now = new Date(),
): Conversation {
  const dir = conversationsDir(dataDir);
  try {
    ensureDirectory(dir);
  } catch (error) {
    throw new PersistenceError(`Failed to create conversations directory: ${errorMessage(error)}`, {
      path: dir,
      cause: error,
    });
  }

  const id = nextConversationId(dir, now);
  const filePath = path.join(dir, `${id}.json`);
  const conversation: Conversation = {
    id,
    timestamp: now,
    message: record.message,
    response: record.response,
    filePath,
    ...(record.context ? { context: record.context } : {}),
  };

  try {
    writeFileSync(filePath, serialize(conversation), 'utf8');
  } catch (error) {
    throw new PersistenceError(`Failed to save conversation: ${errorMessage(error)}`, {
      path: filePath,
      cause: error,
    });
  }
  logger.debug('Saved conversation', { id, path: filePath });
  return conversation;
}

/**
 * Every readable conversation, newest first. Files that cannot be read or
 * parsed are logged and skipped.
 */
export function listConversations(dataDir: string): Conversation[] {
  const dir = conversationsDir(dataDir);
  if (!existsSync(dir)) {
    return [];
  }

  const conversations: Conversation[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isFile() || !entry.name.endsWith('.json')) {
      continue;
    }
    const filePath = path.join(dir, entry.name);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf8');
    } catch (error) {
      logger.error('Failed to read conversation file', { file: entry.name, error });
      continue;
    }

    const parsed = safeJsonParse(raw);
    const conversation = fromFile(parsed, filePath);
    if (!conversation) {
      logger.error('Failed to parse conversation', { file: entry.name });
      continue;
    }

    if (isRecord(parsed) && typeof parsed.file_path !== 'string') {
      try {
        writeFileSync(filePath, serialize(conversation), 'utf8');
      } catch (error) {
        logger.error('Failed to save conversation with file path', { file: entry.name, error });
      }
    }
    conversations.push(conversation);
  }

  return conversations.sort((left, right) => right.timestamp.getTime() - left.timestamp.getTime());
}

export function deleteConversation(dataDir: string, id: string): void {
  const filePath = path.join(conversationsDir(dataDir), `${id}.json`);
  if (!id || path.basename(id) !== id) {
    throw new PersistenceError(`Invalid conversation id "${id}"`, { path: filePath });
  }
  try {
    rmSync(filePath);
  } catch (error) {
    throw new PersistenceError(`Failed to delete conversation file: ${errorMessage(error)}`, {
      path: filePath,
      cause: error,
    });
  }
  logger.debug('Deleted conversation', { id });
}

export function formatConversationMarkdown(conversation: Conversation): string {
  const sections = [`# Conversation ${conversation.id}`];
  if (conversation.context) {
    sections.push(`## Context\n${conversation.context}`);
  }
  sections.push(`## User\n${conversation.message}`, `## AI\n${conversation.response}`);
  return sections.join('\n\n');
}
