import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import { errorMessage, PersistenceError } from './errors';

export const CONTEXT_FILE_NAME = 'context.txt';

export function resolveContextPath(shareDir: string): string {
  return path.join(shareDir, CONTEXT_FILE_NAME);
}

export function loadContext(shareDir: string): string {
  const contextPath = resolveContextPath(shareDir);
  if (!existsSync(contextPath)) {
    return '';
  }
  try {
    return readFileSync(contextPath, 'utf8');
  } catch (error) {
    throw new PersistenceError(`Failed to read context file: ${errorMessage(error)}`, {
      path: contextPath,
      cause: error,
    });
  }
}

export function saveContext(shareDir: string, context: string): void {
  const contextPath = resolveContextPath(shareDir);
  try {
    mkdirSync(shareDir, { recursive: true });
    writeFileSync(contextPath, context, 'utf8');
  } catch (error) {
    throw new PersistenceError(`Failed to write context file: ${errorMessage(error)}`, {
      path: contextPath,
      cause: error,
    });
  }
}

export function clearContext(shareDir: string): void {
  const contextPath = resolveContextPath(shareDir);
  try {
    rmSync(contextPath, { force: true });
  } catch (error) {
    throw new PersistenceError(`Failed to remove context file: ${errorMessage(error)}`, {
      path: contextPath,
      cause: error,
    });
  }
}

/** Prepends the context under its own heading when there is one. */
export function buildPromptWithContext(message: string, context: string): string {
  if (!context.trim()) {
    return message;
  }
  return `# Context\n${context}\n\n# Question\n${message}`;
}
