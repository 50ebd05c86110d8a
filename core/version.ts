import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isRecord, safeJsonParse } from './json';

const FALLBACK_VERSION = 'dev';

export function readPackageVersion(packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url))): string {
  let text: string;
  try {
    text = readFileSync(packageJsonPath, 'utf8');
  } catch {
    return FALLBACK_VERSION;
  }
  const parsed = safeJsonParse(text);
  if (!isRecord(parsed) || typeof parsed.version !== 'string' || !parsed.version.trim()) {
    return FALLBACK_VERSION;
  }
  return parsed.version;
}
