import { existsSync, readFileSync } from 'node:fs';
import { parse as parseToml } from 'smol-toml';
import { isRecord } from './json';
import { resolveConfigPath } from './paths';

export type FileConfig = {
  provider?: string;
  command?: string;
  model?: string;
  heldOutLines?: number;
  widthMargin?: number;
  renderCommand?: string;
  renderTimeoutMs?: number;
  stylePath?: string;
  pagerCommand?: string;
  dataDir?: string;
};

export type LoadedConfig = {
  configPath: string;
  config: FileConfig;
};

function parseTomlFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }
  const raw = readFileSync(configPath, 'utf8').trim();
  if (!raw) {
    return {};
  }
  try {
    const parsed: unknown = parseToml(raw);
    if (!isRecord(parsed)) {
      throw new Error('Config root must be a TOML table');
    }
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config at ${configPath}: ${message}`);
  }
}

function parseString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value : undefined;
}

export function toPositiveInt(value: unknown): number | undefined {
  const numeric = typeof value === 'number' ? value : Number.parseInt(String(value ?? ''), 10);
  if (!Number.isInteger(numeric) || numeric <= 0) {
    return undefined;
  }
  return numeric;
}

export function toNonNegativeInt(value: unknown): number | undefined {
  const numeric = typeof value === 'number' ? value : Number.parseInt(String(value ?? ''), 10);
  if (!Number.isInteger(numeric) || numeric < 0) {
    return undefined;
  }
  return numeric;
}

export function normalizeConfigRecord(input: Record<string, unknown>): FileConfig {
  return {
    provider: parseString(input.provider)?.trim().toLowerCase(),
    command: parseString(input.command),
    model: parseString(input.model),
    heldOutLines: toPositiveInt(input.heldOutLines),
    widthMargin: toNonNegativeInt(input.widthMargin),
    renderCommand: parseString(input.renderCommand),
    renderTimeoutMs: toPositiveInt(input.renderTimeoutMs),
    stylePath: parseString(input.stylePath),
    pagerCommand: parseString(input.pagerCommand),
    dataDir: parseString(input.dataDir),
  };
}

export function loadAscConfig(configPath = resolveConfigPath()): LoadedConfig {
  return {
    configPath,
    config: normalizeConfigRecord(parseTomlFile(configPath)),
  };
}
