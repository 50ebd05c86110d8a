import type { Tone } from './types';

export const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
  white: '\x1b[97m',
};

function stylingEnabled(stream: NodeJS.WriteStream): boolean {
  return Boolean(stream.isTTY) && !process.env.NO_COLOR;
}

export function colorize(text: string, ...codes: string[]): string {
  return colorizeFor(process.stdout, text, ...codes);
}

export function colorizeFor(stream: NodeJS.WriteStream, text: string, ...codes: string[]): string {
  if (!stylingEnabled(stream) || codes.length === 0) {
    return text;
  }
  return `${codes.join('')}${text}${ANSI.reset}`;
}

export function toneColor(tone: Tone): string {
  switch (tone) {
    case 'info':
      return ANSI.cyan;
    case 'success':
      return ANSI.green;
    case 'warn':
      return ANSI.yellow;
    case 'error':
      return ANSI.red;
    case 'muted':
      return ANSI.gray;
    case 'neutral':
    default:
      return ANSI.white;
  }
}

export function badge(text: string, tone: Tone, stream: NodeJS.WriteStream = process.stdout): string {
  return colorizeFor(stream, `[${text}]`, ANSI.bold, toneColor(tone));
}

/** Columns of the attached terminal, or 80 when stdout is not one. */
export function terminalColumns(): number {
  return process.stdout.columns ?? 80;
}
