import { describe, expect, it } from 'vitest';
import { formatLogFields, logger, setLogLevel } from '../../core/logger';

describe('formatLogFields', () => {
  it('prints key=value pairs in insertion order', () => {
    expect(formatLogFields({ id: '20240101', count: 3, ok: true })).toBe('id=20240101 count=3 ok=true');
  });

  it('quotes strings that would be ambiguous', () => {
    expect(formatLogFields({ file: 'my notes.json', empty: '', eq: 'a=b' })).toBe(
      'file="my notes.json" empty="" eq="a=b"',
    );
  });

  it('prints errors as their message and nested values as JSON', () => {
    expect(formatLogFields({ error: new Error('disk full'), meta: { a: 1 } })).toBe(
      'error="disk full" meta={"a":1}',
    );
  });

  it('skips the fields winston adds itself', () => {
    expect(formatLogFields({ level: 'info', message: 'x', timestamp: 't', id: 'a' })).toBe('id=a');
  });
});

describe('setLogLevel', () => {
  it('changes the logger level', () => {
    const previous = logger.level;
    try {
      setLogLevel('debug');
      expect(logger.level).toBe('debug');
    } finally {
      logger.level = previous;
    }
  });
});
