import { describe, expect, it } from 'vitest';
import { perplexityProvider } from '../../providers/perplexity';
import { DEFAULT_PROVIDER, getProviderAdapter, listProviderNames } from '../../providers/registry';
import { sgptProvider } from '../../providers/sgpt';

describe('provider registry', () => {
  it('lists providers sorted by name and defaults to sgpt', () => {
    expect(listProviderNames()).toEqual(['perplexity', 'sgpt']);
    expect(DEFAULT_PROVIDER).toBe('sgpt');
  });

  it('normalizes lookups', () => {
    expect(getProviderAdapter(' SGPT ')).toBe(sgptProvider);
    expect(getProviderAdapter('perplexity')).toBe(perplexityProvider);
  });

  it('rejects unknown providers', () => {
    expect(() => getProviderAdapter('bard')).toThrow(
      'Unsupported provider "bard". Supported providers: perplexity, sgpt',
    );
  });
});

describe('sgpt provider', () => {
  it('streams and forwards an optional model', () => {
    expect(sgptProvider.buildExecArgs('hi', { model: '' })).toEqual(['--stream', 'hi']);
    expect(sgptProvider.buildExecArgs('hi', { model: ' gpt-4o ' })).toEqual(['--stream', '--model', 'gpt-4o', 'hi']);
    expect(sgptProvider.acceptsContext).toBe(true);
  });
});

describe('perplexity provider', () => {
  it('requests citations and does not take context', () => {
    expect(perplexityProvider.buildExecArgs('hi', { model: '' })).toEqual(['-g', '--stream', '--citation', 'hi']);
    expect(perplexityProvider.acceptsContext).toBe(false);
    expect(perplexityProvider.formatCommandHint('pplx')).toContain('(tried "pplx")');
  });
});
