import { perplexityProvider } from './perplexity';
import { sgptProvider } from './sgpt';
import type { ProviderAdapter } from './types';

export const DEFAULT_PROVIDER = sgptProvider.name;

const PROVIDERS: Record<string, ProviderAdapter> = {
  [sgptProvider.name]: sgptProvider,
  [perplexityProvider.name]: perplexityProvider,
};

export function listProviderNames(): string[] {
  return Object.keys(PROVIDERS).sort();
}

export function getProviderAdapter(name: string): ProviderAdapter {
  const normalized = name.trim().toLowerCase();
  const provider = PROVIDERS[normalized];
  if (!provider) {
    const supported = listProviderNames().join(', ');
    throw new Error(`Unsupported provider "${name}". Supported providers: ${supported}`);
  }
  return provider;
}
