import type { ProviderAdapter } from './types';

export const perplexityProvider: ProviderAdapter = {
  name: 'perplexity',
  displayName: 'Perplexity',
  defaults: {
    command: 'perplexity',
  },
  acceptsContext: false,
  buildExecArgs: (prompt, options) => {
    const args = ['-g', '--stream', '--citation'];
    if (options.model.trim()) {
      args.push('--model', options.model.trim());
    }
    args.push(prompt);
    return args;
  },
  formatCommandHint: (command) =>
    `Install a perplexity CLI on PATH or pass the executable with --command (tried "${command}")`,
};
