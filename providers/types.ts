import type { CliOptions } from '../core/types';

export type ProviderDefaults = {
  command: string;
};

export type ProviderAdapter = {
  name: string;
  displayName: string;
  defaults: ProviderDefaults;
  /** Whether the saved context is prepended to the question. */
  acceptsContext: boolean;
  buildExecArgs: (prompt: string, options: Pick<CliOptions, 'model'>) => string[];
  formatCommandHint: (command: string) => string;
};
