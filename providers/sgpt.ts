import type { ProviderAdapter } from './types';

export const sgptProvider: ProviderAdapter = {
  name: 'sgpt',
  displayName: 'ShellGPT',
  defaults: {
    command: 'sgpt',
  },
  acceptsContext: true,
  buildExecArgs: (prompt, options) => {
    const args = ['--stream'];
    if (options.model.trim()) {
      args.push('--model', options.model.trim());
    }
    args.push(prompt);
    return args;
  },
  formatCommandHint: (command) =>
    `Install ShellGPT (pip install shell-gpt) or pass the executable with --command (tried "${command}")`,
};
