import { DEFAULT_PROVIDER, getProviderAdapter, listProviderNames } from '../providers/registry';
import { loadAscConfig } from './config';
import { defaultDataDir, expandHome, resolveShareDir } from './paths';
import { DEFAULT_HELD_OUT_LINE_COUNT } from './reconciler';
import { DEFAULT_RENDER_TIMEOUT_MS } from './renderer';
import type { CliCommand, CliOptions, ContextAction } from './types';

export const DEFAULT_WIDTH_MARGIN = 2;

type CliOverrides = {
  provider?: string;
  command?: string;
  model?: string;
  heldOutLines?: number;
  widthMargin?: number;
  renderTimeoutMs?: number;
  stylePath?: string;
  debug: boolean;
  verbose: boolean;
};

type ParsedArguments = {
  overrides: CliOverrides;
  positionals: string[];
};

const COMMAND_ALIASES = new Map<string, CliCommand>([
  ['new', 'new'],
  ['n', 'new'],
  ['view', 'view'],
  ['v', 'view'],
  ['context', 'context'],
  ['version', 'version'],
]);

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

function parseCliArguments(argv: string[]): ParsedArguments {
  const overrides: CliOverrides = {
    debug: false,
    verbose: false,
  };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (arg === '--provider') {
      overrides.provider = (argv[i + 1] ?? '').trim().toLowerCase();
      i += 1;
    } else if (arg === '--perplexity') {
      overrides.provider = 'perplexity';
    } else if (arg === '--command' || arg === '-c') {
      overrides.command = argv[i + 1];
      i += 1;
    } else if (arg === '--model' || arg === '-m') {
      overrides.model = argv[i + 1] ?? '';
      i += 1;
    } else if (arg === '--held-out') {
      overrides.heldOutLines = parsePositiveInt(argv[i + 1], DEFAULT_HELD_OUT_LINE_COUNT);
      i += 1;
    } else if (arg === '--width-margin') {
      overrides.widthMargin = parseNonNegativeInt(argv[i + 1], DEFAULT_WIDTH_MARGIN);
      i += 1;
    } else if (arg === '--render-timeout-ms') {
      overrides.renderTimeoutMs = parsePositiveInt(argv[i + 1], DEFAULT_RENDER_TIMEOUT_MS);
      i += 1;
    } else if (arg === '--style') {
      overrides.stylePath = argv[i + 1];
      i += 1;
    } else if (arg === '--debug' || arg === '-d') {
      overrides.debug = true;
    } else if (arg === '--verbose' || arg === '-v') {
      overrides.verbose = true;
    } else if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
    } else {
      throw new Error(`Unknown option "${arg}". Put -- before a message that starts with "-".`);
    }
  }

  return { overrides, positionals };
}

function parseContextAction(value: string | undefined): ContextAction {
  if (value === undefined || value === 'show') {
    return 'show';
  }
  if (value === 'set' || value === 'clear') {
    return value;
  }
  throw new Error(`Unknown context action "${value}". Use show, set or clear.`);
}

export function printUsage(): void {
  const providers = listProviderNames().join(', ');
  console.log(`Usage:
  asc [options] <command> [args]

Commands:
  new, n <message>           Ask a question and stream the rendered answer
  view, v                    Browse conversation history
  context [show|set|clear]   Show, set or clear the context prepended to questions
  version                    Print the version

Options:
      --provider <name>      Query provider. default: sgpt (supported: ${providers})
      --perplexity           Shortcut for --provider perplexity
  -m, --model <model>        Model override passed to the provider
  -c, --command <cmd>        Provider command. default: provider-specific
      --held-out <n>         Trailing rendered lines withheld while streaming. default: ${DEFAULT_HELD_OUT_LINE_COUNT}
      --width-margin <n>     Columns subtracted from the terminal width. default: ${DEFAULT_WIDTH_MARGIN}
      --render-timeout-ms <ms>
                             Per-render timeout. default: ${DEFAULT_RENDER_TIMEOUT_MS}
      --style <path>         glow style file. default: <share-dir>/ggpt_glow_style.json when present
  -d, --debug                Enable debug logging
  -v, --verbose              Print a session summary to stderr
  -h, --help                 Show this help message
      --                     End of options (for a message starting with "-")

Config:
  - ~/.asc/config.toml
  - Merge order: CLI > config file > defaults`);
}

export function parseArgs(argv = process.argv.slice(2)): CliOptions {
  if (argv.includes('--help') || argv.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const { overrides: cli, positionals } = parseCliArguments(argv);
  const [commandName, ...rest] = positionals;
  if (commandName === undefined) {
    printUsage();
    process.exit(1);
  }
  const command = COMMAND_ALIASES.get(commandName);
  if (!command) {
    throw new Error(`Unknown command "${commandName}". Run asc --help for usage.`);
  }

  const message = command === 'new' ? rest.join(' ').trim() : '';
  if (command === 'new' && !message) {
    throw new Error('Message is required');
  }
  const contextAction = command === 'context' ? parseContextAction(rest[0]) : 'show';
  const contextText = contextAction === 'set' ? rest.slice(1).join(' ') : '';
  if (command === 'context' && contextAction === 'set' && !contextText.trim()) {
    throw new Error('Context text is required');
  }

  const { config } = loadAscConfig();
  const providerName = cli.provider ?? config.provider ?? DEFAULT_PROVIDER;
  const provider = getProviderAdapter(providerName);
  const configCommandApplies = cli.provider === undefined || cli.provider === config.provider;

  const pick = <T>(...values: Array<T | undefined>): T | undefined => {
    for (const value of values) {
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  };

  const stylePath = pick(cli.stylePath, config.stylePath);
  const configCommand = configCommandApplies ? config.command : undefined;

  return {
    command,
    message,
    contextAction,
    contextText,
    provider: provider.name,
    queryCommand: pick(cli.command, configCommand) ?? provider.defaults.command,
    model: pick(cli.model, config.model) ?? '',
    heldOutLines: pick(cli.heldOutLines, config.heldOutLines) ?? DEFAULT_HELD_OUT_LINE_COUNT,
    widthMargin: pick(cli.widthMargin, config.widthMargin) ?? DEFAULT_WIDTH_MARGIN,
    renderCommand: config.renderCommand ?? 'glow',
    renderTimeoutMs: pick(cli.renderTimeoutMs, config.renderTimeoutMs) ?? DEFAULT_RENDER_TIMEOUT_MS,
    stylePath: stylePath ? expandHome(stylePath) : undefined,
    pagerCommand: config.pagerCommand ?? 'less',
    dataDir: expandHome(config.dataDir ?? defaultDataDir()),
    shareDir: resolveShareDir(),
    debug: cli.debug,
    verbose: cli.verbose,
  };
}
