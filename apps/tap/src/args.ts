export type CliCommand = 'sync' | 'discover' | 'about' | 'help';

export interface CliArgs {
  command: CliCommand;
  configPath?: string;
  catalogPath?: string;
  statePath?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `
Usage:
  tap-nomad [--config config.json] --discover
  tap-nomad [--config config.json] [--catalog catalog.json] [--state state.json]
  tap-nomad --about

Options:
  -c, --config <file>      Connection and sync settings (JSON)
  -d, --discover           Print the catalog of available streams and exit
      --catalog <file>     Streams to sync (discovery output with selections)
      --properties <file>  Alias of --catalog
  -s, --state <file>       State from a previous run to resume from
      --about              Print tap capabilities
  -h, --help               Show this help

Environment:
  NOMAD_ADDR, NOMAD_TOKEN, NOMAD_NAMESPACE, NOMAD_REGION fill settings the config omits.
  LOG_LEVEL sets log verbosity. Logs go to stderr; stdout carries the message stream.
`;

const VALUE_FLAGS: Readonly<Record<string, 'configPath' | 'catalogPath' | 'statePath'>> = {
  '--config': 'configPath',
  '-c': 'configPath',
  '--catalog': 'catalogPath',
  '--properties': 'catalogPath',
  '--state': 'statePath',
  '-s': 'statePath',
};

/**
 * @throws UsageError on unknown flags, missing values or conflicting modes
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { command: 'sync' };
  const modes = new Set<CliCommand>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    let flag = arg;
    let inlineValue: string | undefined;
    const equals = arg.indexOf('=');
    if (arg.startsWith('--') && equals > 0) {
      flag = arg.slice(0, equals);
      inlineValue = arg.slice(equals + 1);
    }

    const target = VALUE_FLAGS[flag];
    if (target !== undefined) {
      const value = inlineValue ?? argv[++i];
      if (value === undefined || value === '' || (inlineValue === undefined && value.startsWith('-'))) {
        throw new UsageError(`Option ${flag} needs a file path`);
      }
      if (args[target] !== undefined) {
        throw new UsageError(`Option ${flag} given more than once`);
      }
      args[target] = value;
      continue;
    }

    switch (flag) {
      case '--discover':
      case '-d':
        modes.add('discover');
        break;
      case '--about':
        modes.add('about');
        break;
      case '--help':
      case '-h':
        modes.add('help');
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (modes.has('help')) {
    return { command: 'help' };
  }
  if (modes.size > 1) {
    throw new UsageError('--discover and --about cannot be combined');
  }
  const [mode] = modes;
  if (mode !== undefined) {
    args.command = mode;
  }
  if (args.command === 'discover' && (args.catalogPath !== undefined || args.statePath !== undefined)) {
    throw new UsageError('--discover does not take --catalog or --state');
  }
  return args;
}
