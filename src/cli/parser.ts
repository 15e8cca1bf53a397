import { Level, parseLevel } from '../issues/issue';

export interface CliArgs {
  // Undefined means all namespaces
  namespace?: string | undefined;
  context?: string | undefined;
  overAllocs: boolean;
  level: Level;
  help: boolean;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

function toLevel(value: string | undefined): Level {
  const level = value === undefined ? undefined : parseLevel(value);
  if (level === undefined) {
    throw new CliError(`Invalid level "${value ?? ''}". Expected one of: ok, info, warn, error`);
  }
  return level;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    namespace: undefined,
    context: undefined,
    overAllocs: false,
    level: Level.Ok,
    help: false
  };

  const positionalArgs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];

    // Handle --context or -c
    if (arg === '--context' || arg === '-c') {
      result.context = args[i + 1];
      i += 2;
      continue;
    }

    // Handle --context=value
    if (arg?.startsWith('--context=')) {
      result.context = arg.split('=')[1];
      i++;
      continue;
    }

    // Handle --over-allocs or -o
    if (arg === '--over-allocs' || arg === '-o') {
      result.overAllocs = true;
      i++;
      continue;
    }

    // Handle --level or -l
    if (arg === '--level' || arg === '-l') {
      result.level = toLevel(args[i + 1]);
      i += 2;
      continue;
    }

    // Handle --level=value
    if (arg?.startsWith('--level=')) {
      result.level = toLevel(arg.split('=')[1]);
      i++;
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      result.help = true;
      i++;
      continue;
    }

    // Collect positional arguments
    if (arg && !arg.startsWith('-')) {
      positionalArgs.push(arg);
    }

    i++;
  }

  // First positional argument is the namespace
  if (positionalArgs.length > 0) {
    result.namespace = positionalArgs[0];
  }

  return result;
}

export const USAGE = `Usage: workload-sanitizer [namespace] [options]

Options:
  -c, --context <name>   kubeconfig context to use
  -o, --over-allocs      compare current usage against requested resources
  -l, --level <level>    lowest level to report: ok, info, warn, error (default ok)
  -h, --help             show this help`;
