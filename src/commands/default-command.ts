/**
 * `tsift` with no subcommand runs `tsift list`
 */

/** Options whose value is the next argument; that value is never a command name */
export const VALUE_OPTIONS: ReadonlySet<string> = new Set([
  '-c',
  '--config',
  '--db',
  '-w',
  '--where',
  '-n',
  '--limit',
  '-l',
  '--list',
  '--from-json',
]);

const ROOT_FLAGS = new Set(['--help', '-h', '--version', '-V']);

/**
 * First positional argument after the program name, skipping option values.
 * Nothing after `--` counts.
 */
export function firstPositional(args: readonly string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      return undefined;
    }
    if (arg.startsWith('-')) {
      if (VALUE_OPTIONS.has(arg)) {
        i++;
      }
      continue;
    }
    return arg;
  }
  return undefined;
}

/**
 * argv with `list` inserted after the script path, unless a known command
 * leads or root help/version was asked for.
 */
export function withDefaultCommand(
  argv: readonly string[],
  knownCommands: ReadonlySet<string>,
  defaultCommand: string = 'list'
): string[] {
  const [node, script, ...args] = argv;
  const first = firstPositional(args);
  if ((first !== undefined && knownCommands.has(first)) || args.some((arg) => ROOT_FLAGS.has(arg))) {
    return [...argv];
  }
  return [node, script, defaultCommand, ...args];
}
