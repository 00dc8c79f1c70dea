import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException } from '@/lib/errors/error';

export type CliArgs = {
  outputDir?: string;
  clusters: string[];
  hosts: string[];
};

const VALUE_FLAGS = new Set(['--out', '--cluster', '--host']);

function invalidArgs(message: string, flag: string): AppErrorException {
  return new AppErrorException({
    code: ErrorCode.CONFIG_INVALID,
    category: 'config',
    message,
    retryable: false,
    redacted_context: { flag },
  });
}

/** `--out <dir>` (last wins), `--cluster <name>` and `--host <name>` (repeatable); `--flag=value` also works. */
export function parseCliArgs(argv: string[]): CliArgs {
  const out: CliArgs = { clusters: [], hosts: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
    if (!VALUE_FLAGS.has(flag)) throw invalidArgs(`unknown argument ${flag}`, flag);

    const value = (eq !== -1 && flag !== arg ? arg.slice(eq + 1) : argv[++i])?.trim();
    if (!value || (value.startsWith('--') && flag === arg)) throw invalidArgs(`${flag} requires a value`, flag);

    if (flag === '--out') out.outputDir = value;
    else if (flag === '--cluster') out.clusters.push(value);
    else out.hosts.push(value);
  }

  return out;
}
