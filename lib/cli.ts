import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { analyzeDelegation } from './analyzer';
import { CONFIG } from './config';
import { isInputError } from './errors';
import { isLogLevel, setLogLevel, type LogLevel } from './logger';
import { register } from './metrics';
import { formatReport, toJson } from './report';
import { createResolverAdapter } from './resolver';

export const VERSION = '1.0.0';

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDeps {
  io?: CliIO;
  analyze?: typeof analyzeDelegation;
  createResolver?: typeof createResolverAdapter;
  // Whether the terminal takes colour at all; --no-color still wins
  colorSupported?: boolean;
}

type CliOptions = {
  timeout: number;
  server?: string[];
  json?: boolean;
  color: boolean;
  metrics?: boolean;
  logLevel: string;
};

const processIO: CliIO = {
  out: (text) => { process.stdout.write(text); },
  err: (text) => { process.stderr.write(text); },
};

const LOG_LEVEL_CHOICES: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

/**
 * Run the CLI against `argv` (user arguments only, no node/script path).
 * Resolves to the process exit code: 0 when the check completed, whatever
 * the verdict; 1 on usage errors; 2 when the domain arguments are invalid.
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIO;
  const analyze = deps.analyze ?? analyzeDelegation;
  const createResolver = deps.createResolver ?? createResolverAdapter;
  const colorSupported = deps.colorSupported ?? chalk.supportsColor !== false;

  const program = new Command()
    .name('ns-delegation-check')
    .description('Check whether a subdomain delegation points at a Route 53 hosted zone that no longer exists.')
    .version(VERSION)
    .argument('<subdomain>', 'subdomain to check, e.g. dev.example.com')
    .argument('[parent]', 'parent domain (default: subdomain minus its first label)')
    .option('-t, --timeout <ms>', 'per-query timeout in milliseconds', parsePositiveInt, CONFIG.DNS_TIMEOUT_MS)
    .option('-s, --server <address...>', 'resolver addresses to use instead of the system configuration')
    .option('--json', 'print the report as JSON')
    .option('--no-color', 'disable coloured output')
    .option('--metrics', 'print Prometheus metrics after the report')
    .addOption(
      new Option('-l, --log-level <level>', 'log level for stderr diagnostics')
        .choices(LOG_LEVEL_CHOICES)
        .default(CONFIG.LOG_LEVEL),
    )
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.out(s),
      writeErr: (s) => io.err(s),
    })
    .action(async (subdomain: string, parent: string | undefined) => {
      const options = program.opts<CliOptions>();
      if (isLogLevel(options.logLevel)) setLogLevel(options.logLevel);

      const resolver = createResolver({
        timeoutMs: options.timeout,
        servers: options.server ?? CONFIG.DNS_SERVERS,
      });
      const report = await analyze(subdomain, parent, { resolver });

      if (options.json) {
        io.out(`${toJson(report)}\n`);
      } else {
        io.out(`${formatReport(report, { color: options.color && colorSupported }).join('\n')}\n`);
      }
      if (options.metrics) {
        io.out(await register.metrics());
      }
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (isInputError(err)) {
      io.err(`error: ${err.message}\n`);
      return 2;
    }
    throw err;
  }
}

export default run;
