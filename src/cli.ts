#!/usr/bin/env node
import { Command as CliCommand, InvalidArgumentError } from 'commander';
import logger from './utils/logger';
import { consoleReporter, type Reporter } from './utils/reporter';
import { loadConfig } from './config/configStore';
import { ConfigurationError, TransportDeliveryError } from './control/errors';
import { MAX_TIMEOUT_SECONDS } from './control/sessionLoop';
import { buildCommand, COMMAND_NAMES, COMMAND_TABLE } from './commands/commandTable';
import { runCommand, webSocketTransports, type TransportFactory } from './commands/runCommand';

export type CliOptions = {
  config?: string;
  timeout?: number;
  quiet?: boolean;
  fifo?: boolean;
  follow?: boolean;
};

export interface CliDependencies {
  reporter: Reporter;
  transports: TransportFactory;
  exit: (code: number) => void;
  signal?: AbortSignal;
}

export function parseTimeout(value: string): number {
  const seconds = Number(value);
  if (!value.trim() || !Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('timeout must be a positive number of seconds');
  }
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds`);
  }
  return seconds;
}

/**
 * Runs one command and returns the process exit code.
 * Configuration and fifo delivery failures are reported here; anything unexpected propagates.
 */
export async function execute(
  name: string,
  args: readonly string[],
  options: CliOptions,
  deps: CliDependencies,
): Promise<number> {
  try {
    const command = buildCommand(name, args);
    const config = loadConfig(options.config);
    logger.setConsoleLogLevel(config.logging.consoleLevel);
    if (config.logging.file) logger.addFileLog(config.logging.file);

    const result = await runCommand(command, {
      config,
      reporter: deps.reporter,
      timeout: options.timeout,
      quiet: options.quiet,
      follow: options.follow,
      fifo: options.fifo,
      transports: deps.transports,
      signal: deps.signal,
    });
    return result.exitCode;
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof TransportDeliveryError) {
      deps.reporter.error(error.message);
      return 1;
    }
    throw error;
  }
}

export function createCli(deps: CliDependencies): CliCommand {
  const program = new CliCommand();

  program
    .name('codctl')
    .description('Send commands to the disc player daemon and follow its state')
    .option('-c, --config <path>', 'config file (default: $CODCTL_CONFIG or /etc/codctl.json)')
    .option('-t, --timeout <seconds>', 'stop waiting for a response after this many seconds', parseTimeout)
    .option('-q, --quiet', 'do not print responses')
    .option('--fifo', 'send the command over the command fifo instead of RPC')
    .showHelpAfterError();

  for (const name of COMMAND_NAMES) {
    const spec = COMMAND_TABLE[name];
    const sub = program.command(name).description(spec.description);
    if (spec.argument) sub.argument(`[${spec.argument.name}]`, spec.argument.description);
    if (name === 'state') {
      sub.option('-f, --follow', 'keep printing state updates until the timeout or interrupt');
    }

    sub.action(async function (this: CliCommand) {
      const code = await execute(name, this.args, this.optsWithGlobals<CliOptions>(), deps);
      deps.exit(code);
    });
  }

  return program;
}

async function main(): Promise<void> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`[Main] Received ${signal}, stopping`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const program = createCli({
    reporter: consoleReporter,
    transports: webSocketTransports,
    exit: (code) => process.exit(code),
    signal: controller.signal,
  });
  await program.parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error(`[Main] Unexpected failure: ${error instanceof Error ? error.stack : String(error)}`);
    process.exit(70);
  });
}
