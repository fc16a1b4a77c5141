/**
 * CLI entry logic, separated from process wiring for testing.
 * @module cli/main
 */

import { CommanderError } from 'commander';
import type { TokenProvider } from '../auth/provider.js';
import type { TextSink } from '../exporter/types.js';
import { ConsoleLogger, configureObservability, type LogSink } from '../observability/index.js';
import { createScanner } from '../scanner/scanner.js';
import { buildProgram, parseCliOptions, toScannerConfig } from './options.js';

/**
 * Process resources the CLI uses.
 */
export interface CliIo {
  /** Exported results */
  stdout: TextSink;
  /** Logs and errors */
  stderr: LogSink;
  env: NodeJS.ProcessEnv;
  /** Aborts the scan (SIGINT in the binary) */
  signal?: AbortSignal;
  /** Overrides credential lookup */
  tokenProvider?: TokenProvider;
}

/**
 * Runs the CLI and returns the process exit code: 0 when every image was
 * analyzed, 1 on partial failure, total failure, or a usage error.
 */
export async function runCli(argv: readonly string[], io: Partial<CliIo> = {}): Promise<number> {
  const stdout = io.stdout ?? process.stdout;
  const stderr = io.stderr ?? process.stderr;

  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        stdout.write(str);
      },
      writeErr: (str) => {
        stderr.write(str);
      },
    });

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  try {
    const config = toScannerConfig(parseCliOptions(program.opts()), io.env ?? process.env);

    const logger = new ConsoleLogger({ minLevel: config.debug ? 'debug' : 'info', sink: stderr });
    configureObservability({ logger, debug: config.debug });

    const scanner = await createScanner(config, {
      sink: stdout,
      logger,
      tokenProvider: io.tokenProvider,
    });
    const report = await scanner.scan(io.signal);

    if (report.error) {
      logger.error(report.error.message, { status: report.status });
    }
    return report.status === 'succeeded' ? 0 : 1;
  } catch (error) {
    stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
