#!/usr/bin/env node
/**
 * Command-line entry: publish one PDF to a new linkpage.
 *
 * Exit codes: 0 when the run completed, 1 when it failed, 2 for usage or
 * configuration errors.
 */

import { ConfigError, FlowConfig, loadConfig, loadEnvFile } from './config';
import { FlowPhase } from './domain/run';
import { FlowOrchestrator } from './engine/orchestrator';
import { LogLevel, jsonLogHandler, logger, setLogHandler, setLogLevel, textLogHandler } from './logger';
import { createFileStore } from './storage/file-store';
import { ParsedArgs, USAGE, UsageError, parseArgs } from './cli/parse-args';

export const EXIT_COMPLETED = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export async function main(argv: string[] = process.argv): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (parsed.command === 'help') {
    console.log(USAGE);
    return EXIT_COMPLETED;
  }

  loadEnvFile();
  let config: FlowConfig;
  try {
    config = loadConfig(parsed.options, process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return EXIT_USAGE;
    }
    throw err;
  }

  setLogHandler(config.jsonLogs ? jsonLogHandler : textLogHandler);
  setLogLevel(config.verbose ? LogLevel.Debug : LogLevel.Info);

  const orchestrator = new FlowOrchestrator(createFileStore(config.outputDir), {
    credentials: config.credentials,
    environment: config.environment,
    timeoutMs: config.timeoutMs,
    policy: { maxAttempts: config.maxAttempts },
  });

  const run = await orchestrator.run({
    pdfPath: config.pdfPath,
    linkpageName: config.linkpageName,
    qrName: config.qrName,
    mediaFolder: config.mediaFolder,
    deleteAfter: config.deleteAfter,
    qrDownload: config.qrDownload,
  });

  return run.state === FlowPhase.Completed ? EXIT_COMPLETED : EXIT_FAILED;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error('Unexpected failure', { error: err instanceof Error ? err.stack ?? err.message : String(err) });
      process.exitCode = EXIT_FAILED;
    },
  );
}
