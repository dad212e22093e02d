#!/usr/bin/env node
/**
 * evidence-loop command entry point
 */

import { homedir } from 'os';
import packageJson from '../../package.json';
import { SystemClock } from '../types/clock';
import { ExitCode } from '../types/exit-codes';
import { errorMessage } from '../types/errors';
import { RealFileSystem } from '../io/real-file-system';
import { createRealProcessRunner } from '../llm/real-process-runner';
import { createInquirerPrompter } from '../ui/inquirer-prompter';
import { createSpinnerService } from '../ui/spinner-service';
import { runCli } from './run';

async function main(): Promise<number> {
  const controller = new AbortController();
  const processRunner = createRealProcessRunner();

  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      // Second Ctrl+C: stop waiting for the current stage
      processRunner.killAll('SIGKILL');
      process.exit(ExitCode.HUMAN_REVIEW);
    }
    console.error('\nInterrupted; finishing the current stage before handing off...');
    controller.abort();
    processRunner.killAll('SIGTERM');
  };
  process.on('SIGINT', onInterrupt);

  try {
    return await runCli(process.argv, {
      fs: new RealFileSystem(),
      clock: new SystemClock(),
      env: process.env,
      homeDirectory: homedir(),
      workingDirectory: process.cwd(),
      processRunner,
      prompter: createInquirerPrompter({ interactive: !process.argv.includes('--no-interactive') }),
      stdout: (text) => console.log(text),
      stderr: (text) => console.error(text),
      version: packageJson.version,
      signal: controller.signal,
      createProgress: (config) =>
        createSpinnerService({
          quiet: config.verbosity.quiet || config.verbosity.jsonOutput,
          verbose: config.verbosity.verbose || config.verbosity.debug,
        }),
    });
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Fatal error: ${errorMessage(error)}`);
    process.exitCode = ExitCode.UNEXPECTED_ERROR;
  });
