/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createRunCommand, executeRun } from './commands/run.js';
import { createPlanCommand } from './commands/plan.js';
import { addPipelineOptions, type PipelineCommandOptions } from './commands/options.js';
import { createLogger, setLogger } from '../core/logger.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Build, test, and benchmark a Rust crate for CI')
    .enablePositionalOptions()
    .hook('preAction', (thisCommand, actionCommand) => {
      if (thisCommand.opts().verbose === true || actionCommand.opts().verbose === true) {
        setLogger(createLogger(NAME, true));
      }
    });

  program.addCommand(createRunCommand());
  program.addCommand(createPlanCommand());

  // Default action: `cargo-ci --release` is `cargo-ci run --release`
  program
    .argument('[profile]', 'Build profile (shortcut for `cargo-ci run`)')
    .allowUnknownOption();
  addPipelineOptions(program);
  program.action(async (profile: string | undefined, options: PipelineCommandOptions) => {
    await executeRun(profile, options);
  });

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    reportFatal(error);
    process.exit(1);
  }
}

export function reportFatal(error: unknown, debug: boolean = Boolean(process.env.DEBUG)): void {
  if (error instanceof Error) {
    console.error(`\n❌ ${error.message}\n`);
    if (debug) {
      console.error(error.stack);
    }
    return;
  }
  console.error(`\n❌ ${String(error)}\n`);
}
