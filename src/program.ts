import { Command } from 'commander';
import { cargoCommand } from './commands/cargo.js';
import { toForwardedArgv } from './utils/cli-parsing.js';
import { loadConfig } from './utils/config.js';
import { printError } from './utils/output-formatter.js';
import { RuntimeNotFoundError, WrapperError } from './utils/wrapper-error.js';

// The wrapper has no options of its own; it is configured through CARGO_BOX_*
// environment variables (see utils/config.ts).
export function createProgram(handler: (args: string[]) => Promise<void>): Command {
  const program = new Command();

  program
    .name('cargo-box')
    .description('Run cargo inside an ephemeral container, without a local Rust install')
    .argument('[args...]', 'Arguments forwarded verbatim to cargo')
    .helpOption(false)
    .action(async (args: string[]) => {
      await handler(args);
    });

  return program;
}

/**
 * Map a failure to an exit status, printing it unless the underlying tool
 * already reported it.
 */
export function reportFailure(error: unknown): number {
  if (error instanceof WrapperError) {
    if (!error.reported) printError(error.message);
    if (error instanceof RuntimeNotFoundError) {
      for (const line of error.setupInstructions) console.error(line);
    }
    return error.exitCode;
  }
  printError(error instanceof Error ? error.message : String(error));
  return 1;
}

export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let exitCode = 0;
  const program = createProgram(async (args) => {
    exitCode = await cargoCommand(loadConfig(env), args);
  });

  try {
    await program.parseAsync(toForwardedArgv(argv), { from: 'user' });
    return exitCode;
  } catch (error) {
    return reportFailure(error);
  }
}
