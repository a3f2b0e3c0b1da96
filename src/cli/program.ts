/**
 * Command-line program: `cloud-sweep audit` and `cloud-sweep cleanup`.
 */

import { Command, CommanderError } from 'commander';
import { errorMessage } from '@shared/errors';
import { runAudit } from './commands/audit';
import { runCleanup } from './commands/cleanup';
import { defaultDependencies, EXIT_ERROR } from './shared';
import type { CliDependencies } from './shared';

export function buildProgram(
  dependencies: CliDependencies,
  setExitCode: (code: number) => void
): Command {
  const { io } = dependencies;
  const program = new Command();

  program
    .name('cloud-sweep')
    .description('Audit unused cloud resources and delete them behind safety gates')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  const guarded =
    (command: (flags: unknown, dependencies: CliDependencies) => Promise<number>) =>
    async (flags: unknown): Promise<void> => {
      try {
        setExitCode(await command(flags, dependencies));
      } catch (error) {
        io.err(`Error: ${errorMessage(error)}`);
        setExitCode(EXIT_ERROR);
      }
    };

  program
    .command('audit')
    .description('Scan regions, classify every resource and write CSV reports (read-only)')
    .option('--config <file>', 'YAML configuration file')
    .option('--ssm-parameter <name>', 'SSM parameter holding the YAML configuration')
    .option('--regions <list>', 'comma-separated regions (default: all enabled regions)')
    .option('--kinds <list>', 'comma-separated resource kinds (default: all)')
    .option('--output <dir>', 'directory for the report set')
    .action(guarded(runAudit));

  program
    .command('cleanup')
    .description('Delete the DELETE rows of audit reports (dry-run unless --interactive or --execute)')
    .requiredOption('--report <files...>', 'report CSV file(s) to act on')
    .option('--dry-run', 'simulate every deletion (default)')
    .option('--interactive', 'delete, confirming each resource')
    .option('--execute', 'delete without per-resource confirmation')
    .option('--backup-before-delete', 'back up each resource and confirm the backup before deleting')
    .option('--protect-tags <list>', 'comma-separated Key=Value or Key patterns that block deletion')
    .option('--min-age-days <n>', 'minimum age in days for every kind')
    .option('--max-resources <n>', 'stop after this many resources')
    .option('--log-dir <dir>', 'directory for session logs')
    .option('--config <file>', 'YAML configuration file')
    .option('--ssm-parameter <name>', 'SSM parameter holding the YAML configuration')
    .option('--yes', 'skip the one-time confirmation of --execute')
    .action(guarded(runCleanup));

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the command.
 *
 * @returns The process exit code
 */
export async function runCli(
  argv: readonly string[],
  overrides: Partial<CliDependencies> = {}
): Promise<number> {
  const dependencies = { ...defaultDependencies(), ...overrides };
  let exitCode = 0;
  const program = buildProgram(dependencies, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
