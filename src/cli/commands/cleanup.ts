import { z } from 'zod';
import { toExecutorOptions, toThresholdConfig } from '@/core/config';
import { createSessionId, DeletionExecutor, formatExecutionSummary, openSessionLog } from '@/executor';
import type { OperatorPrompt } from '@/executor';
import { readReportFile } from '@/report';
import type { ClassifiedResource, ExecutorOptions, RunMode } from '@shared/types';
import {
  EXIT_FAILED_ATTEMPTS,
  EXIT_OK,
  loadCliConfig,
  parseFlags,
  parseList,
} from '../shared';
import type { CliDependencies } from '../shared';

export const EXECUTE_CONFIRMATION_WORD = 'DELETE';

const CleanupFlagsSchema = z
  .object({
    report: z.array(z.string().min(1)).min(1),
    dryRun: z.boolean().default(false),
    interactive: z.boolean().default(false),
    execute: z.boolean().default(false),
    backupBeforeDelete: z.boolean().default(false),
    protectTags: z.string().optional(),
    minAgeDays: z.coerce.number().int().nonnegative().optional(),
    maxResources: z.coerce.number().int().positive().optional(),
    logDir: z.string().min(1).optional(),
    config: z.string().min(1).optional(),
    ssmParameter: z.string().min(1).optional(),
    yes: z.boolean().default(false),
  })
  .refine((flags) => !(flags.interactive && flags.execute), {
    message: '--interactive and --execute cannot be combined',
  })
  .refine((flags) => !(flags.dryRun && (flags.interactive || flags.execute)), {
    message: '--dry-run cannot be combined with --interactive or --execute',
  });

type CleanupFlags = z.infer<typeof CleanupFlagsSchema>;

export function selectRunMode(flags: Pick<CleanupFlags, 'interactive' | 'execute'>): RunMode {
  if (flags.interactive) return 'interactive';
  if (flags.execute) return 'automated';
  return 'dry-run';
}

async function readReports(files: readonly string[]): Promise<ClassifiedResource[]> {
  const rows: ClassifiedResource[] = [];
  for (const file of files) {
    rows.push(...(await readReportFile(file)));
  }
  return rows;
}

async function confirmAutomatedRun(prompt: OperatorPrompt, candidates: number): Promise<boolean> {
  try {
    const answer = await prompt.ask(
      `About to permanently delete up to ${candidates} resource(s). Type ${EXECUTE_CONFIRMATION_WORD} to continue: `
    );
    return answer.trim() === EXECUTE_CONFIRMATION_WORD;
  } finally {
    prompt.close();
  }
}

/**
 * Run the deletion executor over the DELETE rows of one or more reports.
 */
export async function runCleanup(rawFlags: unknown, dependencies: CliDependencies): Promise<number> {
  const flags = parseFlags(CleanupFlagsSchema, rawFlags);
  const config = await loadCliConfig(flags, dependencies);
  const { io } = dependencies;
  const mode = selectRunMode(flags);

  const rows = await readReports(flags.report);
  const candidates = rows.filter((row) => row.verdict.disposition === 'DELETE').length;
  io.out(`Loaded ${rows.length} report rows, ${candidates} DELETE candidate(s)`);
  if (candidates === 0) {
    io.out('Nothing to do');
    return EXIT_OK;
  }

  const configured = toExecutorOptions(config, mode);
  const options: ExecutorOptions = {
    ...configured,
    backupBeforeDelete: flags.backupBeforeDelete || configured.backupBeforeDelete,
    protectTagPatterns: parseList(flags.protectTags) ?? configured.protectTagPatterns,
    minAgeDaysOverride: flags.minAgeDays ?? configured.minAgeDaysOverride,
    maxResourcesThisRun: flags.maxResources ?? configured.maxResourcesThisRun,
  };

  if (mode === 'automated' && !flags.yes) {
    const confirmed = await confirmAutomatedRun(dependencies.createPrompt(), candidates);
    if (!confirmed) {
      io.out('Aborted: confirmation not given, nothing was deleted');
      return EXIT_OK;
    }
  }

  const sessionId = createSessionId(dependencies.clock());
  const session = await openSessionLog(flags.logDir ?? config.output.log_dir, sessionId);
  const prompt = mode === 'interactive' ? dependencies.createPrompt() : undefined;

  try {
    const executor = new DeletionExecutor(options, {
      handlerFactory: dependencies.handlerFactory,
      prompt,
      auditTrail: session.auditTrail,
      backupManifest: session.backupManifest,
      clock: dependencies.clock,
      sessionId,
      thresholds: toThresholdConfig(config),
      backupWait: {
        maxAttempts: config.cleanup.backup_wait.max_attempts,
        delaySeconds: config.cleanup.backup_wait.delay_seconds,
      },
    });

    const { summary } = await executor.run(rows);
    await session.writeSummary(summary);

    for (const line of formatExecutionSummary(summary)) {
      io.out(line);
    }
    io.out(`Session log: ${session.directory}`);
    return summary.failed > 0 ? EXIT_FAILED_ATTEMPTS : EXIT_OK;
  } finally {
    prompt?.close();
  }
}
