import path from 'node:path';
import { z } from 'zod';
import { classifyAll } from '@/classifier';
import { selectedKinds, toThresholdConfig } from '@/core/config';
import { createSessionId } from '@/executor';
import { writeReports } from '@/report';
import { EXIT_OK, loadCliConfig, parseFlags, parseKinds, parseList } from '../shared';
import type { CliDependencies } from '../shared';

const AuditFlagsSchema = z.object({
  config: z.string().min(1).optional(),
  ssmParameter: z.string().min(1).optional(),
  regions: z.string().optional(),
  kinds: z.string().optional(),
  output: z.string().min(1).optional(),
});

/**
 * Scan, classify and write the report set. Never deletes anything.
 */
export async function runAudit(rawFlags: unknown, dependencies: CliDependencies): Promise<number> {
  const flags = parseFlags(AuditFlagsSchema, rawFlags);
  const kindsFlag = parseKinds(flags.kinds);
  const config = await loadCliConfig(flags, dependencies);
  const { io } = dependencies;

  const now = dependencies.clock();
  const thresholds = toThresholdConfig(config);
  const regions = parseList(flags.regions) ?? config.regions;
  const kinds = kindsFlag ?? selectedKinds(config);

  const scanner = dependencies.createScanner({
    regions,
    kinds,
    windows: thresholds.metricWindows,
  });
  const scan = await scanner.scan();
  const classified = classifyAll(scan.records, thresholds, now);

  const directory = path.join(flags.output ?? config.output.report_dir, `audit-${createSessionId(now)}`);
  const report = await writeReports(classified, directory, { now, regions: scan.regions, kinds });

  io.out(`Scanned ${report.summary.total} resources in ${scan.regions.length} region(s)`);
  io.out(`DELETE candidates: ${report.summary.deleteCandidates}`);
  io.out(`REVIEW candidates: ${report.summary.reviewCandidates}`);
  io.out(
    `Estimated monthly savings from DELETE candidates: $${report.summary.estimatedMonthlySavings.toFixed(2)} (estimate)`
  );
  for (const failure of scan.failures) {
    io.err(`Warning: ${failure.kind} in ${failure.region} was not collected: ${failure.message}`);
  }
  io.out(`Reports written to ${report.directory}`);
  return EXIT_OK;
}
