/**
 * Plumbing shared by the cleanup and audit commands.
 */

import { z } from 'zod';
import { loadConfigFromFile, loadConfigFromSsm, parseConfig } from '@/core/config';
import type { Config } from '@/core/config';
import { getHandler } from '@/handlers';
import type { HandlerFactory } from '@/handlers';
import { Scanner } from '@/inventory';
import type { ScannerOptions, ScanResult } from '@/inventory';
import { ReadlinePrompt } from '@/executor';
import type { OperatorPrompt } from '@/executor';
import { RESOURCE_KINDS } from '@shared/types';
import type { ResourceKind } from '@shared/types';

/**
 * Raised for invalid flag combinations or values.
 */
export class CliUsageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CliUsageError';
  }
}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface ScanSource {
  scan(): Promise<ScanResult>;
}

/**
 * Everything the commands reach outside the process through.
 */
export interface CliDependencies {
  io: CliIo;
  clock: () => Date;
  createScanner: (options: ScannerOptions) => ScanSource;
  loadSsmConfig: (parameterName: string) => Promise<Config>;
  handlerFactory: HandlerFactory;
  createPrompt: () => OperatorPrompt;
}

export function defaultDependencies(): CliDependencies {
  return {
    io: {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    },
    clock: () => new Date(),
    createScanner: (options) => new Scanner(options),
    loadSsmConfig: (parameterName) => loadConfigFromSsm(parameterName),
    handlerFactory: getHandler,
    createPrompt: () => new ReadlinePrompt(),
  };
}

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_FAILED_ATTEMPTS = 2;

/**
 * Validate raw commander option values.
 *
 * @throws {CliUsageError} Listing every invalid flag
 */
export function parseFlags<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.errors.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new CliUsageError(problems.join('; '), { cause: result.error });
  }
  return result.data;
}

/**
 * Split a comma-separated flag value, dropping blanks.
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * @throws {CliUsageError} On an unknown kind name
 */
export function parseKinds(value: string | undefined): ResourceKind[] | undefined {
  const names = parseList(value);
  if (names === undefined) return undefined;

  return names.map((name) => {
    const kind = RESOURCE_KINDS.find((candidate) => candidate.toLowerCase() === name.toLowerCase());
    if (!kind) {
      throw new CliUsageError(`Unknown resource kind "${name}". Valid kinds: ${RESOURCE_KINDS.join(', ')}`);
    }
    return kind;
  });
}

/**
 * Load configuration from `--config`, `--ssm-parameter`, or the defaults.
 */
export async function loadCliConfig(
  flags: { config?: string; ssmParameter?: string },
  dependencies: CliDependencies
): Promise<Config> {
  if (flags.config && flags.ssmParameter) {
    throw new CliUsageError('--config and --ssm-parameter cannot be combined');
  }
  if (flags.config) {
    return loadConfigFromFile(flags.config);
  }
  if (flags.ssmParameter) {
    return dependencies.loadSsmConfig(flags.ssmParameter);
  }
  return parseConfig('', 'defaults');
}
