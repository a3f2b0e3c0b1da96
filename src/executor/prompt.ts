/**
 * Operator confirmation for interactive runs.
 */

import { createInterface } from 'node:readline/promises';
import type { Interface } from 'node:readline/promises';
import type { ResourceRecord, Verdict } from '@shared/types';
import { encodeTags } from '@shared/utils/tags';

export type ConfirmationAnswer = 'yes' | 'no' | 'quit';

export interface ConfirmationRequest {
  sequence: number;
  total: number;
  record: ResourceRecord;
  verdict: Verdict;
}

export interface ConfirmationPrompt {
  confirm(request: ConfirmationRequest): Promise<ConfirmationAnswer>;
  close(): void;
}

/**
 * A confirmation prompt that can also ask free-form questions.
 */
export interface OperatorPrompt extends ConfirmationPrompt {
  ask(question: string): Promise<string>;
}

/**
 * `yes`/`y` confirm, `quit`/`q` stop the run, anything else declines.
 */
export function parseConfirmation(input: string): ConfirmationAnswer {
  const answer = input.trim().toLowerCase();
  if (answer === 'yes' || answer === 'y') return 'yes';
  if (answer === 'quit' || answer === 'q') return 'quit';
  return 'no';
}

export function describeForConfirmation(request: ConfirmationRequest): string {
  const { record, verdict } = request;
  const cost =
    verdict.estimatedMonthlyCost === undefined
      ? 'unknown'
      : `$${verdict.estimatedMonthlyCost.toFixed(2)}/month`;
  return [
    `[${request.sequence}/${request.total}] ${record.kind} ${record.id} (${record.region})`,
    `  Name:   ${record.label || '-'}`,
    `  State:  ${record.state}`,
    `  Tags:   ${encodeTags(record.tags) || '-'}`,
    `  Reason: ${verdict.reason}`,
    `  Cost:   ${cost} (estimate)`,
  ].join('\n');
}

/**
 * Terminal prompt on stdin/stdout.
 */
export class ReadlinePrompt implements OperatorPrompt {
  private rl: Interface;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
  }

  async ask(question: string): Promise<string> {
    return this.rl.question(question);
  }

  async confirm(request: ConfirmationRequest): Promise<ConfirmationAnswer> {
    this.output.write(`\n${describeForConfirmation(request)}\n`);
    return parseConfirmation(await this.ask('Delete this resource? [yes/no/quit]: '));
  }

  close(): void {
    this.rl.close();
  }
}
