import chalk from 'chalk';
import type { StepResult } from '../types';

/**
 * Operator-facing progress output. Every pipeline step reports its outcome here.
 */
export interface DeploymentReporter {
  step(result: StepResult): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const OUTCOME_COLOURS: Record<StepResult['outcome'], (text: string) => string> = {
  created: chalk.green,
  updated: chalk.cyan,
  verified: chalk.gray,
  skipped: chalk.yellow,
  deleted: chalk.green,
  absent: chalk.gray,
  failed: chalk.red
};

export function formatStep(result: StepResult): string {
  const colour = OUTCOME_COLOURS[result.outcome];
  const parts = [`${colour(result.outcome.padEnd(8))} ${result.step}`];
  if (result.identifier) {
    parts.push(chalk.gray(result.identifier));
  }
  if (result.message) {
    parts.push(result.message);
  }
  return parts.join('  ');
}

export class ConsoleReporter implements DeploymentReporter {
  constructor(private readonly verbose: boolean = false) {}

  step(result: StepResult): void {
    console.log(formatStep(result));
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string, error?: unknown): void {
    console.error(chalk.red(`❌ ${message}`));
    if (this.verbose && error !== undefined) {
      console.error(error);
    }
  }
}
