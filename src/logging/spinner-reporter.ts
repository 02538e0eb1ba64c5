import chalk from 'chalk';
import ora from 'ora';
import type { StepResult } from '../types';
import { formatStep, type DeploymentReporter } from './reporter';

type Spinner = ReturnType<typeof ora>;

/**
 * Prints step lines above a running spinner, for the CLI.
 */
export class SpinnerReporter implements DeploymentReporter {
  constructor(private readonly spinner: Spinner, private readonly verbose: boolean = false) {}

  step(result: StepResult): void {
    this.print(() => console.log(formatStep(result)));
    this.spinner.text = `${result.step} ${result.outcome}`;
  }

  info(message: string): void {
    if (this.verbose) {
      this.print(() => console.log(chalk.gray(message)));
    }
  }

  warn(message: string): void {
    this.print(() => console.warn(chalk.yellow(`⚠️  ${message}`)));
  }

  error(message: string, error?: unknown): void {
    this.print(() => {
      console.error(chalk.red(`❌ ${message}`));
      if (this.verbose && error !== undefined) {
        console.error(error);
      }
    });
  }

  private print(write: () => void): void {
    const spinning = this.spinner.isSpinning;
    if (spinning) {
      this.spinner.clear();
    }
    write();
    if (spinning) {
      this.spinner.render();
    }
  }
}
