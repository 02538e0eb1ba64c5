#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { config as loadEnv } from 'dotenv';
import { readFileSync } from 'fs';
import { join } from 'path';
import { createConfigLoader, DEFAULT_CONFIG_PATHS } from './config';
import { DeploymentOrchestrator, TeardownEngine } from './orchestration';
import { SpinnerReporter, formatStep } from './logging';
import type { DeploymentConfig, DeploymentResult } from './types';

interface CommandOptions {
  config?: string;
  verbose?: boolean;
}

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

async function loadConfiguration(options: CommandOptions): Promise<DeploymentConfig> {
  loadEnv();
  const loader = createConfigLoader();
  return options.config ? loader.load(options.config) : loader.loadFromPaths(DEFAULT_CONFIG_PATHS);
}

function printErrors(result: DeploymentResult): void {
  console.log(chalk.red('\n❌ Errors:'));
  for (const error of result.errors ?? []) {
    console.log(`  ${error.code}${error.resource ? ` (${error.resource})` : ''}: ${error.message}`);
    if (error.remediation) {
      console.log(chalk.yellow(`  💡 ${error.remediation}`));
    }
  }
}

const program = new Command();

program
  .name('inventory-deploy')
  .description('Provision and tear down the inventory application on AWS')
  .version(readVersion());

program
  .command('apply')
  .description('Create or converge every resource, resuming from the state file')
  .option('-c, --config <path>', 'Path to configuration file (defaults to ./deploy.yml if present)')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: CommandOptions) => {
    const spinner = ora('Loading configuration...').start();

    try {
      const config = await loadConfiguration(options);
      spinner.text = `Deploying to ${config.aws.region}...`;

      const orchestrator = new DeploymentOrchestrator(config, {
        reporter: new SpinnerReporter(spinner, options.verbose)
      });
      const result = await orchestrator.apply();

      if (result.success) {
        spinner.succeed('Deployment completed successfully!');

        const { apiUrl, websiteUrl } = result.outputs;
        if (apiUrl || websiteUrl) {
          console.log(chalk.blue('\n🌐 Endpoints:'));
          if (apiUrl) {
            console.log(`  api: ${chalk.underline(apiUrl)}`);
          }
          if (websiteUrl) {
            console.log(`  website: ${chalk.underline(websiteUrl)}`);
          }
        }

        console.log(chalk.gray(`\n⏱️  Deployment took ${result.metadata.duration}ms`));
        console.log(chalk.gray(`🆔 Run suffix: ${result.metadata.runSuffix}`));
      } else {
        spinner.fail('Deployment failed');
        printErrors(result);
        console.log(chalk.gray('\nCompleted steps are recorded; re-run apply to resume.'));
        process.exitCode = 1;
      }
    } catch (error) {
      spinner.fail('Deployment failed');
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      if (options.verbose) {
        console.error(error);
      }
      process.exitCode = 1;
    }
  });

program
  .command('destroy')
  .description('Delete every recorded resource and clear the state file')
  .option('-c, --config <path>', 'Path to configuration file (defaults to ./deploy.yml if present)')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: CommandOptions) => {
    const spinner = ora('Loading configuration...').start();

    try {
      const config = await loadConfiguration(options);
      spinner.text = 'Destroying deployment...';

      const engine = new TeardownEngine(config, {
        reporter: new SpinnerReporter(spinner, options.verbose)
      });
      const result = await engine.destroy();

      if (result.success) {
        spinner.succeed(result.steps.length > 0 ? 'Deployment destroyed' : 'Nothing to destroy');
      } else {
        spinner.fail('Destroy incomplete');
        printErrors(result);
        console.log(chalk.gray('\nThe state file keeps the remaining resources; re-run destroy to retry.'));
        process.exitCode = 1;
      }
    } catch (error) {
      spinner.fail('Destroy failed');
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      if (options.verbose) {
        console.error(error);
      }
      process.exitCode = 1;
    }
  });

program
  .command('status')
  .description('Show the recorded deployment')
  .option('-c, --config <path>', 'Path to configuration file (defaults to ./deploy.yml if present)')
  .action(async (options: CommandOptions) => {
    try {
      const config = await loadConfiguration(options);
      const record = await new DeploymentOrchestrator(config).status();

      if (!record) {
        console.log(chalk.yellow('⚠️  No deployment recorded'));
        return;
      }

      console.log(chalk.blue(`📋 Deployment ${record.runSuffix}`));
      console.log(chalk.gray(`   created ${record.createdAt}, updated ${record.updatedAt}`));
      for (const [key, handle] of Object.entries(record.resources)) {
        if (handle) {
          const outcome = handle.status === 'deleted' ? 'deleted' : 'verified';
          console.log(`  ${formatStep({ step: `${key} [${handle.status}]`, outcome, identifier: handle.identifier })}`);
        }
      }
      for (const [name, value] of Object.entries(record.outputs)) {
        console.log(`  ${name}: ${chalk.underline(value)}`);
      }
    } catch (error) {
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch(error => {
  console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
