import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import ora from 'ora';
import { ConsoleReporter, formatStep } from '../reporter';
import { SpinnerReporter } from '../spinner-reporter';

describe('reporters', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
  });

  describe('formatStep', () => {
    it('should pad the outcome and append identifier and message', () => {
      expect(formatStep({ step: 'uploads-bucket', outcome: 'created' })).toBe('created  uploads-bucket');
      expect(formatStep({ step: 'inventory-table', outcome: 'verified', identifier: 'arn:aws:dynamodb:us-east-1:111122223333:table/Inventory' }))
        .toBe('verified inventory-table  arn:aws:dynamodb:us-east-1:111122223333:table/Inventory');
      expect(formatStep({ step: 'seed-data', outcome: 'skipped', message: 'seeding disabled' }))
        .toBe('skipped  seed-data  seeding disabled');
    });
  });

  describe('ConsoleReporter', () => {
    it('should print errors with their cause only when verbose', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const cause = new Error('boom');

      new ConsoleReporter().error('Deployment failed', cause);
      new ConsoleReporter(true).error('Deployment failed', cause);

      expect(errorSpy.mock.calls).toEqual([
        ['❌ Deployment failed'],
        ['❌ Deployment failed'],
        [cause]
      ]);
    });
  });

  describe('SpinnerReporter', () => {
    it('should print steps and track the current step on the spinner', () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const spinner = ora({ isEnabled: false });

      new SpinnerReporter(spinner).step({ step: 'web-bucket', outcome: 'created' });

      expect(logSpy).toHaveBeenCalledWith('created  web-bucket');
      expect(spinner.text).toBe('web-bucket created');
    });

    it('should hide info lines unless verbose', () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const spinner = ora({ isEnabled: false });

      new SpinnerReporter(spinner).info('Resuming deployment 20240101-abcd1234');
      new SpinnerReporter(spinner, true).info('Starting new deployment 20240101-abcd1234');

      expect(logSpy.mock.calls).toEqual([['Starting new deployment 20240101-abcd1234']]);
    });

    it('should prefix warnings', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      new SpinnerReporter(ora({ isEnabled: false })).warn('Data directory data not found, skipping initial upload');

      expect(warnSpy).toHaveBeenCalledWith('⚠️  Data directory data not found, skipping initial upload');
    });
  });
});
