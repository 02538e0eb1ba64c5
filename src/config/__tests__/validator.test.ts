import { describe, it, expect } from 'vitest';
import { validateConfig, validateAndNormalizeConfig, getConfigSchema } from '../validator';

describe('Configuration Validator', () => {
  describe('validateConfig', () => {
    it('should accept an empty configuration', () => {
      const result = validateConfig({});

      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });

    it('should accept a fully specified configuration', () => {
      const result = validateConfig({
        application: { name: 'shop' },
        aws: { region: 'eu-west-1', profile: 'lab', role_name: 'DeployRole' },
        table: { name: 'Stock' },
        functions: {
          runtime: 'nodejs20.x',
          timeout: 60,
          memory: 512,
          loader: { name: 'Loader', source: 'functions/loader', handler: 'index.handler' }
        },
        api: { name: 'StockAPI', stage: 'v1' },
        notifications: { email: 'ops@example.com', topic_prefix: 'LowStock' },
        site: { index_file: 'site/index.html' },
        data: { dir: 'seed', seed: false },
        state: { file: 'state.json' },
        propagation: { timeout_seconds: 120, interval_seconds: 5 },
        deployment: { tags: { Team: 'inventory' } }
      });

      expect(result).toEqual({ valid: true, errors: [] });
    });

    it('should reject uppercase application names', () => {
      const result = validateConfig({ application: { name: 'MyApp' } });

      expect(result.valid).toBe(false);
      expect(result.errors).toContain(
        'Application name must contain only lowercase letters, digits and hyphens (it prefixes bucket names)'
      );
    });

    it('should reject unsupported runtimes', () => {
      const result = validateConfig({ functions: { runtime: 'python2.7' } });

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('Runtime must be a supported Lambda runtime');
    });

    it('should reject out-of-range timeout and memory', () => {
      const result = validateConfig({ functions: { timeout: 901, memory: 64 } });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'Timeout must be no more than 900 seconds (15 minutes)',
        'Memory must be at least 128 MB'
      ]);
    });

    it('should reject an invalid notification email', () => {
      const result = validateConfig({ notifications: { email: 'not-an-email' } });

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('Notification email must be a valid e-mail address');
    });

    it('should reject malformed handlers', () => {
      const result = validateConfig({ functions: { api: { handler: 'handler' } } });

      expect(result.valid).toBe(false);
      expect(result.errors).toContain(
        'Handler must be in format "file.function" (e.g., "lambda_function.lambda_handler")'
      );
    });

    it('should reject unknown top-level sections', () => {
      const result = validateConfig({ frontend: { source_dir: './dist' } });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['"frontend" is not allowed']);
    });

    it('should reject non-string tag values', () => {
      const result = validateConfig({ deployment: { tags: { Cost: 12 } } });

      expect(result.valid).toBe(false);
    });
  });

  describe('validateAndNormalizeConfig', () => {
    it('should apply every default', () => {
      const config = validateAndNormalizeConfig({});

      expect(config.application.name).toBe('inventory');
      expect(config.aws).toEqual({ region: 'us-east-1', role_name: 'LabRole' });
      expect(config.table.name).toBe('Inventory');
      expect(config.functions.runtime).toBe('python3.11');
      expect(config.functions.timeout).toBe(30);
      expect(config.functions.memory).toBe(256);
      expect(config.functions.loader).toEqual({
        name: 'LoadInventoryFunction',
        source: 'lambdas/load_inventory/lambda_function.py',
        handler: 'lambda_function.lambda_handler'
      });
      expect(config.functions.api.name).toBe('GetInventoryApiFunction');
      expect(config.functions.notify.name).toBe('NotifyLowStockFunction');
      expect(config.api).toEqual({ name: 'InventoryAPI', stage: 'prod' });
      expect(config.notifications).toEqual({ topic_prefix: 'NoStock' });
      expect(config.site.index_file).toBe('web/index.html');
      expect(config.data).toEqual({ dir: 'data', seed: true });
      expect(config.state.file).toBe('.inventory-deploy/state.json');
      expect(config.propagation).toEqual({ timeout_seconds: 60, interval_seconds: 2 });
      expect(config.deployment.tags).toEqual({});
    });

    it('should keep provided values next to defaults in the same section', () => {
      const config = validateAndNormalizeConfig({
        functions: { runtime: 'python3.12', api: { name: 'ReadStock' } }
      });

      expect(config.functions.runtime).toBe('python3.12');
      expect(config.functions.api).toEqual({
        name: 'ReadStock',
        source: 'lambdas/get_inventory_api/lambda_function.py',
        handler: 'lambda_function.lambda_handler'
      });
      expect(config.functions.loader.name).toBe('LoadInventoryFunction');
    });

    it('should treat null as an empty configuration', () => {
      expect(validateAndNormalizeConfig(null).application.name).toBe('inventory');
    });

    it('should throw with every validation failure listed', () => {
      expect(() => validateAndNormalizeConfig({
        application: { name: 'Bad Name' },
        functions: { memory: 64 }
      })).toThrow(
        'Configuration validation failed:\n' +
        'Application name must contain only lowercase letters, digits and hyphens (it prefixes bucket names)\n' +
        'Memory must be at least 128 MB'
      );
    });
  });

  describe('getConfigSchema', () => {
    it('should expose the schema used for validation', () => {
      const { error } = getConfigSchema().validate({ api: { stage: 'bad-stage' } });

      expect(error?.details[0].message).toBe('Stage name must contain only letters, digits and underscores');
    });
  });
});
