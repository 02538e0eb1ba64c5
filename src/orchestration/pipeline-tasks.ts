import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { join, resolve } from 'path';
import type { DeploymentConfig } from '../types';
import type { StorageProvider } from '../provisioning/types';
import { errorMessage } from '../errors';
import { CSV_SUFFIX } from './resource-specs';
import type { PipelineTask, TaskContext, TaskResult } from './types';

/** Placeholder in the site's index page that receives the API endpoint. */
export const API_URL_PLACEHOLDER = 'REPLACE_ME_WITH_YOUR_INVOKE_URL';
export const WEBSITE_INDEX_DOCUMENT = 'index.html';

export function buildPipelineTasks(config: DeploymentConfig, storage: StorageProvider): PipelineTask[] {
  return [
    createPublishSiteTask(config, storage),
    createSeedDataTask(config, storage)
  ];
}

/**
 * Inject the API endpoint into the index page and publish it from the web bucket.
 */
export function createPublishSiteTask(config: DeploymentConfig, storage: StorageProvider): PipelineTask {
  return {
    name: 'publish-site',
    dependsOn: ['web-bucket', 'inventory-api'],
    async run({ deps, reporter }: TaskContext): Promise<TaskResult> {
      const indexPath = resolve(config.site.index_file);
      if (!existsSync(indexPath)) {
        reporter.warn(`Index page ${config.site.index_file} not found, skipping website publication`);
        return { outcome: 'skipped', message: `${config.site.index_file} not found` };
      }

      const apiUrl = deps.detail('inventory-api', 'apiUrl');
      const body = readFileSync(indexPath, 'utf-8').split(API_URL_PLACEHOLDER).join(apiUrl);
      const websiteUrl = await storage.publishWebsite(deps.handle('web-bucket').name, WEBSITE_INDEX_DOCUMENT, body);

      return {
        outcome: 'updated',
        identifier: websiteUrl,
        outputs: { websiteUrl }
      };
    }
  };
}

/**
 * Upload the local CSV files once the uploads bucket notifies the loader and
 * the table stream feeds the notifier.
 * A failed upload is reported and the remaining files are still sent.
 */
export function createSeedDataTask(config: DeploymentConfig, storage: StorageProvider): PipelineTask {
  return {
    name: 'seed-data',
    dependsOn: ['uploads-bucket', 'uploads-trigger', 'stream-trigger'],
    async run({ deps, reporter }: TaskContext): Promise<TaskResult> {
      if (!config.data.seed) {
        return { outcome: 'skipped', message: 'seeding disabled' };
      }

      const dataDir = resolve(config.data.dir);
      if (!existsSync(dataDir) || !statSync(dataDir).isDirectory()) {
        reporter.warn(`Data directory ${config.data.dir} not found, skipping initial upload`);
        return { outcome: 'skipped', message: `${config.data.dir} not found` };
      }

      const files = readdirSync(dataDir)
        .filter(file => file.toLowerCase().endsWith(CSV_SUFFIX))
        .sort();
      if (files.length === 0) {
        reporter.warn(`Data directory ${config.data.dir} contains no ${CSV_SUFFIX} files`);
        return { outcome: 'skipped', message: 'no CSV files' };
      }

      const bucketName = deps.handle('uploads-bucket').name;
      await storage.waitForFunctionNotification(bucketName, deps.detail('uploads-trigger', 'functionArn'));

      const failed: string[] = [];
      for (const file of files) {
        try {
          await storage.uploadFile(bucketName, file, join(dataDir, file));
          reporter.info(`Uploaded ${file} to ${bucketName}`);
        } catch (error) {
          failed.push(file);
          reporter.error(`Upload of ${file} failed: ${errorMessage(error)}`, error);
        }
      }

      const uploaded = files.length - failed.length;
      return {
        outcome: uploaded > 0 ? 'updated' : 'failed',
        identifier: bucketName,
        message: failed.length > 0
          ? `uploaded ${uploaded}/${files.length} files, failed: ${failed.join(', ')}`
          : `uploaded ${uploaded} files`
      };
    }
  };
}
