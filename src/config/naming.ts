import { v4 as uuidv4 } from 'uuid';
import type { DeploymentConfig } from '../types';

/**
 * Physical names for every resource of one deployment record
 */
export interface ResourceNames {
  uploadsBucketName: string;
  webBucketName: string;
  tableName: string;
  roleName: string;
  loaderFunctionName: string;
  apiFunctionName: string;
  notifyFunctionName: string;
  apiName: string;
  topicName: string;
}

const RUN_SUFFIX_PATTERN = /^\d{8}-[0-9a-f]{8}$/;

/**
 * Resource naming utility class
 */
export class ResourceNamingService {
  private readonly maxS3BucketNameLength = 63;
  private readonly maxTopicNameLength = 256;

  /**
   * Generate a new run suffix: UTC date plus eight hex characters.
   */
  generateRunSuffix(now: Date = new Date(), token: string = uuidv4()): string {
    const date = [
      now.getUTCFullYear().toString().padStart(4, '0'),
      (now.getUTCMonth() + 1).toString().padStart(2, '0'),
      now.getUTCDate().toString().padStart(2, '0')
    ].join('');
    const random = token.replace(/-/g, '').toLowerCase().substring(0, 8);
    return `${date}-${random}`;
  }

  isValidRunSuffix(runSuffix: string): boolean {
    return RUN_SUFFIX_PATTERN.test(runSuffix);
  }

  /**
   * Derive every resource name. Only the run suffix and the configuration feed in,
   * so the same record always targets the same physical resources.
   */
  generateResourceNames(config: DeploymentConfig, runSuffix: string): ResourceNames {
    const prefix = config.application.name;

    return {
      uploadsBucketName: this.generateBucketName(prefix, 'uploads', runSuffix),
      webBucketName: this.generateBucketName(prefix, 'web', runSuffix),
      tableName: config.table.name,
      roleName: config.aws.role_name,
      loaderFunctionName: config.functions.loader.name,
      apiFunctionName: config.functions.api.name,
      notifyFunctionName: config.functions.notify.name,
      apiName: config.api.name,
      topicName: this.generateTopicName(config.notifications.topic_prefix, runSuffix)
    };
  }

  /**
   * S3 bucket names are global, lowercase and at most 63 characters
   */
  private generateBucketName(prefix: string, purpose: string, runSuffix: string): string {
    const name = this.sanitizeName([prefix, purpose, runSuffix].join('-')).toLowerCase();
    return this.validateAndTruncate(name, this.maxS3BucketNameLength);
  }

  private generateTopicName(prefix: string, runSuffix: string): string {
    const name = `${prefix}-${runSuffix}`.replace(/[^a-zA-Z0-9_-]/g, '-');
    return this.validateAndTruncate(name, this.maxTopicNameLength);
  }

  /**
   * Sanitize name to be AWS-compliant
   * - Remove invalid characters
   * - Ensure it starts with a letter
   * - Replace consecutive hyphens with single hyphen
   */
  private sanitizeName(name: string): string {
    let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');

    sanitized = sanitized.replace(/-+/g, '-');

    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (sanitized && !/^[a-zA-Z]/.test(sanitized)) {
      sanitized = 'app-' + sanitized;
    }

    if (!sanitized) {
      sanitized = 'app';
    }

    return sanitized;
  }

  /**
   * Truncate to fit AWS limits, keeping a hash of the full name so truncation stays deterministic
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1;
    return name.substring(0, truncatedLength) + '-' + hash;
  }

  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      const char = input.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash).toString(36).substring(0, 6);
  }
}

export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}
