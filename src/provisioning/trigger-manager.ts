import type { LambdaFunctionConfiguration } from '@aws-sdk/client-s3';
import type { ResourceDetails, ResourceHandle } from '../types';
import { errorMessage, errorName, isNotFoundError } from '../errors';
import type {
  BucketTriggerInput,
  ProviderSettings,
  ProvisionTarget,
  ProvisioningResult,
  ResourceProvider,
  StreamTriggerInput
} from './types';
import type { S3Manager } from './s3-manager';
import type { LambdaManager } from './lambda-manager';
import { parseArn } from './arn';
import { retryWhile } from './wait';

export type BucketNotifications = Pick<S3Manager, 'getFunctionNotifications' | 'putFunctionNotifications'>;
export type FunctionPermissions = Pick<LambdaManager, 'addPermission' | 'removePermission'>;
export type EventSourceMappings = Pick<LambdaManager, 'ensureEventSourceMapping' | 'getEventSourceMapping' | 'deleteEventSourceMapping'>;

/**
 * S3 `ObjectCreated` notifications to a function. The notification id is the
 * trigger's physical name, so other notifications on the bucket are left alone.
 */
export class BucketTriggerManager implements ResourceProvider<BucketTriggerInput> {
  readonly kind = 'trigger' as const;

  constructor(
    private readonly settings: ProviderSettings,
    private readonly buckets: BucketNotifications,
    private readonly permissions: FunctionPermissions
  ) {}

  async exists(target: ProvisionTarget<BucketTriggerInput>): Promise<boolean> {
    const configurations = await this.getNotificationsIfBucketExists(target.input.bucketName);
    return configurations !== null && configurations.some(configuration =>
      configuration.Id === target.name && configuration.LambdaFunctionArn === target.input.functionArn);
  }

  async create(target: ProvisionTarget<BucketTriggerInput>): Promise<ProvisioningResult> {
    const { functionName } = target.input;

    const permissionAdded = await this.grantInvoke(target.input);
    if (!permissionAdded) {
      this.settings.reporter.info(`S3 invoke permission for ${functionName} already present`);
    }
    await this.putNotification(target);

    return this.toResult(target, 'created');
  }

  /**
   * The invoke permission lives in the function's policy and is lost when the
   * function is recreated, so it is granted again on every run.
   */
  async converge(target: ProvisionTarget<BucketTriggerInput>): Promise<ProvisioningResult> {
    const permissionAdded = await this.grantInvoke(target.input);
    if (permissionAdded) {
      this.settings.reporter.info(`Restored S3 invoke permission for ${target.input.functionName}`);
    }

    const configurations = await this.buckets.getFunctionNotifications(target.input.bucketName);
    const current = configurations.find(configuration => configuration.Id === target.name);
    const notificationCurrent = current !== undefined && this.isSameNotification(current, this.notification(target));
    if (!notificationCurrent) {
      await this.putNotification(target);
    }

    return this.toResult(target, permissionAdded || !notificationCurrent ? 'updated' : 'unchanged');
  }

  async describe(handle: ResourceHandle): Promise<ResourceDetails> {
    const { bucketName, configurationId } = this.parseIdentifier(handle.identifier);
    const configurations = await this.buckets.getFunctionNotifications(bucketName);
    const configuration = configurations.find(candidate => candidate.Id === configurationId);
    if (!configuration?.LambdaFunctionArn) {
      throw new Error(`Bucket ${bucketName} has no notification ${configurationId}`);
    }
    return {
      bucketName,
      configurationId,
      functionArn: configuration.LambdaFunctionArn
    };
  }

  async delete(handle: ResourceHandle): Promise<void> {
    const { bucketName, configurationId } = this.parseIdentifier(handle.identifier);

    const configurations = await this.getNotificationsIfBucketExists(bucketName);
    if (configurations !== null) {
      try {
        await this.buckets.putFunctionNotifications(
          bucketName,
          configurations.filter(configuration => configuration.Id !== configurationId)
        );
      } catch (error) {
        if (!isNotFoundError(error)) {
          throw new Error(`Failed to delete S3 trigger ${configurationId}: ${errorMessage(error)}`, { cause: error });
        }
      }
    }

    const functionName = handle.details?.functionName;
    if (functionName) {
      await this.permissions.removePermission(functionName, this.statementId(bucketName));
    }
  }

  private async grantInvoke(input: BucketTriggerInput): Promise<boolean> {
    const { bucketName, functionArn, functionName } = input;
    return this.permissions.addPermission({
      functionName,
      statementId: this.statementId(bucketName),
      principal: 's3.amazonaws.com',
      sourceArn: `arn:${parseArn(functionArn).partition}:s3:::${bucketName}`
    });
  }

  private notification(target: ProvisionTarget<BucketTriggerInput>): LambdaFunctionConfiguration {
    return {
      Id: target.name,
      LambdaFunctionArn: target.input.functionArn,
      Events: ['s3:ObjectCreated:*'],
      Filter: {
        Key: {
          FilterRules: [{ Name: 'suffix', Value: target.input.suffix }]
        }
      }
    };
  }

  private isSameNotification(current: LambdaFunctionConfiguration, desired: LambdaFunctionConfiguration): boolean {
    const suffixOf = (configuration: LambdaFunctionConfiguration) =>
      configuration.Filter?.Key?.FilterRules?.find(rule => rule.Name?.toLowerCase() === 'suffix')?.Value;
    return current.LambdaFunctionArn === desired.LambdaFunctionArn
      && suffixOf(current) === suffixOf(desired)
      && (current.Events ?? []).join(',') === (desired.Events ?? []).join(',');
  }

  private async putNotification(target: ProvisionTarget<BucketTriggerInput>): Promise<void> {
    const configurationId = target.name;
    const { bucketName, functionName } = target.input;
    const notification = this.notification(target);

    try {
      // S3 validates the destination, which fails until the permission has propagated
      await retryWhile(async () => {
        const others = (await this.buckets.getFunctionNotifications(bucketName))
          .filter(configuration => configuration.Id !== configurationId);
        await this.buckets.putFunctionNotifications(bucketName, [...others, notification]);
      }, error => errorName(error) === 'InvalidArgument', {
        timeoutMs: this.settings.propagationTimeoutMs,
        intervalMs: this.settings.propagationIntervalMs,
        description: `bucket ${bucketName} to accept ${functionName} as a destination`,
        resource: configurationId
      });
    } catch (error) {
      throw new Error(`Failed to create S3 trigger ${configurationId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private toResult(target: ProvisionTarget<BucketTriggerInput>, status: ProvisioningResult['status']): ProvisioningResult {
    const { bucketName, functionArn, functionName } = target.input;
    return {
      identifier: `${bucketName}:${target.name}`,
      status,
      details: { bucketName, configurationId: target.name, functionArn, functionName }
    };
  }

  private statementId(bucketName: string): string {
    return `S3Invoke-${bucketName}`;
  }

  private parseIdentifier(identifier: string): { bucketName: string; configurationId: string } {
    const separator = identifier.indexOf(':');
    if (separator <= 0) {
      throw new Error(`Malformed bucket trigger identifier: ${identifier}`);
    }
    return {
      bucketName: identifier.slice(0, separator),
      configurationId: identifier.slice(separator + 1)
    };
  }

  private async getNotificationsIfBucketExists(bucketName: string): Promise<LambdaFunctionConfiguration[] | null> {
    try {
      return await this.buckets.getFunctionNotifications(bucketName);
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }
}

/**
 * Table stream to function, as an event source mapping identified by its UUID.
 */
export class StreamTriggerManager implements ResourceProvider<StreamTriggerInput> {
  readonly kind = 'trigger' as const;

  constructor(
    private readonly settings: ProviderSettings,
    private readonly mappings: EventSourceMappings
  ) {}

  /**
   * A mapping bound to an older stream (the table was recreated) does not count.
   */
  async exists(target: ProvisionTarget<StreamTriggerInput>): Promise<boolean> {
    if (!target.identifier) {
      return false;
    }
    const mapping = await this.mappings.getEventSourceMapping(target.identifier);
    return mapping !== null
      && mapping.EventSourceArn === target.input.streamArn
      && mapping.State !== 'Deleting';
  }

  async create(target: ProvisionTarget<StreamTriggerInput>): Promise<ProvisioningResult> {
    const { functionName, streamArn, batchSize, startingPosition } = target.input;

    const { uuid, created } = await this.mappings.ensureEventSourceMapping({
      functionName,
      eventSourceArn: streamArn,
      batchSize,
      startingPosition
    });
    if (!created) {
      this.settings.reporter.info(`Reusing event source mapping ${uuid} for ${functionName}`);
    }

    return {
      identifier: uuid,
      status: created ? 'created' : 'unchanged',
      details: { uuid, functionName, streamArn }
    };
  }

  async describe(handle: ResourceHandle): Promise<ResourceDetails> {
    const mapping = await this.mappings.getEventSourceMapping(handle.identifier);
    if (!mapping) {
      throw new Error(`Event source mapping ${handle.identifier} does not exist`);
    }
    return {
      uuid: handle.identifier,
      streamArn: mapping.EventSourceArn ?? '',
      state: mapping.State ?? 'Unknown'
    };
  }

  async delete(handle: ResourceHandle): Promise<void> {
    try {
      await this.mappings.deleteEventSourceMapping(handle.identifier);
    } catch (error) {
      throw new Error(`Failed to delete event source mapping ${handle.identifier}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
