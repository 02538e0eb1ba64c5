import {
  DynamoDBClient,
  CreateTableCommand,
  DescribeTableCommand,
  DeleteTableCommand,
  type TableDescription
} from '@aws-sdk/client-dynamodb';
import type { ResourceDetails, ResourceHandle } from '../types';
import { errorMessage, isAlreadyExistsError, isNotFoundError } from '../errors';
import type { ProviderSettings, ProvisionTarget, ProvisioningResult, ResourceProvider, TableInput } from './types';
import { waitUntil } from './wait';

export interface TableResult extends ProvisioningResult {
  details: {
    tableName: string;
    tableArn: string;
    streamArn: string;
  };
}

/**
 * Inventory table: composite key, on-demand billing, change stream requested at creation.
 * The stream setting of an existing table is accepted as is.
 */
export class DynamoDBManager implements ResourceProvider<TableInput> {
  readonly kind = 'table' as const;
  private client: DynamoDBClient;

  constructor(private readonly settings: ProviderSettings) {
    this.client = new DynamoDBClient({ region: settings.region, profile: settings.profile });
  }

  async exists(target: ProvisionTarget<TableInput>): Promise<boolean> {
    const table = await this.getTableIfExists(target.name);
    return table !== null && table.TableStatus !== 'DELETING';
  }

  async create(target: ProvisionTarget<TableInput>): Promise<TableResult> {
    const tableName = target.name;
    const { partitionKey, sortKey, tags } = target.input;
    let status: ProvisioningResult['status'] = 'created';

    try {
      await this.client.send(new CreateTableCommand({
        TableName: tableName,
        KeySchema: [
          { AttributeName: partitionKey, KeyType: 'HASH' },
          { AttributeName: sortKey, KeyType: 'RANGE' }
        ],
        AttributeDefinitions: [
          { AttributeName: partitionKey, AttributeType: 'S' },
          { AttributeName: sortKey, AttributeType: 'S' }
        ],
        BillingMode: 'PAY_PER_REQUEST',
        StreamSpecification: {
          StreamEnabled: true,
          StreamViewType: 'NEW_AND_OLD_IMAGES'
        },
        Tags: Object.keys(tags).length > 0
          ? Object.entries(tags).map(([Key, Value]) => ({ Key, Value }))
          : undefined
      }));
      this.settings.reporter.info(`Creating table ${tableName}...`);
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw new Error(`Failed to create DynamoDB table ${tableName}: ${errorMessage(error)}`, { cause: error });
      }
      status = 'unchanged';
    }

    const table = await this.waitForActive(tableName);
    if (!table.TableArn) {
      throw new Error(`DynamoDB table ${tableName} has no ARN`);
    }

    return {
      identifier: table.TableArn,
      status,
      details: this.tableDetails(tableName, table)
    };
  }

  async describe(handle: ResourceHandle): Promise<ResourceDetails> {
    const table = await this.getTableIfExists(handle.name);
    if (!table) {
      throw new Error(`DynamoDB table ${handle.name} does not exist`);
    }
    return this.tableDetails(handle.name, table);
  }

  async delete(handle: ResourceHandle): Promise<void> {
    const tableName = handle.name;

    try {
      await this.client.send(new DeleteTableCommand({ TableName: tableName }));
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw new Error(`Failed to delete DynamoDB table ${tableName}: ${errorMessage(error)}`, { cause: error });
    }

    await waitUntil(async () => ((await this.getTableIfExists(tableName)) === null ? true : undefined), {
      timeoutMs: this.settings.propagationTimeoutMs,
      intervalMs: this.settings.propagationIntervalMs,
      description: `table ${tableName} to be deleted`,
      resource: tableName
    });
  }

  private async waitForActive(tableName: string): Promise<TableDescription> {
    return waitUntil(async () => {
      const table = await this.getTableIfExists(tableName);
      return table?.TableStatus === 'ACTIVE' ? table : undefined;
    }, {
      timeoutMs: this.settings.propagationTimeoutMs,
      intervalMs: this.settings.propagationIntervalMs,
      description: `table ${tableName} to become ACTIVE`,
      resource: tableName
    });
  }

  private async getTableIfExists(tableName: string): Promise<TableDescription | null> {
    try {
      const result = await this.client.send(new DescribeTableCommand({ TableName: tableName }));
      return result.Table ?? null;
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  private tableDetails(tableName: string, table: TableDescription): TableResult['details'] {
    return {
      tableName,
      tableArn: table.TableArn ?? '',
      streamArn: table.LatestStreamArn ?? ''
    };
  }
}
