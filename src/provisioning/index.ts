import type { ProviderSettings, ResourceProviders } from './types';
import { S3Manager } from './s3-manager';
import { DynamoDBManager } from './dynamodb-manager';
import { LambdaManager } from './lambda-manager';
import { APIGatewayManager } from './api-gateway-manager';
import { SNSManager } from './sns-manager';
import { IdentityManager } from './identity-manager';
import { BucketTriggerManager, StreamTriggerManager } from './trigger-manager';

export * from './types';
export * from './arn';
export * from './wait';
export * from './s3-manager';
export * from './dynamodb-manager';
export * from './lambda-manager';
export * from './api-gateway-manager';
export * from './sns-manager';
export * from './identity-manager';
export * from './trigger-manager';

/**
 * Wire every AWS adapter against one region/profile and one reporter.
 */
export function createAwsProviders(settings: ProviderSettings): ResourceProviders {
  const storage = new S3Manager(settings);
  const functions = new LambdaManager(settings);

  return {
    storage,
    table: new DynamoDBManager(settings),
    role: new IdentityManager(settings),
    functions,
    gateway: new APIGatewayManager(settings, functions),
    topic: new SNSManager(settings),
    bucketTrigger: new BucketTriggerManager(settings, storage, functions),
    streamTrigger: new StreamTriggerManager(settings, functions)
  };
}
