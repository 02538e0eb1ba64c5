import {
  S3Client,
  CreateBucketCommand,
  BucketLocationConstraint,
  PutBucketWebsiteCommand,
  PutBucketPolicyCommand,
  PutBucketTaggingCommand,
  PutObjectCommand,
  HeadBucketCommand,
  GetBucketLocationCommand,
  PutPublicAccessBlockCommand,
  ListObjectVersionsCommand,
  ListObjectsV2Command,
  DeleteObjectsCommand,
  DeleteBucketCommand,
  GetBucketNotificationConfigurationCommand,
  PutBucketNotificationConfigurationCommand,
  type LambdaFunctionConfiguration,
  type ObjectIdentifier
} from '@aws-sdk/client-s3';
import { readFileSync } from 'fs';
import type { ResourceDetails, ResourceHandle } from '../types';
import { FatalDeploymentError, errorMessage, errorName, isAlreadyExistsError, isNotFoundError, httpStatusCode } from '../errors';
import type { BucketInput, ProviderSettings, ProvisionTarget, ProvisioningResult, StorageProvider, UploadResult } from './types';
import { waitUntil } from './wait';
import { partitionForRegion } from './arn';

/** DeleteObjects accepts at most this many keys per request. */
export const DELETE_BATCH_SIZE = 1000;

export class S3Manager implements StorageProvider {
  readonly kind = 'storage' as const;
  private client: S3Client;
  private region: string;

  constructor(private readonly settings: ProviderSettings) {
    this.region = settings.region;
    this.client = this.createClient(settings.region);
  }

  async exists(target: ProvisionTarget<BucketInput>): Promise<boolean> {
    return (await this.getBucketIfExists(target.name)) !== null;
  }

  async create(target: ProvisionTarget<BucketInput>): Promise<ProvisioningResult> {
    const bucketName = target.name;
    let status: ProvisioningResult['status'] = 'created';
    const configuration = this.region !== 'us-east-1'
      ? { LocationConstraint: this.locationConstraint(bucketName) }
      : undefined;

    try {
      await this.client.send(new CreateBucketCommand({
        Bucket: bucketName,
        CreateBucketConfiguration: configuration
      }));
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw new Error(`Failed to create S3 bucket ${bucketName}: ${errorMessage(error)}`, { cause: error });
      }
      status = 'unchanged';
    }

    if (Object.keys(target.input.tags).length > 0) {
      await this.client.send(new PutBucketTaggingCommand({
        Bucket: bucketName,
        Tagging: {
          TagSet: Object.entries(target.input.tags).map(([Key, Value]) => ({ Key, Value }))
        }
      }));
    }

    return {
      identifier: this.bucketArn(bucketName),
      status,
      details: { bucketName, region: this.region }
    };
  }

  async describe(handle: ResourceHandle): Promise<ResourceDetails> {
    const region = await this.getBucketLocation(handle.name);
    return { bucketName: handle.name, region: region ?? this.region };
  }

  /**
   * Empty every object version, delete marker and object, then remove the bucket.
   * A bucket that no longer exists counts as deleted.
   */
  async delete(handle: ResourceHandle): Promise<void> {
    const bucketName = handle.name;

    let region: string | undefined;
    try {
      region = await this.getBucketLocation(bucketName);
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw error;
    }

    const client = region && region !== this.region ? this.createClient(region) : this.client;

    try {
      await this.emptyBucket(client, bucketName);
      await client.send(new DeleteBucketCommand({ Bucket: bucketName }));
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw new Error(`Failed to delete S3 bucket ${bucketName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async uploadFile(bucketName: string, key: string, filePath: string, contentType?: string): Promise<UploadResult> {
    try {
      const fileContent = readFileSync(filePath);

      const result = await this.client.send(new PutObjectCommand({
        Bucket: bucketName,
        Key: key,
        Body: fileContent,
        ContentType: contentType || this.getContentType(filePath)
      }));

      return {
        key,
        etag: result.ETag || '',
        url: `https://${bucketName}.s3.amazonaws.com/${key}`
      };
    } catch (error) {
      throw new Error(`Failed to upload file ${filePath} to S3: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Make the bucket publicly readable, upload the index page and enable website hosting.
   * Every call here is a replay-safe overwrite.
   */
  async publishWebsite(bucketName: string, indexDocument: string, body: string): Promise<string> {
    try {
      await this.configurePublicAccess(bucketName, false);
      await this.configurePublicReadPolicy(bucketName);

      await this.client.send(new PutObjectCommand({
        Bucket: bucketName,
        Key: indexDocument,
        Body: body,
        ContentType: 'text/html; charset=utf-8'
      }));

      return await this.configureWebsiteHosting(bucketName, indexDocument);
    } catch (error) {
      throw new Error(`Failed to publish website to ${bucketName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getFunctionNotifications(bucketName: string): Promise<LambdaFunctionConfiguration[]> {
    const result = await this.client.send(new GetBucketNotificationConfigurationCommand({ Bucket: bucketName }));
    return result.LambdaFunctionConfigurations ?? [];
  }

  async putFunctionNotifications(bucketName: string, configurations: LambdaFunctionConfiguration[]): Promise<void> {
    await this.client.send(new PutBucketNotificationConfigurationCommand({
      Bucket: bucketName,
      NotificationConfiguration: {
        LambdaFunctionConfigurations: configurations
      }
    }));
  }

  /**
   * Block until the bucket's notification configuration targets the given function.
   */
  async waitForFunctionNotification(bucketName: string, functionArn: string): Promise<void> {
    await waitUntil(async () => {
      const configurations = await this.getFunctionNotifications(bucketName);
      return configurations.some(configuration => configuration.LambdaFunctionArn === functionArn) ? true : undefined;
    }, {
      timeoutMs: this.settings.propagationTimeoutMs,
      intervalMs: this.settings.propagationIntervalMs,
      description: `bucket ${bucketName} to notify ${functionArn}`,
      resource: bucketName
    });
  }

  private async emptyBucket(client: S3Client, bucketName: string): Promise<void> {
    let keyMarker: string | undefined;
    let versionIdMarker: string | undefined;
    let removed = 0;

    do {
      const page = await client.send(new ListObjectVersionsCommand({
        Bucket: bucketName,
        KeyMarker: keyMarker,
        VersionIdMarker: versionIdMarker
      }));

      const objects: ObjectIdentifier[] = [];
      for (const version of [...(page.Versions ?? []), ...(page.DeleteMarkers ?? [])]) {
        if (version.Key) {
          objects.push({ Key: version.Key, VersionId: version.VersionId });
        }
      }
      removed += await this.deleteInBatches(client, bucketName, objects);

      keyMarker = page.IsTruncated ? page.NextKeyMarker : undefined;
      versionIdMarker = page.IsTruncated ? page.NextVersionIdMarker : undefined;
    } while (keyMarker !== undefined);

    let continuationToken: string | undefined;
    do {
      const page = await client.send(new ListObjectsV2Command({
        Bucket: bucketName,
        ContinuationToken: continuationToken
      }));

      const objects: ObjectIdentifier[] = [];
      for (const object of page.Contents ?? []) {
        if (object.Key) {
          objects.push({ Key: object.Key });
        }
      }
      removed += await this.deleteInBatches(client, bucketName, objects);

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken !== undefined);

    if (removed > 0) {
      this.settings.reporter.info(`Emptied ${removed} objects from ${bucketName}`);
    }
  }

  private async deleteInBatches(client: S3Client, bucketName: string, objects: ObjectIdentifier[]): Promise<number> {
    for (let i = 0; i < objects.length; i += DELETE_BATCH_SIZE) {
      await client.send(new DeleteObjectsCommand({
        Bucket: bucketName,
        Delete: {
          Objects: objects.slice(i, i + DELETE_BATCH_SIZE),
          Quiet: true
        }
      }));
    }
    return objects.length;
  }

  private async configureWebsiteHosting(bucketName: string, indexDocument: string): Promise<string> {
    await this.client.send(new PutBucketWebsiteCommand({
      Bucket: bucketName,
      WebsiteConfiguration: {
        IndexDocument: { Suffix: indexDocument }
      }
    }));

    const region = (await this.getBucketLocation(bucketName)) ?? this.region;
    return `http://${bucketName}.s3-website-${region}.amazonaws.com`;
  }

  private async configurePublicAccess(bucketName: string, blockPublicAccess: boolean): Promise<void> {
    await this.client.send(new PutPublicAccessBlockCommand({
      Bucket: bucketName,
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: blockPublicAccess,
        IgnorePublicAcls: blockPublicAccess,
        BlockPublicPolicy: blockPublicAccess,
        RestrictPublicBuckets: blockPublicAccess
      }
    }));
  }

  private async configurePublicReadPolicy(bucketName: string): Promise<void> {
    const policy = {
      Version: '2012-10-17',
      Statement: [
        {
          Sid: 'PublicReadGetObject',
          Effect: 'Allow',
          Principal: '*',
          Action: 's3:GetObject',
          Resource: `${this.bucketArn(bucketName)}/*`
        }
      ]
    };

    await this.client.send(new PutBucketPolicyCommand({
      Bucket: bucketName,
      Policy: JSON.stringify(policy)
    }));
  }

  private async getBucketIfExists(bucketName: string): Promise<{ bucketName: string } | null> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucketName }));
      return { bucketName };
    } catch (error) {
      // 403: the name is taken by another account, which create will report
      if (isNotFoundError(error) || httpStatusCode(error) === 403 || errorName(error) === 'Forbidden') {
        return null;
      }
      throw error;
    }
  }

  /**
   * us-east-1 buckets report an empty location constraint.
   */
  private async getBucketLocation(bucketName: string): Promise<string | undefined> {
    const result = await this.client.send(new GetBucketLocationCommand({ Bucket: bucketName }));
    const location: string | undefined = result.LocationConstraint;
    if (!location || location === 'US') {
      return 'us-east-1';
    }
    return location === 'EU' ? 'eu-west-1' : location;
  }

  private locationConstraint(bucketName: string): BucketLocationConstraint {
    const constraint = Object.values(BucketLocationConstraint).find(value => value === this.region);
    if (!constraint) {
      throw new FatalDeploymentError(`Region ${this.region} is not a valid bucket location`, bucketName);
    }
    return constraint;
  }

  private bucketArn(bucketName: string): string {
    return `arn:${partitionForRegion(this.region)}:s3:::${bucketName}`;
  }

  private createClient(region: string): S3Client {
    return new S3Client({ region, profile: this.settings.profile });
  }

  private getContentType(filePath: string): string {
    const ext = filePath.split('.').pop()?.toLowerCase();

    const contentTypes: { [key: string]: string } = {
      'html': 'text/html',
      'css': 'text/css',
      'js': 'application/javascript',
      'json': 'application/json',
      'csv': 'text/csv',
      'png': 'image/png',
      'jpg': 'image/jpeg',
      'jpeg': 'image/jpeg',
      'svg': 'image/svg+xml',
      'ico': 'image/x-icon',
      'txt': 'text/plain'
    };

    return contentTypes[ext || ''] || 'application/octet-stream';
  }
}
