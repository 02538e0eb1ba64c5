import {
  SNSClient,
  CreateTopicCommand,
  DeleteTopicCommand,
  GetTopicAttributesCommand,
  ListSubscriptionsByTopicCommand,
  SubscribeCommand,
  type Subscription
} from '@aws-sdk/client-sns';
import type { ResourceDetails, ResourceHandle } from '../types';
import { errorMessage, isNotFoundError } from '../errors';
import type { ProviderSettings, ProvisionTarget, ProvisioningResult, ResourceProvider, TopicInput } from './types';

export class SNSManager implements ResourceProvider<TopicInput> {
  readonly kind = 'topic' as const;
  private client: SNSClient;

  constructor(private readonly settings: ProviderSettings) {
    this.client = new SNSClient({ region: settings.region, profile: settings.profile });
  }

  async exists(target: ProvisionTarget<TopicInput>): Promise<boolean> {
    if (!target.identifier) {
      return false;
    }
    return (await this.getTopicAttributesIfExists(target.identifier)) !== null;
  }

  /**
   * CreateTopic returns the existing ARN when the name is taken by this account.
   */
  async create(target: ProvisionTarget<TopicInput>): Promise<ProvisioningResult> {
    const topicName = target.name;
    let topicArn: string;

    try {
      const result = await this.client.send(new CreateTopicCommand({
        Name: topicName,
        Tags: Object.keys(target.input.tags).length > 0
          ? Object.entries(target.input.tags).map(([Key, Value]) => ({ Key, Value }))
          : undefined
      }));
      if (!result.TopicArn) {
        throw new Error('CreateTopic returned no ARN');
      }
      topicArn = result.TopicArn;
    } catch (error) {
      throw new Error(`Failed to create SNS topic ${topicName}: ${errorMessage(error)}`, { cause: error });
    }

    await this.ensureEmailSubscription(topicArn, target.input.subscriptionEmail);

    return {
      identifier: topicArn,
      status: 'created',
      details: { topicName, topicArn }
    };
  }

  async converge(target: ProvisionTarget<TopicInput>, handle: ResourceHandle): Promise<ProvisioningResult> {
    const subscribed = await this.ensureEmailSubscription(handle.identifier, target.input.subscriptionEmail);
    return {
      identifier: handle.identifier,
      status: subscribed ? 'updated' : 'unchanged',
      details: { topicName: target.name, topicArn: handle.identifier }
    };
  }

  async describe(handle: ResourceHandle): Promise<ResourceDetails> {
    const attributes = await this.getTopicAttributesIfExists(handle.identifier);
    if (!attributes) {
      throw new Error(`SNS topic ${handle.identifier} does not exist`);
    }
    return {
      topicName: handle.name,
      topicArn: handle.identifier
    };
  }

  async delete(handle: ResourceHandle): Promise<void> {
    try {
      await this.client.send(new DeleteTopicCommand({ TopicArn: handle.identifier }));
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw new Error(`Failed to delete SNS topic ${handle.identifier}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Subscribe the address only when no e-mail subscription for it exists,
   * confirmed or pending.
   * @returns true when a subscribe request was sent
   */
  async ensureEmailSubscription(topicArn: string, email?: string): Promise<boolean> {
    if (!email) {
      return false;
    }

    const subscriptions = await this.listSubscriptions(topicArn);
    const existing = subscriptions.find(subscription =>
      subscription.Protocol === 'email' && subscription.Endpoint?.toLowerCase() === email.toLowerCase());
    if (existing) {
      return false;
    }

    try {
      await this.client.send(new SubscribeCommand({
        TopicArn: topicArn,
        Protocol: 'email',
        Endpoint: email
      }));
    } catch (error) {
      throw new Error(`Failed to subscribe ${email} to ${topicArn}: ${errorMessage(error)}`, { cause: error });
    }

    this.settings.reporter.info(`Subscription confirmation sent to ${email}`);
    return true;
  }

  private async listSubscriptions(topicArn: string): Promise<Subscription[]> {
    const subscriptions: Subscription[] = [];
    let nextToken: string | undefined;

    do {
      const page = await this.client.send(new ListSubscriptionsByTopicCommand({
        TopicArn: topicArn,
        NextToken: nextToken
      }));
      subscriptions.push(...(page.Subscriptions ?? []));
      nextToken = page.NextToken;
    } while (nextToken);

    return subscriptions;
  }

  private async getTopicAttributesIfExists(topicArn: string): Promise<Record<string, string> | null> {
    try {
      const result = await this.client.send(new GetTopicAttributesCommand({ TopicArn: topicArn }));
      return result.Attributes ?? {};
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }
}
