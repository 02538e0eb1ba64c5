import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CreateTopicCommand,
  DeleteTopicCommand,
  ListSubscriptionsByTopicCommand,
  SubscribeCommand
} from '@aws-sdk/client-sns';
import { SNSManager } from '../sns-manager';
import { RecordingReporter, awsError, testSettings } from '../../__tests__/helpers';
import type { ResourceHandle } from '../../types';

const { send } = vi.hoisted(() => ({ send: vi.fn() }));

vi.mock('@aws-sdk/client-sns', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@aws-sdk/client-sns')>();
  return {
    ...actual,
    SNSClient: class {
      send = send;
    }
  };
});

const TOPIC_ARN = 'arn:aws:sns:us-east-1:111122223333:NoStock-20240101-abcd1234';

const handle: ResourceHandle = {
  kind: 'topic',
  name: 'NoStock-20240101-abcd1234',
  identifier: TOPIC_ARN,
  status: 'created'
};

describe('SNSManager', () => {
  let manager: SNSManager;
  let reporter: RecordingReporter;

  beforeEach(() => {
    send.mockReset();
    reporter = new RecordingReporter();
    manager = new SNSManager(testSettings(reporter));
  });

  describe('exists', () => {
    it('should need a recorded ARN', async () => {
      await expect(manager.exists({ name: 'NoStock-20240101-abcd1234', input: { tags: {} } })).resolves.toBe(false);
      expect(send).not.toHaveBeenCalled();
    });

    it('should check the recorded topic', async () => {
      send.mockResolvedValueOnce({ Attributes: { TopicArn: TOPIC_ARN } });

      await expect(manager.exists({ name: 'NoStock-20240101-abcd1234', input: { tags: {} }, identifier: TOPIC_ARN }))
        .resolves.toBe(true);
    });

    it('should report a deleted topic', async () => {
      send.mockRejectedValueOnce(awsError('NotFoundException', 404));

      await expect(manager.exists({ name: 'NoStock-20240101-abcd1234', input: { tags: {} }, identifier: TOPIC_ARN }))
        .resolves.toBe(false);
    });
  });

  describe('create', () => {
    it('should create the topic without a subscription when no e-mail is configured', async () => {
      send.mockResolvedValueOnce({ TopicArn: TOPIC_ARN });

      const result = await manager.create({ name: 'NoStock-20240101-abcd1234', input: { tags: {} } });

      expect(result).toEqual({
        identifier: TOPIC_ARN,
        status: 'created',
        details: { topicName: 'NoStock-20240101-abcd1234', topicArn: TOPIC_ARN }
      });
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('should subscribe the configured address', async () => {
      send.mockResolvedValueOnce({ TopicArn: TOPIC_ARN });
      send.mockResolvedValueOnce({ Subscriptions: [] });
      send.mockResolvedValueOnce({ SubscriptionArn: 'pending confirmation' });

      await manager.create({
        name: 'NoStock-20240101-abcd1234',
        input: { subscriptionEmail: 'ops@example.com', tags: { Team: 'inventory' } }
      });

      const create = send.mock.calls[0][0];
      if (create instanceof CreateTopicCommand) {
        expect(create.input).toEqual({ Name: 'NoStock-20240101-abcd1234', Tags: [{ Key: 'Team', Value: 'inventory' }] });
      }
      const subscribe = send.mock.calls[2][0];
      expect(subscribe).toBeInstanceOf(SubscribeCommand);
      if (subscribe instanceof SubscribeCommand) {
        expect(subscribe.input).toEqual({ TopicArn: TOPIC_ARN, Protocol: 'email', Endpoint: 'ops@example.com' });
      }
      expect(reporter.infos).toEqual(['Subscription confirmation sent to ops@example.com']);
    });

    it('should wrap creation failures', async () => {
      send.mockRejectedValueOnce(awsError('InvalidParameterException', 400, 'Invalid parameter: Topic Name'));

      await expect(manager.create({ name: 'bad name', input: { tags: {} } }))
        .rejects.toThrow('Failed to create SNS topic bad name: Invalid parameter: Topic Name');
    });
  });

  describe('converge', () => {
    it('should not subscribe an address twice', async () => {
      send.mockResolvedValueOnce({
        Subscriptions: [{ Protocol: 'email', Endpoint: 'Ops@Example.com', SubscriptionArn: 'PendingConfirmation' }]
      });

      const result = await manager.converge(
        { name: 'NoStock-20240101-abcd1234', input: { subscriptionEmail: 'ops@example.com', tags: {} } },
        handle
      );

      expect(result.status).toBe('unchanged');
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('should search every page of subscriptions', async () => {
      send.mockResolvedValueOnce({ Subscriptions: [{ Protocol: 'sms', Endpoint: '+15550100' }], NextToken: 'next' });
      send.mockResolvedValueOnce({ Subscriptions: [] });
      send.mockResolvedValueOnce({});

      const result = await manager.converge(
        { name: 'NoStock-20240101-abcd1234', input: { subscriptionEmail: 'ops@example.com', tags: {} } },
        handle
      );

      expect(result.status).toBe('updated');
      const second = send.mock.calls[1][0];
      expect(second).toBeInstanceOf(ListSubscriptionsByTopicCommand);
      if (second instanceof ListSubscriptionsByTopicCommand) {
        expect(second.input.NextToken).toBe('next');
      }
    });
  });

  describe('describe', () => {
    it('should fail for a topic that is gone', async () => {
      send.mockRejectedValueOnce(awsError('NotFoundException', 404));

      await expect(manager.describe(handle)).rejects.toThrow(`SNS topic ${TOPIC_ARN} does not exist`);
    });
  });

  describe('delete', () => {
    it('should delete the topic by ARN', async () => {
      send.mockResolvedValueOnce({});

      await manager.delete(handle);

      const command = send.mock.calls[0][0];
      expect(command).toBeInstanceOf(DeleteTopicCommand);
      if (command instanceof DeleteTopicCommand) {
        expect(command.input).toEqual({ TopicArn: TOPIC_ARN });
      }
    });

    it('should treat a missing topic as deleted', async () => {
      send.mockRejectedValueOnce(awsError('NotFoundException', 404));

      await expect(manager.delete(handle)).resolves.toBeUndefined();
    });
  });
});
