import { describe, it, expect, beforeEach } from '@jest/globals';
import { mockClient } from 'aws-sdk-client-mock';
import { SQSClient, ListQueuesCommand, ListQueueTagsCommand } from '@aws-sdk/client-sqs';
import { sqsCollector } from '../../../core/collectors/sqs.js';
import { awsError, testCollectorContext } from '../../helpers/scan-helpers.js';

const sqsMock = mockClient(SQSClient);

describe('SQS collector', () => {
  beforeEach(() => {
    sqsMock.reset();
  });

  it('should build queue records from queue URLs', async () => {
    sqsMock.on(ListQueuesCommand).resolves({
      QueueUrls: [
        'https://sqs.eu-west-1.amazonaws.com/123456789012/orders',
        'https://sqs.eu-west-1.amazonaws.com/123456789012/events.fifo',
      ],
    });
    sqsMock.on(ListQueueTagsCommand).resolves({ Tags: { Team: 'payments' } });

    const records = await sqsCollector.collect('eu-west-1', testCollectorContext);

    expect(records[0]).toEqual({
      service: 'sqs',
      type: 'queue',
      id: 'orders',
      arn: 'arn:aws:sqs:eu-west-1:123456789012:orders',
      name: 'orders',
      region: 'eu-west-1',
      details: { url: 'https://sqs.eu-west-1.amazonaws.com/123456789012/orders', fifo: false },
      tags: { Team: 'payments' },
    });
    expect(records[1]?.details).toMatchObject({ fifo: true });
  });

  it('should return no records for a region without queues', async () => {
    sqsMock.on(ListQueuesCommand).resolves({});

    await expect(sqsCollector.collect('eu-west-1', testCollectorContext)).resolves.toEqual([]);
  });

  it('should classify an opted-out region as unavailable', async () => {
    sqsMock.on(ListQueuesCommand).rejects(awsError('OptInRequired', 'Region not enabled'));

    await expect(sqsCollector.collect('me-south-1', testCollectorContext)).rejects.toMatchObject({
      code: 'unavailable',
      region: 'me-south-1',
    });
  });
});
