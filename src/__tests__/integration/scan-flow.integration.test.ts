/**
 * Scan Flow Integration Tests
 *
 * Plan → schedule → aggregate with in-process collectors
 */

import { describe, it, expect } from '@jest/globals';
import { runScan } from '../../core/scan/scan.js';
import { CollectorRegistry } from '../../core/collectors/registry.js';
import type { ScanPlan } from '../../core/scan/region-resolver.js';
import {
  TEST_ACCOUNT_ID,
  awsError,
  delay,
  failingCollector,
  fakeCollector,
  makeRecord,
  testCredentials,
} from '../helpers/scan-helpers.js';

function buildRegistry() {
  const lambda = fakeCollector('lambda', async (region) => {
    await delay(2);
    return [
      makeRecord({ id: 'api', region, name: 'old' }),
      makeRecord({ id: 'worker', region, tags: { Owner: 'Jane' } }),
      makeRecord({ id: 'api', region, name: 'new', tags: { Owner: 'John' } }),
    ];
  });
  const iam = fakeCollector('iam', (region) => [
    makeRecord({ service: 'iam', type: 'role', id: 'AROAAPP', region, tags: { Owner: 'John' } }),
    makeRecord({
      service: 'iam',
      type: 'role',
      id: 'AROALINKED',
      region,
      details: { path: '/aws-service-role/support.amazonaws.com/' },
    }),
  ]);
  const sqs = failingCollector('sqs', awsError('AccessDenied', 'sqs:ListQueues denied'));

  return { registry: new CollectorRegistry([lambda, iam, sqs]), lambda, iam };
}

const baseOptions = {
  accountId: TEST_ACCOUNT_ID,
  credentials: testCredentials,
  enabledRegions: ['us-east-1'],
  services: ['lambda', 'sqs', 'iam'],
  concurrency: 2,
  now: () => new Date('2024-05-01T12:00:00.000Z'),
};

describe('Scan Flow Integration', () => {
  it('should keep records with irregular details or tags next to regular ones', async () => {
    const lambda = fakeCollector('lambda', (region) => {
      const oddTags = makeRecord({ id: 'odd', region });
      Reflect.set(oddTags, 'tags', { Cost: 42 });
      const nullDetails = makeRecord({ id: 'odd2', region });
      Reflect.set(nullDetails, 'details', null);
      return [makeRecord({ id: 'good', region }), oddTags, nullDetails];
    });

    const result = await runScan({
      ...baseOptions,
      services: ['lambda'],
      registry: new CollectorRegistry([lambda]),
    });

    expect(result.errors).toEqual([]);
    expect(result.records.map((r) => r.id)).toEqual(['good', 'odd', 'odd2']);
  });

  it('should merge successful units and report the failed one', async () => {
    const { registry } = buildRegistry();
    const plans: ScanPlan[] = [];

    const result = await runScan({
      ...baseOptions,
      registry,
      onPlan: (plan) => {
        plans.push(plan);
      },
    });

    expect(plans).toHaveLength(1);
    expect(plans[0]?.units.map((u) => `${u.service}/${u.region}`)).toEqual([
      'iam/us-east-1',
      'lambda/us-east-1',
      'sqs/us-east-1',
    ]);

    expect(result.errors).toEqual([
      { service: 'sqs', region: 'us-east-1', code: 'access-denied', message: 'sqs:ListQueues denied' },
    ]);

    expect(result.records.map((r) => `${r.service}/${r.type}/${r.id}/${r.name ?? ''}`)).toEqual([
      'iam/role/AROAAPP/',
      'lambda/function/api/new',
      'lambda/function/worker/',
    ]);

    expect(result.metadata).toMatchObject({
      accountId: TEST_ACCOUNT_ID,
      timestamp: '2024-05-01T12:00:00.000Z',
      servicesScanned: 3,
      regionsScanned: 1,
      unitCount: 3,
      failedUnitCount: 1,
      skippedUnitCount: 0,
      cancelled: false,
      resourceCount: 3,
      excludedCount: 1,
    });
  });

  it('should apply the tag filter across services', async () => {
    const { registry } = buildRegistry();

    const result = await runScan({ ...baseOptions, registry, tagFilter: { Owner: ['John'] } });

    expect(result.records.map((r) => `${r.service}/${r.id}`)).toEqual(['iam/AROAAPP', 'lambda/api']);
  });

  it('should skip global services outside the region filter', async () => {
    const { registry, iam } = buildRegistry();

    const result = await runScan({
      ...baseOptions,
      enabledRegions: ['us-east-1', 'eu-west-1'],
      regions: ['eu-west-1'],
      registry,
    });

    expect(iam.calls).toEqual([]);
    expect(result.records.map((r) => `${r.service}/${r.region}/${r.id}`)).toEqual([
      'lambda/eu-west-1/api',
      'lambda/eu-west-1/worker',
    ]);
    expect(result.errors.map((e) => `${e.service}/${e.region}`)).toEqual(['sqs/eu-west-1']);
  });

  it('should return a partial result when cancelled', async () => {
    const { registry, lambda } = buildRegistry();
    const controller = new AbortController();
    controller.abort();

    const result = await runScan({ ...baseOptions, registry, signal: controller.signal });

    expect(lambda.calls).toEqual([]);
    expect(result.records).toEqual([]);
    expect(result.metadata.cancelled).toBe(true);
    expect(result.metadata.skippedUnitCount).toBe(3);
  });

  it('should attach service timings when requested', async () => {
    const { registry } = buildRegistry();

    const result = await runScan({ ...baseOptions, registry, timings: true });

    expect(result.metadata.serviceTimings?.map((t) => t.service).sort()).toEqual(['iam', 'lambda', 'sqs']);
  });
});
