import { describe, it, expect } from '@jest/globals';
import { escapeCsvField, formatCsv, formatJson, formatResult, formatTags } from '../../../core/report/format.js';
import { aggregate } from '../../../core/scan/aggregator.js';
import { TEST_ACCOUNT_ID, failed, fulfilled, makeRecord } from '../../helpers/scan-helpers.js';

const result = aggregate(
  [
    fulfilled('lambda', 'us-east-1', [
      makeRecord({
        id: 'api',
        name: 'Orders, "v2"',
        arn: 'arn:aws:lambda:us-east-1:123456789012:function:api',
        tags: { Team: 'core', Owner: 'John' },
      }),
    ]),
    fulfilled('sqs', 'us-east-1', [makeRecord({ service: 'sqs', type: 'queue', id: 'jobs' })]),
    failed('iam', 'us-east-1', 'denied'),
  ],
  { accountId: TEST_ACCOUNT_ID, now: new Date('2024-05-01T12:00:00.000Z') }
);

describe('Report formatting', () => {
  describe('formatTags', () => {
    it('should render sorted key=value pairs', () => {
      expect(formatTags({ Team: 'core', Owner: 'John' })).toBe('Owner=John; Team=core');
      expect(formatTags({})).toBe('');
    });

    it('should write non-string values as JSON and ignore non-maps', () => {
      expect(formatTags({ Cost: 42, Team: 'core' })).toBe('Cost=42; Team=core');
      expect(formatTags(null)).toBe('');
      expect(formatTags(['a'])).toBe('');
    });
  });

  describe('escapeCsvField', () => {
    it('should quote fields with delimiters, quotes or line breaks', () => {
      expect(escapeCsvField('plain')).toBe('plain');
      expect(escapeCsvField('a,b')).toBe('"a,b"');
      expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    });
  });

  describe('formatCsv', () => {
    it('should write a header and one row per resource', () => {
      expect(formatCsv(result)).toBe(
        'service,type,id,name,region,arn,tags\r\n' +
          'lambda,function,api,"Orders, ""v2""",us-east-1,arn:aws:lambda:us-east-1:123456789012:function:api,Owner=John; Team=core\r\n' +
          'sqs,queue,jobs,,us-east-1,,\r\n'
      );
    });
  });

  describe('formatJson', () => {
    it('should write metadata, errors and resources', () => {
      const parsed: unknown = JSON.parse(formatJson(result));

      expect(parsed).toMatchObject({
        metadata: { accountId: TEST_ACCOUNT_ID, resourceCount: 2, failedUnitCount: 1 },
        errors: [{ service: 'iam', region: 'us-east-1', code: 'provider', message: 'denied' }],
        resources: [{ id: 'api' }, { id: 'jobs' }],
      });
    });

    it('should end with a newline', () => {
      expect(formatJson(result).endsWith('}\n')).toBe(true);
    });
  });

  describe('formatResult', () => {
    it('should dispatch on format', () => {
      expect(formatResult(result, 'csv')).toBe(formatCsv(result));
      expect(formatResult(result, 'json')).toBe(formatJson(result));
    });
  });
});
