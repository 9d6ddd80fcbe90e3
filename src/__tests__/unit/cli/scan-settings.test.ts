import { describe, it, expect } from '@jest/globals';
import { InvalidArgumentError } from 'commander';
import {
  collectList,
  parsePositiveInt,
  resolveScanSettings,
} from '../../../cli/commands/scan.js';
import { validateConfig } from '../../../core/config/index.js';

describe('Scan command options', () => {
  describe('collectList', () => {
    it('should split commas and append to earlier values', () => {
      expect(collectList('us-east-1, eu-west-1,,')).toEqual(['us-east-1', 'eu-west-1']);
      expect(collectList('s3', ['iam'])).toEqual(['iam', 's3']);
    });
  });

  describe('parsePositiveInt', () => {
    it('should parse positive integers', () => {
      expect(parsePositiveInt('12')).toBe(12);
    });

    it.each(['0', '-3', '2.5', 'many'])('should reject %s', (value) => {
      expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
    });
  });

  describe('resolveScanSettings', () => {
    const config = validateConfig({
      regions: ['us-east-1'],
      services: ['s3', 'iam'],
      tags: { Team: ['core'] },
      concurrency: 10,
      timeout: 300,
      output: { format: 'csv', file: 'reports/inventory.csv' },
    });

    it('should use the config when no flags are given', () => {
      expect(resolveScanSettings(config, {})).toEqual({
        regions: ['us-east-1'],
        services: ['s3', 'iam'],
        tags: { Team: ['core'] },
        invalidTags: [],
        concurrency: 10,
        includeGlobal: false,
        timings: false,
        timeout: 300,
        maxAttempts: 5,
        format: 'csv',
        output: 'reports/inventory.csv',
      });
    });

    it('should let flags replace config values', () => {
      const settings = resolveScanSettings(config, {
        region: ['eu-west-1', 'eu-central-1'],
        service: ['lambda'],
        tag: ['Env=prod', 'Env=dev'],
        workers: 4,
        includeGlobal: true,
        format: 'json',
        output: 'out.json',
      });

      expect(settings).toMatchObject({
        regions: ['eu-west-1', 'eu-central-1'],
        services: ['lambda'],
        tags: { Env: ['prod', 'dev'] },
        concurrency: 4,
        includeGlobal: true,
        format: 'json',
        output: 'out.json',
      });
    });

    it('should keep config tags when every tag flag is malformed', () => {
      const settings = resolveScanSettings(config, { tag: ['Env', '=prod'] });

      expect(settings.tags).toEqual({ Team: ['core'] });
      expect(settings.invalidTags).toEqual(['Env', '=prod']);
    });

    it('should fall back to empty lists without config values', () => {
      const settings = resolveScanSettings(validateConfig({}), {});

      expect(settings).toMatchObject({
        regions: [],
        services: [],
        tags: {},
        concurrency: 40,
        format: 'json',
      });
      expect(settings.output).toBeUndefined();
    });
  });
});
