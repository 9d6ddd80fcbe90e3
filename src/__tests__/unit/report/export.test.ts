import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { defaultOutputPath, exportFile, fileTimestamp } from '../../../core/report/export.js';

describe('Report export', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `resmap-report-${Date.now()}-${Math.random().toString(36).substring(7)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  it('should format local timestamps as YYYYMMDD_HHMMSS', () => {
    expect(fileTimestamp(new Date(2024, 0, 5, 7, 8, 9))).toBe('20240105_070809');
  });

  it('should name reports after the account', () => {
    expect(defaultOutputPath('123456789012', 'csv', new Date(2024, 10, 30, 23, 59, 1))).toBe(
      '123456789012_inventory_20241130_235901.csv'
    );
  });

  it('should create parent directories', async () => {
    const target = join(testDir, 'nested', 'dir', 'report.json');

    const written = await exportFile('{}\n', target);

    expect(written).toBe(target);
    expect(readFileSync(target, 'utf-8')).toBe('{}\n');
  });
});
