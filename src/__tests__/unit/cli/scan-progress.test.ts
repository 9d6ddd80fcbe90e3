import { describe, it, expect, jest } from '@jest/globals';
import { createInterruptHandler, progressUpdate } from '../../../cli/commands/scan.js';
import { fulfilled, makeUnit } from '../../helpers/scan-helpers.js';

describe('Scan command runtime helpers', () => {
  describe('createInterruptHandler', () => {
    it('should cancel on the first interrupt and force an exit on the second', () => {
      const controller = new AbortController();
      const onCancel = jest.fn();
      const onForceExit = jest.fn();
      const handler = createInterruptHandler(controller, { onCancel, onForceExit });

      handler();

      expect(controller.signal.aborted).toBe(true);
      expect(onCancel).toHaveBeenCalledTimes(1);
      expect(onForceExit).not.toHaveBeenCalled();

      handler();

      expect(onCancel).toHaveBeenCalledTimes(1);
      expect(onForceExit).toHaveBeenCalledTimes(1);
    });

    it('should still need two interrupts after a timeout abort', () => {
      const controller = new AbortController();
      controller.abort();
      const onForceExit = jest.fn();
      const handler = createInterruptHandler(controller, { onCancel: jest.fn(), onForceExit });

      handler();

      expect(onForceExit).not.toHaveBeenCalled();
    });
  });

  describe('progressUpdate', () => {
    it('should count skipped units so the bar never moves backwards', () => {
      const skipped = progressUpdate({
        type: 'unit-skipped',
        unit: makeUnit('sqs', 'eu-west-1'),
        completed: 3,
        skipped: 2,
        total: 10,
      });
      const completed = progressUpdate({
        type: 'unit-complete',
        outcome: fulfilled('lambda', 'us-east-1', []),
        completed: 4,
        skipped: 2,
        total: 10,
      });

      expect(skipped).toEqual({ value: 5, current: 'cancelled' });
      expect(completed).toEqual({ value: 6, current: 'lambda/us-east-1' });
    });

    it('should ignore service summaries', () => {
      expect(
        progressUpdate({ type: 'service-complete', service: 'sqs', resources: 0, failedUnits: 0 })
      ).toBeUndefined();
    });
  });
});
