import { describe, expect, it } from 'vitest';
import Diagnostics from '../src/utils/diagnostics.js';

describe('Diagnostics', () => {
  it('aggregates outcomes', () => {
    const diagnostics = new Diagnostics();

    diagnostics.recordOutcome(1, {
      kind: 'success',
      rawBytes: new Uint8Array(2),
      registers: [0],
      attempts: 1,
      responseTime: 10,
    });
    diagnostics.recordOutcome(1, {
      kind: 'success',
      rawBytes: new Uint8Array(2),
      registers: [0],
      attempts: 2,
      responseTime: 30,
    });
    diagnostics.recordOutcome(4, {
      kind: 'gateway-error',
      code: 0x0b,
      message: 'Gateway Target Device Failed to Respond',
      attempts: 1,
      responseTime: 20,
    });
    diagnostics.recordOutcome(3, { kind: 'no-response', attempts: 3, elapsed: 300 });

    expect(diagnostics.getUnitStats(1)).toEqual({ success: 2, fail: 0 });
    expect(diagnostics.getUnitStats(3)).toEqual({ success: 0, fail: 1 });

    const summary = diagnostics.getSummary();
    expect(summary.totalOutcomes).toBe(4);
    expect(summary.totalRetries).toBe(3);
    expect(summary.exceptionCodeCounts).toEqual({ 11: 1 });
    expect(summary.minResponseTime).toBe(10);
    expect(summary.maxResponseTime).toBe(30);
    expect(summary.averageResponseTime).toBe(20);
    expect(summary.lastResponseTime).toBe(20);
  });

  it('has no response times before any answer', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordOutcome(3, { kind: 'no-response', attempts: 1, elapsed: 100 });

    expect(diagnostics.getSummary().averageResponseTime).toBeNull();
  });

  it('resets one unit or everything', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordOutcome(1, { kind: 'no-response', attempts: 1, elapsed: 100 });
    diagnostics.recordOutcome(2, { kind: 'no-response', attempts: 1, elapsed: 100 });

    diagnostics.resetUnit(1);
    expect(diagnostics.getUnitStats(1)).toEqual({ success: 0, fail: 0 });
    expect(diagnostics.getUnitStats(2)).toEqual({ success: 0, fail: 1 });

    diagnostics.reset();
    expect(diagnostics.getSummary().totalOutcomes).toBe(0);
  });
});
