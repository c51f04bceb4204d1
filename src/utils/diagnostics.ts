// src/utils/diagnostics.ts

import { engineLogger } from '../logger.js';
import { Outcome, OutcomeKind, UnitStats } from '../types/modbus-types.js';

const logger = engineLogger.createLogger('Diagnostics');

export interface DiagnosticsSummary {
  uptimeSeconds: number;
  totalOutcomes: number;
  outcomeCounts: Record<OutcomeKind, number>;
  /** Attempts beyond the first, over all outcomes */
  totalRetries: number;
  exceptionCodeCounts: Record<number, number>;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  averageResponseTime: number | null;
  lastResponseTime: number | null;
}

/**
 * Collects per-unit success / failure counters and aggregate figures from
 * the outcomes the scanner produces.
 */
class Diagnostics {
  private startTime: number = Date.now();
  private units: Map<number, UnitStats> = new Map();
  private outcomeCounts: Record<OutcomeKind, number> = this._emptyCounts();
  private exceptionCodeCounts: Record<number, number> = {};
  private totalRetries: number = 0;
  private responseTimes = { count: 0, total: 0, min: Infinity, max: 0, last: 0 };

  private _emptyCounts(): Record<OutcomeKind, number> {
    return { success: 0, 'device-error': 0, 'gateway-error': 0, 'no-response': 0 };
  }

  /**
   * Resets all statistics and counters to their initial state.
   */
  reset(): void {
    this.startTime = Date.now();
    this.units = new Map();
    this.outcomeCounts = this._emptyCounts();
    this.exceptionCodeCounts = {};
    this.totalRetries = 0;
    this.responseTimes = { count: 0, total: 0, min: Infinity, max: 0, last: 0 };
  }

  resetUnit(unitId: number): void {
    this.units.delete(unitId);
  }

  recordOutcome(unitId: number, outcome: Outcome): void {
    const stats = this.units.get(unitId) ?? { success: 0, fail: 0 };
    if (outcome.kind === 'success') stats.success += 1;
    else stats.fail += 1;
    this.units.set(unitId, stats);

    this.outcomeCounts[outcome.kind] += 1;
    this.totalRetries += outcome.attempts - 1;

    switch (outcome.kind) {
      case 'device-error':
        this._countException(outcome.exceptionCode);
        this._recordResponseTime(outcome.responseTime);
        break;
      case 'gateway-error':
        this._countException(outcome.code);
        this._recordResponseTime(outcome.responseTime);
        break;
      case 'success':
        this._recordResponseTime(outcome.responseTime);
        break;
      case 'no-response':
        break;
    }

    logger.trace(`Unit ${unitId}: ${outcome.kind} (success ${stats.success}, fail ${stats.fail})`, { unitId });
  }

  private _countException(code: number): void {
    this.exceptionCodeCounts[code] = (this.exceptionCodeCounts[code] ?? 0) + 1;
  }

  private _recordResponseTime(ms: number): void {
    const rt = this.responseTimes;
    rt.count += 1;
    rt.total += ms;
    rt.min = Math.min(rt.min, ms);
    rt.max = Math.max(rt.max, ms);
    rt.last = ms;
  }

  /**
   * Counters for one unit; zeros for a unit never seen.
   */
  getUnitStats(unitId: number): UnitStats {
    const stats = this.units.get(unitId);
    return stats ? { ...stats } : { success: 0, fail: 0 };
  }

  getSummary(): DiagnosticsSummary {
    const rt = this.responseTimes;
    const total = Object.values(this.outcomeCounts).reduce((sum, n) => sum + n, 0);
    return {
      uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
      totalOutcomes: total,
      outcomeCounts: { ...this.outcomeCounts },
      totalRetries: this.totalRetries,
      exceptionCodeCounts: { ...this.exceptionCodeCounts },
      minResponseTime: rt.count ? rt.min : null,
      maxResponseTime: rt.count ? rt.max : null,
      averageResponseTime: rt.count ? rt.total / rt.count : null,
      lastResponseTime: rt.count ? rt.last : null,
    };
  }
}

export default Diagnostics;
