import { afterEach, describe, expect, it, vi } from 'vitest';
import { foundUnitIds, isDeviceFound, ScanOrchestrator } from '../src/scan-orchestrator.js';
import { TransactionRunner } from '../src/transaction-runner.js';
import { ModbusFramer } from '../src/framers/modbus-framer.js';
import { RtuFramer } from '../src/framers/rtu-framer.js';
import { TcpFramer } from '../src/framers/tcp-framer.js';
import { EmulatedBusTransport } from '../src/slave-emulator/emulated-bus-transport.js';
import { DeviceBehaviour } from '../src/slave-emulator/slave-emulator.js';
import { ModbusConfigError, ModbusInvalidAddressError, ModbusTransportError } from '../src/errors.js';
import { ProbeTemplate } from '../src/types/modbus-types.js';
import { createBus } from './helpers.js';

const template = (overrides: Partial<ProbeTemplate> = {}): ProbeTemplate => ({
  registerType: 'holding',
  address: 0,
  count: 1,
  timeout: 100,
  maxRetries: 1,
  ...overrides,
});

const SIX_DEVICES: Array<[number, DeviceBehaviour]> = [
  [1, { kind: 'healthy' }],
  [2, { kind: 'exception', exceptionCode: 0x02 }],
  [3, { kind: 'silent' }],
  [4, { kind: 'exception', exceptionCode: 0x0b }],
  [5, { kind: 'slow', delay: 20 }],
  [6, { kind: 'flaky', delay: 400 }],
];

describe('ScanOrchestrator', () => {
  let transport: EmulatedBusTransport | undefined;

  afterEach(() => {
    transport?.close();
    transport = undefined;
  });

  async function setup(framer: ModbusFramer, devices: Array<[number, DeviceBehaviour]>): Promise<ScanOrchestrator> {
    transport = await createBus(framer, devices);
    return new ScanOrchestrator(new TransactionRunner(transport, framer));
  }

  it.each([
    ['RTU', new RtuFramer()],
    ['TCP', new TcpFramer()],
  ])('classifies a mixed bus over %s', async (_name, framer) => {
    const orchestrator = await setup(framer, SIX_DEVICES);

    const result = await orchestrator.scan(1, 6, template(), 1);

    expect(result.complete).toBe(true);
    expect([...result.outcomes.keys()]).toEqual([1, 2, 3, 4, 5, 6]);
    expect(Object.fromEntries([...result.outcomes].map(([id, o]) => [id, o.kind]))).toEqual({
      1: 'success',
      2: 'device-error',
      3: 'no-response',
      4: 'gateway-error',
      5: 'success',
      6: 'success',
    });
    expect(foundUnitIds(result)).toEqual([1, 2, 4, 5, 6]);
    expect([1, 2, 3, 4, 5, 6].map(id => transport?.requestCount(id))).toEqual([1, 1, 2, 1, 1, 2]);
  });

  it('returns one outcome per unit id with several workers', async () => {
    const orchestrator = await setup(new TcpFramer(), [
      [2, { kind: 'healthy' }],
      [5, { kind: 'slow', delay: 10 }],
      [9, { kind: 'healthy' }],
    ]);
    const onOutcome = vi.fn();

    const result = await orchestrator.scan(1, 10, template({ timeout: 50, maxRetries: 0 }), 3, { onOutcome });

    expect([...result.outcomes.keys()]).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(foundUnitIds(result)).toEqual([2, 5, 9]);
    expect(onOutcome).toHaveBeenCalledTimes(10);
    expect(onOutcome.mock.calls.map(call => call[0]).sort((a, b) => a - b)).toEqual([
      1, 2, 3, 4, 5, 6, 7, 8, 9, 10,
    ]);
    expect([2, 5, 9].map(id => transport?.requestCount(id))).toEqual([1, 1, 1]);
  });

  it('waits for MBAP units in parallel up to the concurrency limit', async () => {
    const orchestrator = await setup(new TcpFramer(), []);

    const started = Date.now();
    const result = await orchestrator.scan(1, 8, template({ timeout: 200, maxRetries: 0 }), 8);
    const elapsed = Date.now() - started;

    expect(foundUnitIds(result)).toEqual([]);
    expect(result.outcomes.size).toBe(8);
    expect(transport?.writtenFrames).toHaveLength(8);
    expect(elapsed).toBeGreaterThanOrEqual(190);
    expect(elapsed).toBeLessThan(600);
  });

  it('never has more MBAP units waiting than the concurrency limit', async () => {
    const orchestrator = await setup(new TcpFramer(), []);

    const started = Date.now();
    await orchestrator.scan(1, 4, template({ timeout: 100, maxRetries: 0 }), 2);
    const elapsed = Date.now() - started;

    expect(elapsed).toBeGreaterThanOrEqual(190);
    expect(elapsed).toBeLessThan(380);
  });

  it('serialises RTU units whatever the concurrency', async () => {
    const orchestrator = await setup(new RtuFramer(), []);

    const started = Date.now();
    await orchestrator.scan(1, 3, template({ timeout: 50, maxRetries: 0 }), 3);

    expect(Date.now() - started).toBeGreaterThanOrEqual(145);
  });

  it('scans a single unit range', async () => {
    const orchestrator = await setup(new RtuFramer(), [[247, { kind: 'healthy' }]]);

    const result = await orchestrator.scan(247, 247, template(), 8);

    expect(result.startUnitId).toBe(247);
    expect(result.endUnitId).toBe(247);
    expect(result.outcomes.get(247)?.kind).toBe('success');
  });

  it('returns a partial result when cancelled', async () => {
    const orchestrator = await setup(new RtuFramer(), []);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 150);

    const result = await orchestrator.scan(1, 5, template({ maxRetries: 0 }), 1, {
      signal: controller.signal,
    });

    expect(result.complete).toBe(false);
    expect([...result.outcomes.keys()]).toEqual([1]);
  });

  it('starts nothing when the signal is already aborted', async () => {
    const orchestrator = await setup(new RtuFramer(), [[1, { kind: 'healthy' }]]);
    const controller = new AbortController();
    controller.abort();

    const result = await orchestrator.scan(1, 3, template(), 2, { signal: controller.signal });

    expect(result.complete).toBe(false);
    expect(result.outcomes.size).toBe(0);
    expect(transport?.writtenFrames).toHaveLength(0);
  });

  it('aborts the scan when the transport fails', async () => {
    const orchestrator = await setup(new RtuFramer(), [
      [1, { kind: 'healthy' }],
      [2, { kind: 'healthy' }],
      [3, { kind: 'healthy' }],
    ]);
    const seen: number[] = [];

    await expect(
      orchestrator.scan(1, 3, template(), 1, {
        onOutcome: unitId => {
          seen.push(unitId);
          transport?.breakConnection();
        },
      })
    ).rejects.toBeInstanceOf(ModbusTransportError);
    expect(seen).toEqual([1]);
  });

  it('validates the range and concurrency', async () => {
    const orchestrator = await setup(new RtuFramer(), []);

    await expect(orchestrator.scan(0, 5, template(), 1)).rejects.toBeInstanceOf(ModbusInvalidAddressError);
    await expect(orchestrator.scan(1, 248, template(), 1)).rejects.toBeInstanceOf(ModbusInvalidAddressError);
    await expect(orchestrator.scan(5, 3, template(), 1)).rejects.toBeInstanceOf(ModbusConfigError);
    await expect(orchestrator.scan(1, 3, template(), 0)).rejects.toBeInstanceOf(ModbusConfigError);
    await expect(orchestrator.scan(1, 3, template({ timeout: -1 }), 1)).rejects.toBeInstanceOf(ModbusConfigError);
  });
});

describe('isDeviceFound', () => {
  it('counts every answer as a device', () => {
    expect(isDeviceFound({ kind: 'success', rawBytes: new Uint8Array(2), registers: [0], attempts: 1, responseTime: 5 })).toBe(true);
    expect(isDeviceFound({ kind: 'device-error', exceptionCode: 2, message: 'Illegal Data Address', attempts: 1, responseTime: 5 })).toBe(true);
    expect(isDeviceFound({ kind: 'gateway-error', code: 11, message: 'Gateway Target Device Failed to Respond', attempts: 1, responseTime: 5 })).toBe(true);
    expect(isDeviceFound({ kind: 'no-response', attempts: 2, elapsed: 200 })).toBe(false);
  });
});
