// test/helpers.ts

import { ModbusFramer } from '../src/framers/modbus-framer.js';
import { EmulatedBusTransport } from '../src/slave-emulator/emulated-bus-transport.js';
import SlaveEmulator, { DeviceBehaviour, SlaveEmulatorOptions } from '../src/slave-emulator/slave-emulator.js';

export async function createBus(
  framer: ModbusFramer,
  devices: Array<[number, DeviceBehaviour, SlaveEmulatorOptions?]>
): Promise<EmulatedBusTransport> {
  const transport = new EmulatedBusTransport(framer);
  for (const [unitId, behaviour, options] of devices) {
    transport.addDevice(new SlaveEmulator(unitId, { ...options, behaviour }));
  }
  await transport.connect();
  return transport;
}
