// src/transport/factory.ts

import { ConnectionConfig, resolveSerialConfig, resolveTcpConfig } from '../config.js';
import { ModbusConfigError } from '../errors.js';
import { ModbusFramer } from '../framers/modbus-framer.js';
import { RtuFramer } from '../framers/rtu-framer.js';
import { TcpFramer, TransactionIdSource } from '../framers/tcp-framer.js';
import { engineLogger } from '../logger.js';
import type { Transport } from '../types/modbus-types.js';

const logger = engineLogger.createLogger('TransportFactory');

export interface Connection {
  transport: Transport;
  framer: ModbusFramer;
}

export interface CreateConnectionOptions {
  transactionIds?: TransactionIdSource;
}

/**
 * Creates an unopened transport and the framer that goes with it. The caller
 * owns the connection lifecycle (`connect` / `disconnect`).
 *
 * - `tcp`: Modbus TCP (MBAP), or RTU framing over the socket with `rtuOverTcp`
 * - `serial`: Modbus RTU over a serial line, through `serialport`
 */
export async function createConnection(
  config: ConnectionConfig,
  options: CreateConnectionOptions = {}
): Promise<Connection> {
  try {
    switch (config.type) {
      case 'tcp': {
        const tcp = resolveTcpConfig(config);
        const { default: NodeTcpTransport } = await import('./node-transports/node-tcp-transport.js');
        const transport = new NodeTcpTransport(tcp.host, tcp.port, { connectTimeout: tcp.connectTimeout });
        const framer: ModbusFramer = tcp.rtuOverTcp ? new RtuFramer() : new TcpFramer(options.transactionIds);
        logger.debug(`Created ${tcp.rtuOverTcp ? 'RTU-over-TCP' : 'TCP'} connection to ${tcp.host}:${tcp.port}`);
        return { transport, framer };
      }

      case 'serial': {
        const serial = resolveSerialConfig(config);
        const { default: NodeSerialTransport } = await import('./node-transports/node-serialport.js');
        const transport = new NodeSerialTransport(serial.path, {
          baudRate: serial.baudRate,
          parity: serial.parity,
          stopBits: serial.stopBits,
          dataBits: serial.dataBits,
        });
        logger.debug(`Created RTU connection on ${serial.path} at ${serial.baudRate} baud`);
        return { transport, framer: new RtuFramer() };
      }

      default: {
        const unknown: never = config;
        throw new ModbusConfigError(`Unknown connection type: ${JSON.stringify(unknown)}`);
      }
    }
  } catch (err: unknown) {
    logger.error(`Failed to create connection: ${err instanceof Error ? err.message : String(err)}`);
    throw err;
  }
}
