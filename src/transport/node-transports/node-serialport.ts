// src/transport/node-transports/node-serialport.ts

import { SerialPort } from 'serialport';
import { engineLogger } from '../../logger.js';
import {
  ModbusConfigError,
  ModbusNotConnectedError,
  NodeSerialConnectionError,
  NodeSerialTransportError,
  NodeSerialWriteError,
} from '../../errors.js';
import { NodeSerialTransportOptions, Transport } from '../../types/modbus-types.js';
import { toHex } from '../../utils/utils.js';
import { ReadBuffer } from '../read-buffer.js';

const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 115200,
  DEFAULT_MAX_BUFFER_SIZE: 4096,
} as const;

const logger = engineLogger.createLogger('NodeSerialTransport');

/**
 * Serial line transport for Modbus RTU, on top of the `serialport` package.
 */
class NodeSerialTransport implements Transport {
  public isOpen: boolean = false;
  private readonly options: Required<NodeSerialTransportOptions>;
  private port: SerialPort | null = null;
  private readonly readBuffer: ReadBuffer;
  private _connectionPromise: Promise<void> | null = null;

  constructor(
    private readonly path: string,
    options: NodeSerialTransportOptions = {}
  ) {
    this.options = {
      baudRate: 9600,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      readTimeout: 1000,
      writeTimeout: 1000,
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      ...options,
    };
    this.readBuffer = new ReadBuffer(this.options.maxBufferSize);
  }

  async connect(): Promise<void> {
    if (this.isOpen) return;
    if (this._connectionPromise) return this._connectionPromise;

    this._connectionPromise = this._open();
    try {
      await this._connectionPromise;
    } finally {
      this._connectionPromise = null;
    }
  }

  private async _open(): Promise<void> {
    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new ModbusConfigError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    const port = new SerialPort({
      path: this.path,
      baudRate: this.options.baudRate,
      dataBits: this.options.dataBits,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => {
        if (err) {
          reject(this._openError(err));
          return;
        }
        resolve();
      });
    });

    this.port = port;
    this.isOpen = true;
    port.on('data', (data: Buffer) => this._onData(data));
    port.on('error', (err: Error) => this._onError(err));
    port.on('close', () => this._onClose());
    logger.info(`Serial port ${this.path} opened at ${this.options.baudRate} baud`);
  }

  private _openError(err: Error): NodeSerialConnectionError {
    const message = err.message.toLowerCase();
    if (message.includes('permission')) {
      return new NodeSerialConnectionError('Permission denied', { cause: err });
    }
    if (message.includes('busy')) {
      return new NodeSerialConnectionError('Serial port is busy', { cause: err });
    }
    if (message.includes('no such file')) {
      return new NodeSerialConnectionError(`Serial port ${this.path} does not exist`, { cause: err });
    }
    return new NodeSerialConnectionError(err.message, { cause: err });
  }

  private _onData(data: Buffer): void {
    if (!this.isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    logger.trace(`RX ${toHex(chunk, ' ')}`);
    if (!this.readBuffer.push(chunk)) {
      logger.warn(`Receive buffer overflow (${this.options.maxBufferSize} bytes), dropped`);
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port error: ${err.message}`);
    this.readBuffer.fail(new NodeSerialTransportError(`Serial port error: ${err.message}`, { cause: err }));
  }

  private _onClose(): void {
    const wasOpen = this.isOpen;
    this.isOpen = false;
    this.port = null;
    if (wasOpen) {
      logger.warn(`Serial port ${this.path} closed`);
      this.readBuffer.fail(new ModbusNotConnectedError('Serial port closed'));
    }
  }

  async write(buffer: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this.isOpen || !port) throw new ModbusNotConnectedError();

    logger.trace(`TX ${toHex(buffer, ' ')}`);
    const { writeTimeout } = this.options;
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new NodeSerialWriteError(`Write timed out after ${writeTimeout}ms`));
      }, writeTimeout);
      const finish = (err?: NodeSerialWriteError): void => {
        clearTimeout(timer);
        if (err) reject(err);
        else resolve();
      };

      port.write(buffer, (err: Error | null | undefined) => {
        if (err) {
          finish(new NodeSerialWriteError(`Write failed: ${err.message}`, { cause: err }));
          return;
        }
        port.drain((drainErr: Error | null) => {
          if (drainErr) finish(new NodeSerialWriteError(`Drain failed: ${drainErr.message}`, { cause: drainErr }));
          else finish();
        });
      });
    });
  }

  async read(
    length: number,
    timeout: number = this.options.readTimeout,
    signal?: AbortSignal
  ): Promise<Uint8Array> {
    if (!this.isOpen) throw new ModbusNotConnectedError();
    return this.readBuffer.read(length, timeout, signal);
  }

  async flush(): Promise<void> {
    this.readBuffer.clear();
    const port = this.port;
    if (!port) return;
    await new Promise<void>((resolve, reject) => {
      port.flush((err: Error | null) => {
        if (err) reject(new NodeSerialTransportError(`Flush failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    if (!port) return;
    this.isOpen = false;
    this.readBuffer.fail(new ModbusNotConnectedError('Transport disconnected'));

    await new Promise<void>((resolve, reject) => {
      port.close((err: Error | null) => {
        if (err) reject(new NodeSerialTransportError(`Close failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
    this.port = null;
    logger.info(`Serial port ${this.path} closed`);
  }
}

export default NodeSerialTransport;
