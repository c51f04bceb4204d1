// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { engineLogger } from '../../logger.js';
import {
  ModbusConnectionRefusedError,
  ModbusConnectionTimeoutError,
  ModbusNotConnectedError,
  ModbusTransportError,
} from '../../errors.js';
import { NodeTcpTransportOptions, Transport } from '../../types/modbus-types.js';
import { toHex } from '../../utils/utils.js';
import { ReadBuffer } from '../read-buffer.js';

const logger = engineLogger.createLogger('NodeTcpTransport');

class NodeTcpTransport implements Transport {
  public isOpen: boolean = false;
  private readonly options: Required<NodeTcpTransportOptions>;
  private socket: net.Socket | null = null;
  private readonly readBuffer: ReadBuffer;
  private _isConnecting: boolean = false;
  private _connectionPromise: Promise<void> | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number,
    options: NodeTcpTransportOptions = {}
  ) {
    this.options = {
      connectTimeout: options.connectTimeout ?? 5000,
      readTimeout: options.readTimeout ?? 3000,
      maxBufferSize: options.maxBufferSize ?? 8192,
    };
    this.readBuffer = new ReadBuffer(this.options.maxBufferSize);
  }

  /**
   * Opens the socket. A call made while a connect is in progress waits for it.
   */
  public async connect(): Promise<void> {
    if (this.isOpen) return;
    if (this._connectionPromise) return this._connectionPromise;

    this._connectionPromise = this._open();
    try {
      await this._connectionPromise;
    } finally {
      this._connectionPromise = null;
    }
  }

  private _open(): Promise<void> {
    this._isConnecting = true;

    return new Promise<void>((resolve, reject) => {
      logger.info(`Connecting to ${this.host}:${this.port}...`);

      const socket = net.connect({ host: this.host, port: this.port });
      this.socket = socket;

      socket.setTimeout(this.options.connectTimeout);

      socket.once('connect', () => {
        this.isOpen = true;
        this._isConnecting = false;
        socket.setTimeout(0);
        socket.setNoDelay(true);
        logger.info(`Connected to ${this.host}:${this.port}`);
        resolve();
      });

      socket.on('data', (data: Buffer) => this._onData(data));

      socket.on('error', (err: Error) => {
        if (this._isConnecting) {
          this._isConnecting = false;
          reject(this._connectError(err));
          return;
        }
        logger.error(`Socket error: ${err.message}`);
        this.readBuffer.fail(new ModbusTransportError(`Socket error: ${err.message}`, { cause: err }));
      });

      socket.on('timeout', () => {
        if (this._isConnecting) {
          this._isConnecting = false;
          socket.destroy();
          reject(new ModbusConnectionTimeoutError(this.host, this.port, this.options.connectTimeout));
        }
      });

      socket.on('close', () => this._onClose());
    });
  }

  private _connectError(err: Error): ModbusTransportError {
    if ('code' in err && err.code === 'ECONNREFUSED') {
      return new ModbusConnectionRefusedError(this.host, this.port);
    }
    return new ModbusTransportError(`Failed to connect to ${this.host}:${this.port}: ${err.message}`, {
      cause: err,
    });
  }

  private _onData(data: Buffer): void {
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    logger.trace(`RX ${toHex(chunk, ' ')}`);
    if (!this.readBuffer.push(chunk)) {
      logger.warn(`Receive buffer overflow (${this.options.maxBufferSize} bytes), dropped`);
    }
  }

  private _onClose(): void {
    const wasOpen = this.isOpen;
    this.isOpen = false;
    this.socket = null;
    if (wasOpen) {
      logger.warn(`Connection closed for ${this.host}:${this.port}`);
      this.readBuffer.fail(new ModbusNotConnectedError('Connection closed'));
    }
  }

  public async write(buffer: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!this.isOpen || !socket) throw new ModbusNotConnectedError();

    logger.trace(`TX ${toHex(buffer, ' ')}`);
    return new Promise<void>((resolve, reject) => {
      socket.write(buffer, err => {
        if (err) reject(new ModbusTransportError(`Write failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
  }

  public async read(
    length: number,
    timeout: number = this.options.readTimeout,
    signal?: AbortSignal
  ): Promise<Uint8Array> {
    if (!this.isOpen) throw new ModbusNotConnectedError();
    return this.readBuffer.read(length, timeout, signal);
  }

  public async flush(): Promise<void> {
    this.readBuffer.clear();
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.isOpen = false;
    this.readBuffer.fail(new ModbusNotConnectedError('Transport disconnected'));
    if (socket.destroyed) {
      this.socket = null;
      return;
    }
    return new Promise<void>(resolve => {
      socket.end(() => {
        this.socket = null;
        logger.info(`Disconnected from ${this.host}:${this.port}`);
        resolve();
      });
    });
  }
}

export default NodeTcpTransport;
