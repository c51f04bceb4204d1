import { afterEach, describe, expect, it } from 'vitest';
import * as net from 'net';
import NodeTcpTransport from '../src/transport/node-transports/node-tcp-transport.js';
import { TcpFramer } from '../src/framers/tcp-framer.js';
import { TransactionRunner } from '../src/transaction-runner.js';
import {
  ModbusConnectionRefusedError,
  ModbusNotConnectedError,
  ModbusTransportError,
} from '../src/errors.js';
import { ReadRequest } from '../src/types/modbus-types.js';

type RequestHandler = (socket: net.Socket, data: Buffer) => void;

interface LocalServer {
  port: number;
  received: () => number;
  connections: () => number;
  close: () => Promise<void>;
}

function listen(server: net.Server): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server has no TCP address'));
        return;
      }
      resolve(address.port);
    });
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise<void>(resolve => {
    server.close(() => resolve());
  });
}

async function startServer(onRequest: RequestHandler): Promise<LocalServer> {
  const sockets = new Set<net.Socket>();
  let received = 0;
  let connections = 0;
  const server = net.createServer(socket => {
    connections++;
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => sockets.delete(socket));
    socket.on('data', (data: Buffer) => {
      received += data.length;
      onRequest(socket, data);
    });
  });
  const port = await listen(server);

  return {
    port,
    received: () => received,
    connections: () => connections,
    close: async () => {
      for (const socket of sockets) socket.destroy();
      await closeServer(server);
    },
  };
}

const request = (overrides: Partial<ReadRequest> = {}): ReadRequest => ({
  unitId: 1,
  registerType: 'holding',
  address: 0,
  count: 1,
  timeout: 500,
  maxRetries: 0,
  ...overrides,
});

describe('NodeTcpTransport', () => {
  let server: LocalServer | undefined;
  let transport: NodeTcpTransport | undefined;

  afterEach(async () => {
    await transport?.disconnect();
    await server?.close();
    transport = undefined;
    server = undefined;
  });

  it('assembles a reply that arrives in two segments', async () => {
    const serverFramer = new TcpFramer();
    server = await startServer((socket, data) => {
      const decoded = serverFramer.decodeRequest(new Uint8Array(data));
      const reply = serverFramer.buildAdu(decoded.unitId, new Uint8Array([0x03, 0x02, 0x12, 0x34]), {
        transactionId: decoded.transactionId,
      });
      socket.write(reply.subarray(0, 4));
      setTimeout(() => socket.write(reply.subarray(4)), 20);
    });
    transport = new NodeTcpTransport('127.0.0.1', server.port);
    await transport.connect();
    const runner = new TransactionRunner(transport, new TcpFramer());

    const outcome = await runner.execute(request());

    expect(outcome).toMatchObject({ kind: 'success', registers: [0x1234], attempts: 1 });
  });

  it('fails without retrying when the peer closes during the read', async () => {
    server = await startServer(socket => socket.destroy());
    transport = new NodeTcpTransport('127.0.0.1', server.port);
    await transport.connect();
    const runner = new TransactionRunner(transport, new TcpFramer());

    const started = Date.now();
    await expect(runner.execute(request({ timeout: 1000, maxRetries: 2 }))).rejects.toBeInstanceOf(
      ModbusTransportError
    );

    expect(Date.now() - started).toBeLessThan(1000);
    expect(server.received()).toBe(12);
  });

  it('reports a refused connection', async () => {
    const spare = net.createServer();
    const port = await listen(spare);
    await closeServer(spare);
    const refused = new NodeTcpTransport('127.0.0.1', port, { connectTimeout: 1000 });

    await expect(refused.connect()).rejects.toBeInstanceOf(ModbusConnectionRefusedError);
    expect(refused.isOpen).toBe(false);
  });

  it('lets concurrent connect calls share one attempt', async () => {
    server = await startServer(() => undefined);
    const tcp = new NodeTcpTransport('127.0.0.1', server.port);
    transport = tcp;

    const opened = await Promise.all([
      tcp.connect().then(() => tcp.isOpen),
      tcp.connect().then(() => tcp.isOpen),
    ]);

    expect(opened).toEqual([true, true]);
    await new Promise(resolve => setTimeout(resolve, 50));
    expect(server.connections()).toBe(1);
  });

  it('refuses to write before connecting', async () => {
    transport = new NodeTcpTransport('127.0.0.1', 1);

    await expect(transport.write(new Uint8Array([1]))).rejects.toBeInstanceOf(ModbusNotConnectedError);
  });
});
