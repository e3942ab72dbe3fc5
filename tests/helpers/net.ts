import dgram from 'dgram';
import net from 'net';
import type { SocketFactory } from '../../src/scanner/connection.js';

export interface TestServer {
  port: number;
  close(): Promise<void>;
}

/** Loopback TCP server; peers that vanish mid-write are ignored. */
export async function startTcpServer(onConnection: (socket: net.Socket) => void): Promise<TestServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('error', () => sockets.delete(socket));
    socket.on('close', () => sockets.delete(socket));
    onConnection(socket);
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('test server has no TCP address');
  }

  return {
    port: address.port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const socket of sockets) socket.destroy();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

/** A loopback port with nothing listening on it. */
export async function closedPort(): Promise<number> {
  const server = await startTcpServer(() => undefined);
  await server.close();
  return server.port;
}

export function socketError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}

/** A socket that fails with `code` right after the caller subscribes. */
export function failingSocket(code: string, delayMs = 0): net.Socket {
  const socket = new net.Socket();
  setTimeout(() => socket.emit('error', socketError(code)), delayMs);
  return socket;
}

/** A socket that never connects, as when a firewall drops the SYN. */
export function silentSocket(): net.Socket {
  return new net.Socket();
}

/** Route scanned ports to local servers or canned failures. */
export function routedFactory(routes: Record<number, number | 'refused' | 'silent'>): SocketFactory {
  return (port, host) => {
    const route = routes[port] ?? 'silent';
    if (route === 'refused') return failingSocket('ECONNREFUSED');
    if (route === 'silent') return silentSocket();
    return net.createConnection({ port: route, host });
  };
}

export interface TestUdpServer {
  port: number;
  close(): Promise<void>;
}

export async function startUdpServer(reply: boolean): Promise<TestUdpServer> {
  const socket = dgram.createSocket('udp4');
  socket.on('message', (message, remote) => {
    if (reply) socket.send(message, remote.port, remote.address);
  });

  await new Promise<void>((resolve) => socket.bind(0, '127.0.0.1', () => resolve()));
  const { port } = socket.address();

  return {
    port,
    close: () => new Promise<void>((resolve) => socket.close(() => resolve())),
  };
}
