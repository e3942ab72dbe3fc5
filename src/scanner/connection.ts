import net from 'net';

export const MAX_RESPONSE_BYTES = 4096;

export type SocketFactory = (port: number, host: string) => net.Socket;

export const defaultSocketFactory: SocketFactory = (port, host) => net.createConnection({ port, host });

/** Raised when a connect attempt outlives the scanner's own deadline. */
export class ConnectTimeoutError extends Error {
  constructor(host: string, port: number, timeoutMs: number) {
    super(`Connection to ${host}:${port} did not settle within ${timeoutMs}ms`);
    this.name = 'ConnectTimeoutError';
  }
}

/**
 * Open a TCP connection, failing with `ConnectTimeoutError` when neither the
 * connect nor a transport error arrives within `timeoutMs`.
 */
export function openConnection(
  host: string,
  port: number,
  timeoutMs: number,
  socketFactory: SocketFactory = defaultSocketFactory
): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = socketFactory(port, host);
    let settled = false;

    const timer = setTimeout(() => {
      finish(new ConnectTimeoutError(host, port, timeoutMs));
    }, timeoutMs);

    const onConnect = (): void => finish(null);
    const onError = (error: Error): void => finish(error);

    function finish(error: Error | null): void {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.off('connect', onConnect);
      socket.off('error', onError);

      if (error) {
        socket.destroy();
        reject(error);
      } else {
        resolve(socket);
      }
    }

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
}

/**
 * Write `payload` (when non-empty) and wait for the first chunk of response
 * data, truncated to `MAX_RESPONSE_BYTES`. Resolves `null` when the peer closes
 * without sending or the deadline passes; rejects on socket errors.
 */
export function readResponse(socket: net.Socket, payload: Buffer, timeoutMs: number): Promise<Buffer | null> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => finish(null, null), timeoutMs);

    const onData = (chunk: Buffer): void => finish(null, chunk.subarray(0, MAX_RESPONSE_BYTES));
    const onEnd = (): void => finish(null, null);
    const onError = (error: Error): void => finish(error, null);

    function finish(error: Error | null, data: Buffer | null): void {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.off('data', onData);
      socket.off('end', onEnd);
      socket.off('close', onEnd);
      socket.off('error', onError);

      if (error) {
        reject(error);
      } else {
        resolve(data);
      }
    }

    socket.on('data', onData);
    socket.once('end', onEnd);
    socket.once('close', onEnd);
    socket.once('error', onError);

    if (payload.length > 0) {
      socket.write(payload, (error) => {
        if (error) finish(error, null);
      });
    }
  });
}
