/**
 * Binding clients to concrete transports.
 */

import { connect as netConnect, type Socket } from "node:net";
import { ErrorCode } from "@packline/rpc-protocol";
import { RpcClient } from "./client.ts";
import { RpcClientError } from "./errors.ts";
import type {
  ClientOptions,
  ConnectOptions,
  SocketConnection,
  Transport,
} from "./types.ts";

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 6666;

/**
 * Create a client over a pipe pair or stdio, e.g.
 * `attach({ input: child.stdout, output: child.stdin })`.
 * The caller keeps ownership of both streams.
 */
export function attach(transport: Transport, options: ClientOptions = {}): RpcClient {
  return new RpcClient(transport, options);
}

/**
 * Connect to a host over a Unix socket or TCP and start a client on it.
 */
export async function connect(options: ConnectOptions = {}): Promise<SocketConnection> {
  const { socket: socketPath, host, port, timeout, ...clientOptions } = options;
  const socket = await createSocket({ socket: socketPath, host, port, timeout });

  const client = new RpcClient({ input: socket, output: socket }, clientOptions);
  client.start();

  let closed = false;
  return {
    client,
    close: async () => {
      if (closed) return;
      closed = true;
      client.stop();
      socket.destroy();
      await client.dispose();
    },
  };
}

/**
 * Create a socket connection.
 */
function createSocket(options: ConnectOptions): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const timeout = options.timeout ?? DEFAULT_TIMEOUT;

    let socket: Socket;

    const onError = (err: Error) => {
      clearTimeout(timeoutId);
      reject(err);
    };

    const onConnect = () => {
      clearTimeout(timeoutId);
      socket.removeListener("error", onError);
      resolve(socket);
    };

    if (options.socket) {
      socket = netConnect(options.socket, onConnect);
    } else {
      socket = netConnect(
        options.port ?? DEFAULT_PORT,
        options.host ?? DEFAULT_HOST,
        onConnect
      );
    }

    socket.on("error", onError);

    // Connection timeout
    const timeoutId = setTimeout(() => {
      socket.destroy();
      reject(
        new RpcClientError(
          ErrorCode.CONNECTION_TIMEOUT,
          `Connection timed out after ${timeout}ms`
        )
      );
    }, timeout);
  });
}
