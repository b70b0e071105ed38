import { createConnection, type Socket } from 'net';
import { PassThrough } from 'stream';
import { attach } from 'neovim';
import logger from './log.js';
import { parseAddress } from './config.js';

/** The part of the neovim client the dispatcher talks to. */
export interface RemoteEditor {
  command(cmd: string): Promise<unknown>;
  input(keys: string): Promise<unknown>;
  eval(expr: string): Promise<unknown>;
  /** msgpack-rpc notification, no reply is read. */
  notify(method: string, args: unknown[]): void;
}

export interface NeovimSession {
  client: RemoteEditor;
  disconnect: () => void;
}

export class ServerDisconnectedError extends Error {
  constructor(public readonly address: string) {
    super(`Lost the connection to the Neovim server at ${address}.`);
    this.name = 'ServerDisconnectedError';
  }
}

export type Connector = (address: string) => Promise<NeovimSession>;

export function openSocket(address: string): Promise<Socket> {
  const target = parseAddress(address);
  return new Promise((resolve, reject) => {
    const socket = target.kind === 'tcp'
      ? createConnection({ host: target.host, port: target.port })
      : createConnection({ path: target.path });

    const onError = (e: Error) => {
      socket.destroy();
      reject(e);
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      socket.on('error', (e) => {
        logger.err(e, `Socket error on ${address}`);
      });
      resolve(socket);
    });
  });
}

export const connect: Connector = async (address) => {
  const socket = await openSocket(address);
  logger.debug(`Attached to ${address}`);

  // The client reads from a pipe that always ends cleanly, a reset socket
  // would otherwise fail its decoder with a premature close.
  const reader = new PassThrough();
  socket.pipe(reader);

  const client = attach({
    reader,
    writer: socket,
    options: {
      logger
    }
  });

  // Requests in flight when the server goes away are never answered
  const lost = new Promise<ServerDisconnectedError>((resolve) => {
    const onLost = () => resolve(new ServerDisconnectedError(address));
    socket.once('close', () => {
      if (!reader.writableEnded) {
        reader.end();
      }
      onLost();
    });
    client.on('disconnect', onLost);
  });
  const guard = <T>(call: Promise<T>) =>
    Promise.race([
      call,
      lost.then((e): never => {
        throw e;
      }),
    ]);

  return {
    client: {
      command: (cmd) => guard(client.command(cmd)),
      input: (keys) => guard(client.input(keys)),
      eval: (expr) => guard(client.eval(expr)),
      notify: (method, args) => client.notify(method, args),
    },
    // end() flushes pending notifications before closing
    disconnect: () => {
      socket.end();
    },
  };
};
