import { match, P } from 'ts-pattern';
import type { Action } from './actions.js';
import { exCommand } from './actions.js';
import { ADDRESS_ENV } from './config.js';
import logger from './log.js';
import { connect, ServerDisconnectedError, type Connector, type NeovimSession, type RemoteEditor } from './neovim.js';
import { formatRemoteValue, toRemoteValue } from './result.js';

export class ServerUnreachableError extends Error {
  constructor(public readonly address: string, options?: { cause?: unknown }) {
    super(`Can't reach a Neovim server at ${address}. Export $${ADDRESS_ENV} or use --servername.`, options);
    this.name = 'ServerUnreachableError';
  }
}

type ConnectionState =
  | { status: 'unresolved' }
  | { status: 'connected'; session: NeovimSession }
  | { status: 'unreachable'; error: unknown }

export interface DispatcherOptions {
  connect?: Connector;
  /** Receives evaluation results, one call per line. */
  print?: (line: string) => void;
  /** Receives per-expression diagnostics. */
  report?: (line: string) => void;
}

/**
 * Runs actions against one lazily attached Neovim. The first action that
 * needs the server decides whether it is reachable, later actions reuse that
 * outcome.
 */
export class Dispatcher {
  private state: ConnectionState = { status: 'unresolved' };
  private readonly connector: Connector;
  private readonly print: (line: string) => void;
  private readonly report: (line: string) => void;

  constructor(public readonly address: string, options: DispatcherOptions = {}) {
    this.connector = options.connect ?? connect;
    this.print = options.print ?? console.log;
    this.report = options.report ?? console.error;
  }

  /**
   * Resolves to the client, or to `null` for a silent caller when the server
   * can't be reached. Non-silent callers get a {@link ServerUnreachableError}.
   */
  private async resolve(silent: boolean): Promise<RemoteEditor | null> {
    if (this.state.status === 'unresolved') {
      try {
        this.state = { status: 'connected', session: await this.connector(this.address) };
      } catch (e) {
        logger.debug(`Failed to connect to ${this.address}: ${e instanceof Error ? e.message : String(e)}`);
        this.state = { status: 'unreachable', error: e };
      }
    }
    const state = this.state;
    if (state.status === 'connected') {
      return state.session.client;
    }
    if (silent) {
      return null;
    }
    throw new ServerUnreachableError(this.address, {
      cause: state.status === 'unreachable' ? state.error : undefined,
    });
  }

  async ensureConnected(silent = false) {
    return (await this.resolve(silent)) !== null;
  }

  async execute(action: Action) {
    const client = await this.resolve(action.silent);
    if (client === null) {
      logger.debug(`Skipping ${action.kind}, no server at ${this.address}`);
      return;
    }
    await match(action)
      .with({ kind: 'send' }, async ({ keys }) => {
        await client.input(keys);
      })
      .with({ kind: 'expr' }, ({ expr }) => this.evaluate(client, expr))
      .with({ kind: P.union('edit', 'split', 'vsplit', 'tabedit', 'previous-window') }, async (a) => {
        const cmd = exCommand(a);
        if (a.wait) {
          await client.command(cmd);
        } else {
          client.notify('nvim_command', [cmd]);
        }
      })
      .exhaustive();
  }

  private async evaluate(client: RemoteEditor, expr: string) {
    let result: unknown;
    try {
      result = await client.eval(expr);
    } catch (e) {
      if (e instanceof ServerDisconnectedError) {
        throw e;
      }
      this.report(`Failed to evaluate ${expr}: ${remoteMessage(e)}`);
      return;
    }
    this.print(formatRemoteValue(toRemoteValue(result)));
  }

  async run(actions: Action[]) {
    for (const action of actions) {
      await this.execute(action);
    }
  }

  close() {
    if (this.state.status === 'connected') {
      this.state.session.disconnect();
    }
  }
}

// The client rejects with an Error, or with the raw [type, message] pair
export function remoteMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  if (Array.isArray(e) && typeof e[1] === 'string') {
    return e[1];
  }
  return String(e);
}
