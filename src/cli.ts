import { readFileSync } from 'fs';
import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { buildActions, type Action, type RemoteRequest } from './actions.js';
import { resolveAddress } from './config.js';
import { Dispatcher, ServerUnreachableError, remoteMessage } from './dispatcher.js';
import { ServerDisconnectedError, type Connector } from './neovim.js';
import logger from './log.js';

const pkg: { version: string } = JSON.parse(
  readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
);

export interface ParsedArgs {
  address: string
  serverlist: boolean
  actions: Action[]
}

interface CliOptions {
  l?: boolean
  o?: string[]
  O?: string[]
  remote?: string[]
  remoteWait?: string[]
  remoteSilent?: string[]
  remoteWaitSilent?: string[]
  remoteTab?: string[]
  remoteSend?: string[]
  remoteExpr?: string[]
  servername?: string
  serverlist?: boolean
}

function createProgram(output: OutputConfiguration) {
  return new Command()
    .name('nvr')
    .usage('[arguments] [files...]')
    .description('Control a running Neovim with --remote and friends.')
    .version(pkg.version, '-v, --version')
    .argument('[files...]', 'open each file as --remote-silent does')
    .option('-l', 'go to the previous window [SYNC]')
    .option('-o <files...>', 'open each file in a split [SYNC]')
    .option('-O <files...>', 'open each file in a vertical split [SYNC]')
    .option('--remote <files...>', 'open each file in a new buffer [ASYNC]')
    .option('--remote-wait <files...>', 'as --remote [SYNC]')
    .option('--remote-silent <files...>', "as --remote, but don't fail if no server is found [ASYNC]")
    .option('--remote-wait-silent <files...>', "as --remote, but don't fail if no server is found [SYNC]")
    .option('-p, --remote-tab <files...>', 'open each file in a new tab [SYNC]')
    .option('--remote-send <keys...>', 'send keys to the server [SYNC]')
    .option('--remote-expr <exprs...>', 'evaluate each expression and print the result [SYNC]')
    .option('--servername <addr>', `socket path or host:port (overrides $NVIM_LISTEN_ADDRESS)`)
    .option('--serverlist', 'print the address of the server')
    .showHelpAfterError()
    .exitOverride()
    .configureOutput(output);
}

/**
 * Throws a {@link CommanderError} for malformed command lines, and for
 * `--help` and `--version` (with exit code 0).
 */
export function parseArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  output: OutputConfiguration = {},
): ParsedArgs {
  const program = createProgram(output).parse(argv, { from: 'user' });
  const opts = program.opts<CliOptions>();

  const request: RemoteRequest = {
    previousWindow: opts.l ?? false,
    files: program.args,
    remoteSilent: opts.remoteSilent ?? [],
    remoteWaitSilent: opts.remoteWaitSilent ?? [],
    remote: opts.remote ?? [],
    remoteWait: opts.remoteWait ?? [],
    remoteTab: opts.remoteTab ?? [],
    remoteSend: opts.remoteSend ?? [],
    remoteExpr: opts.remoteExpr ?? [],
    split: opts.o ?? [],
    vsplit: opts.O ?? [],
  };
  return {
    address: resolveAddress(opts.servername, env),
    serverlist: opts.serverlist ?? false,
    actions: buildActions(request),
  };
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv
  stdout?: (line: string) => void
  stderr?: (line: string) => void
  connect?: Connector
}

/** The whole program. Resolves to the process exit code. */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const stdout = options.stdout ?? console.log;
  const stderr = options.stderr ?? console.error;

  let args: ParsedArgs;
  try {
    args = parseArgs(argv, options.env, {
      writeOut: (s) => stdout(s.trimEnd()),
      writeErr: (s) => stderr(s.trimEnd()),
    });
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode;
    }
    throw e;
  }

  if (args.serverlist) {
    stdout(args.address);
  }

  const dispatcher = new Dispatcher(args.address, {
    connect: options.connect,
    print: stdout,
    report: stderr,
  });
  try {
    await dispatcher.run(args.actions);
    return 0;
  } catch (e) {
    if (e instanceof ServerUnreachableError || e instanceof ServerDisconnectedError) {
      stderr(e.message);
    } else {
      stderr(`Remote command failed: ${remoteMessage(e)}`);
      logger.debug(e instanceof Error ? e.stack ?? e.message : String(e));
    }
    return 1;
  } finally {
    dispatcher.close();
  }
}
