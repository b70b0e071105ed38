import { match, P } from 'ts-pattern';

type Mode = {
  /** Wait for the remote reply before moving on. */
  wait: boolean
  /** Skip quietly when no server is listening. */
  silent: boolean
}

export type FileAction = Mode & {
  kind: 'edit' | 'split' | 'vsplit' | 'tabedit'
  path: string
}

export type Action =
  | FileAction
  | (Mode & { kind: 'send'; keys: string })
  | (Mode & { kind: 'expr'; expr: string })
  | (Mode & { kind: 'previous-window' })

/** Values collected per flag, as they appeared on the command line. */
export interface RemoteRequest {
  previousWindow: boolean
  files: string[]
  remoteSilent: string[]
  remoteWaitSilent: string[]
  remote: string[]
  remoteWait: string[]
  remoteTab: string[]
  remoteSend: string[]
  remoteExpr: string[]
  split: string[]
  vsplit: string[]
}

export function emptyRequest(): RemoteRequest {
  return {
    previousWindow: false,
    files: [],
    remoteSilent: [],
    remoteWaitSilent: [],
    remote: [],
    remoteWait: [],
    remoteTab: [],
    remoteSend: [],
    remoteExpr: [],
    split: [],
    vsplit: [],
  }
}

// Ex commands are a single line, so a bare space would split the argument
export function escapePath(path: string) {
  return path.replace(/ /g, '\\ ');
}

export function exCommand(action: FileAction | Extract<Action, { kind: 'previous-window' }>) {
  return match(action)
    .with({ kind: 'previous-window' }, () => 'wincmd p')
    .with({ kind: P.union('edit', 'split', 'vsplit', 'tabedit') }, (a) => `${a.kind} ${escapePath(a.path)}`)
    .exhaustive();
}

const fileActions = (
  kind: FileAction['kind'],
  paths: string[],
  mode: Mode,
): Action[] => paths.map((path) => ({ kind, path, ...mode }));

/**
 * Flattens a request into the order actions are dispatched in. Each flag's
 * values run as one group, groups run in this fixed order.
 */
export function buildActions(req: RemoteRequest): Action[] {
  const noWait = { wait: false, silent: false };
  const sync = { wait: true, silent: false };
  const actions: Action[] = [];

  if (req.previousWindow) {
    actions.push({ kind: 'previous-window', ...sync });
  }
  actions.push(
    ...fileActions('edit', req.files, { wait: false, silent: true }),
    ...fileActions('edit', req.remoteSilent, { wait: false, silent: true }),
    ...fileActions('edit', req.remoteWaitSilent, { wait: true, silent: true }),
    ...fileActions('edit', req.remote, noWait),
    ...fileActions('edit', req.remoteWait, sync),
    ...fileActions('tabedit', req.remoteTab, sync),
    ...req.remoteSend.map((keys): Action => ({ kind: 'send', keys, ...sync })),
    ...req.remoteExpr.map((expr): Action => ({ kind: 'expr', expr, ...sync })),
    ...fileActions('split', req.split, sync),
    ...fileActions('vsplit', req.vsplit, sync),
  );
  return actions;
}
