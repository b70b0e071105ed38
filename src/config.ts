export const DEFAULT_ADDRESS = '/tmp/nvimsocket';
export const ADDRESS_ENV = 'NVIM_LISTEN_ADDRESS';

export type Address =
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'path'; path: string }

/**
 * The socket to talk to: `--servername` wins over `$NVIM_LISTEN_ADDRESS`,
 * which wins over {@link DEFAULT_ADDRESS}. Empty values count as unset.
 */
export function resolveAddress(
  servername: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (servername) {
    return servername;
  }
  return env[ADDRESS_ENV] || DEFAULT_ADDRESS;
}

/**
 * `host:port` is a TCP endpoint, like `nvim --listen 127.0.0.1:6666`.
 * Everything else is a unix socket or named pipe path.
 */
export function parseAddress(address: string): Address {
  const m = /^([^/\\]*):(\d+)$/.exec(address);
  if (m) {
    const port = Number.parseInt(m[2] ?? '', 10);
    if (port > 0 && port < 65536) {
      return { kind: 'tcp', host: m[1] || 'localhost', port };
    }
  }
  return { kind: 'path', path: address };
}
