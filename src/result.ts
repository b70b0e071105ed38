import { match } from 'ts-pattern';

/** A value returned by `nvim_eval`, with every byte string decoded. */
export type RemoteValue =
  | { type: 'nil' }
  | { type: 'boolean'; value: boolean }
  | { type: 'number'; value: number | bigint }
  | { type: 'string'; value: string }
  | { type: 'list'; items: RemoteValue[] }
  | { type: 'dict'; entries: Array<[string, RemoteValue]> }

function isPlainObject(raw: unknown): raw is Record<string, unknown> {
  if (typeof raw !== 'object' || raw === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(raw);
  return proto === Object.prototype || proto === null;
}

function decodeKey(key: unknown) {
  if (key instanceof Uint8Array) {
    return Buffer.from(key).toString('utf8');
  }
  return String(key);
}

export function toRemoteValue(raw: unknown): RemoteValue {
  if (raw === null || raw === undefined) {
    return { type: 'nil' };
  }
  if (typeof raw === 'boolean') {
    return { type: 'boolean', value: raw };
  }
  if (typeof raw === 'number' || typeof raw === 'bigint') {
    return { type: 'number', value: raw };
  }
  if (typeof raw === 'string') {
    return { type: 'string', value: raw };
  }
  // Buffer is a Uint8Array
  if (raw instanceof Uint8Array) {
    return { type: 'string', value: Buffer.from(raw).toString('utf8') };
  }
  if (Array.isArray(raw)) {
    return { type: 'list', items: raw.map(toRemoteValue) };
  }
  if (raw instanceof Map) {
    return {
      type: 'dict',
      entries: [...raw.entries()].map(([k, v]): [string, RemoteValue] => [decodeKey(k), toRemoteValue(v)]),
    };
  }
  if (isPlainObject(raw)) {
    return {
      type: 'dict',
      entries: Object.entries(raw).map(([k, v]): [string, RemoteValue] => [k, toRemoteValue(v)]),
    };
  }
  return { type: 'string', value: String(raw) };
}

function render(value: RemoteValue): string {
  return match(value)
    .with({ type: 'nil' }, () => 'null')
    .with({ type: 'boolean' }, ({ value }) => String(value))
    .with({ type: 'number' }, ({ value }) => value.toString())
    .with({ type: 'string' }, ({ value }) => JSON.stringify(value))
    .with({ type: 'list' }, ({ items }) => `[${items.map(render).join(', ')}]`)
    .with({ type: 'dict' }, ({ entries }) =>
      `{${entries.map(([k, v]) => `${JSON.stringify(k)}: ${render(v)}`).join(', ')}}`)
    .exhaustive();
}

/**
 * Strings print as they are, other scalars as their literal, lists and dicts
 * as `["a", 1]` and `{"key": "value"}`.
 */
export function formatRemoteValue(value: RemoteValue): string {
  return match(value)
    .with({ type: 'string' }, ({ value }) => value)
    .otherwise(render);
}
