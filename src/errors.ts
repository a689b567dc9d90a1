/**
 * Error taxonomy
 *
 * ConfigError is the only fatal family and is raised while the config is
 * loaded and validated. Connect and send failures are returned inside
 * result objects (see transport/types.ts) and never thrown across a
 * component boundary.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** An operation references a controllable absent from the address table */
export class MissingAddressError extends ConfigError {
  readonly table: 'levels' | 'muteGroups' | 'keys';
  readonly id: string;

  constructor(table: 'levels' | 'muteGroups' | 'keys', id: string) {
    super(`No address configured for addresses.${table}.${id}`);
    this.name = 'MissingAddressError';
    this.table = table;
    this.id = id;
  }
}

export type ConnectErrorKind = 'timeout' | 'refused' | 'unreachable';

export class ConnectError extends Error {
  readonly kind: ConnectErrorKind;

  constructor(kind: ConnectErrorKind, message: string) {
    super(message);
    this.name = 'ConnectError';
    this.kind = kind;
  }
}

export type SendErrorKind = 'not_connected' | 'write_failed';

export class SendError extends Error {
  readonly kind: SendErrorKind;

  constructor(kind: SendErrorKind, message: string) {
    super(message);
    this.name = 'SendError';
    this.kind = kind;
  }
}

/** Normalize an unknown thrown value into an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
