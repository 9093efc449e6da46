export type HostErrorKind =
  | 'configuration'
  | 'immutable_field'
  | 'validation'
  | 'protocol_mix'
  | 'ambiguous_name'
  | 'not_found'
  | 'remote_operation';

export type RemoteOperation =
  | 'lookup'
  | 'get'
  | 'create'
  | 'add_initiators'
  | 'remove_initiators'
  | 'modify'
  | 'delete';

/**
 * Base class of every failure a reconciliation pass can end with.
 * `kind` is the tag callers branch on.
 */
export abstract class HostError extends Error {
  abstract readonly kind: HostErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends HostError {
  readonly kind: HostErrorKind = 'configuration';
}

export class ImmutableFieldError extends ConfigurationError {
  override readonly kind: HostErrorKind = 'immutable_field';

  constructor(
    readonly field: string,
    readonly current: string,
    readonly requested: string
  ) {
    super(`${field} cannot be modified for an already existing host (current '${current}', requested '${requested}')`);
  }
}

export class ValidationError extends HostError {
  readonly kind = 'validation' as const;
}

export class ProtocolMixError extends HostError {
  readonly kind = 'protocol_mix' as const;

  constructor(readonly initiators: string[]) {
    super(
      'Invalid initiators. Cannot add IQN, WWN and NQN as part of one host; ' +
        `connect either Fibre Channel, iSCSI or NVMe (initiators: ${initiators.join(', ')})`
    );
  }
}

export class AmbiguousNameError extends HostError {
  readonly kind = 'ambiguous_name' as const;

  constructor(
    readonly hostName: string,
    readonly matches: number
  ) {
    super(`Multiple hosts named '${hostName}' found (${matches} matches)`);
  }
}

export class NotFoundError extends HostError {
  readonly kind = 'not_found' as const;

  constructor(readonly reference: string) {
    super(`Host '${reference}' not found`);
  }
}

export class RemoteOperationError extends HostError {
  readonly kind = 'remote_operation' as const;

  constructor(
    readonly operation: RemoteOperation,
    readonly target: string,
    cause: unknown,
    readonly initiators?: string[]
  ) {
    const list = initiators && initiators.length > 0 ? ` initiators [${initiators.join(', ')}]` : '';
    super(`${operation} on host '${target}'${list} failed with error: ${describeCause(cause)}`, { cause });
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function isHostError(err: unknown): err is HostError {
  return err instanceof HostError;
}

export type Result<T, E = HostError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = <E>(error: E): Result<never, E> => ({ ok: false, error });
