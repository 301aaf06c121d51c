export type LinkplayErrorKind = 'invalid-argument' | 'network' | 'device' | 'protocol';

export abstract class LinkplayError extends Error {
  abstract readonly kind: LinkplayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A caller-supplied value failed local validation; nothing was sent. */
export class InvalidArgumentError extends LinkplayError {
  readonly kind = 'invalid-argument';
}

/** Connection refused, timed out, or the device answered with a non-2xx status. */
export class NetworkError extends LinkplayError {
  readonly kind = 'network';
}

/** The device answered in a recognized shape that reports failure. */
export class DeviceError extends LinkplayError {
  readonly kind = 'device';
}

/** The device answered with something this command does not expect. */
export class ProtocolError extends LinkplayError {
  readonly kind = 'protocol';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const EXIT_CODES: Record<LinkplayErrorKind, number> = {
  'invalid-argument': 2,
  network: 3,
  device: 4,
  protocol: 5,
};

export function exitCodeFor(error: unknown): number {
  return error instanceof LinkplayError ? EXIT_CODES[error.kind] : 1;
}
