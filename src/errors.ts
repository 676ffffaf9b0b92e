export type LoopiaErrorKind =
  | 'transport'
  | 'marshal'
  | 'unmarshal'
  | 'rpc'
  | 'auth'
  | 'unknown';

/**
 * Base class for every error raised by a Loopia call.
 * Narrow with `instanceof` or on `kind`.
 */
export abstract class LoopiaError extends Error {
  abstract readonly kind: LoopiaErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Loopia: ${message}`, options);
    this.name = new.target.name;
  }
}

/** The HTTP round trip failed: connection, timeout, non-200 status or body read */
export class TransportError extends LoopiaError {
  readonly kind = 'transport';
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class MarshalError extends LoopiaError {
  readonly kind = 'marshal';

  constructor(message: string, options?: { cause?: unknown }) {
    super(`marshal error: ${message}`, options);
  }
}

export class UnmarshalError extends LoopiaError {
  readonly kind = 'unmarshal';

  constructor(message: string, options?: { cause?: unknown }) {
    super(`unmarshal error: ${message}`, options);
  }
}

/** The endpoint answered with an XML-RPC fault */
export class RpcError extends LoopiaError {
  readonly kind = 'rpc';
  readonly faultCode: number;
  readonly faultString: string;

  constructor(faultCode: number, faultString: string) {
    super(`XML-RPC fault ${faultCode}: ${faultString}`);
    this.faultCode = faultCode;
    this.faultString = faultString;
  }
}

export class AuthenticationError extends LoopiaError {
  readonly kind = 'auth';

  constructor(method: string) {
    super(`${method} failed: authentication error`);
  }
}

/** A status string other than OK or AUTH_ERROR */
export class UnknownResponseError extends LoopiaError {
  readonly kind = 'unknown';
  readonly value: string;

  constructor(method: string, value: string) {
    super(`${method} failed: unknown error "${value}"`);
    this.value = value;
  }
}
