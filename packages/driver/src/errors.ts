function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Base class of every error raised or returned by the driver. */
export class DriverError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DriverError';
  }
}

/** A peer advertised an address under a channel kind the driver does not know. */
export class SocketTypeError extends DriverError {
  readonly kind: string;
  readonly peer: string;

  constructor(kind: string, peer: string) {
    super(`Unrecognized channel kind "${kind}" in the addresses of ${peer}.`);
    this.name = 'SocketTypeError';
    this.kind = kind;
    this.peer = peer;
  }
}

/** Connecting an outbound endpoint to one of a peer's addresses failed. */
export class PeersConnectionError extends DriverError {
  readonly peer: string;

  constructor(peer: string, cause: unknown) {
    super(`Driver cannot connect to ${peer}: ${describe(cause)}`, { cause });
    this.name = 'PeersConnectionError';
    this.peer = peer;
  }
}

/** The multiplexed wait on the inbound endpoints failed. Ends the receive sequence. */
export class DriverReceiveError extends DriverError {
  constructor(cause: unknown) {
    super(`Driver cannot receive messages: ${describe(cause)}`, { cause });
    this.name = 'DriverReceiveError';
  }
}

/** A unicast or broadcast write failed. Returned in a SendResult, never thrown. */
export class DriverSendError extends DriverError {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describe(cause)}`, { cause });
    this.name = 'DriverSendError';
  }
}

/** An inbound frame announced a length above the accepted limit. */
export class FrameTooLargeError extends DriverError {
  constructor(length: number, limit: number) {
    super(`Frame of ${length} bytes exceeds the ${limit} byte limit.`);
    this.name = 'FrameTooLargeError';
  }
}

/** An endpoint operation did not finish within its timeout. */
export class EndpointTimeoutError extends DriverError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms.`);
    this.name = 'EndpointTimeoutError';
  }
}
