export type DialectRelayErrorCode =
  | 'decode_error'
  | 'unrecognized_format'
  | 'upstream_protocol_error'
  | 'transport_disconnect'
  | 'config_validation_failed';

export class DialectRelayError extends Error {
  readonly code: DialectRelayErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: DialectRelayErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Body or chunk is not valid JSON, or not the JSON shape the converter needs. */
export class DecodeError extends DialectRelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('decode_error', message, details);
  }
}

export class UnrecognizedFormatError extends DialectRelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('unrecognized_format', message, details);
  }
}

/** Error object embedded in a stream chunk, or a stream that breaks the SSE framing limits. */
export class UpstreamProtocolError extends DialectRelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('upstream_protocol_error', message, details);
  }
}

export class TransportDisconnectError extends DialectRelayError {
  constructor(message: string, cause: unknown) {
    super('transport_disconnect', message);
    this.cause = cause;
  }
}

export class ConfigValidationError extends DialectRelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('config_validation_failed', message, details);
  }
}

export function isDialectRelayError(error: unknown): error is DialectRelayError {
  return error instanceof DialectRelayError;
}

const DISCONNECT_CODES = new Set(['EPIPE', 'ECONNRESET', 'ERR_STREAM_PREMATURE_CLOSE', 'UND_ERR_SOCKET']);
const DISCONNECT_MESSAGE_MARKERS = ['broken pipe', 'connection reset', 'EOF'];

function readErrorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * True when a read failure looks like the peer went away: broken pipe, reset
 * connection or an unexpected end of stream.
 */
export function isDisconnectError(error: unknown): boolean {
  if (error instanceof TransportDisconnectError) {
    return isDisconnectError(error.cause);
  }
  if (!(error instanceof Error)) {
    return false;
  }
  const code = readErrorCode(error);
  if (code && DISCONNECT_CODES.has(code)) {
    return true;
  }
  return DISCONNECT_MESSAGE_MARKERS.some((marker) => error.message.includes(marker));
}

/**
 * A failed upstream read whose cause is a disconnect. Errors raised while
 * decoding what was read, such as an embedded upstream error object, never
 * qualify.
 */
export function isReadDisconnect(error: unknown): error is TransportDisconnectError {
  return error instanceof TransportDisconnectError && isDisconnectError(error.cause);
}
