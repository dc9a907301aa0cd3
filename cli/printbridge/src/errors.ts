export type BridgeErrorKind =
  | "parse_error"
  | "field_validation_error"
  | "transport_error"
  | "unsupported_content_type"
  | "size_exceeded"
  | "fetch_transport_error"
  | "shutdown_requested"
  | "config_error";

export abstract class BridgeError extends Error {
  abstract readonly kind: BridgeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A frame that is not a JSON object. The frame is skipped; the session stays connected. */
export class ParseError extends BridgeError {
  readonly kind = "parse_error";

  constructor(message: string, readonly frame: string) {
    super(message);
  }
}

export class FieldValidationError extends BridgeError {
  readonly kind = "field_validation_error";

  constructor(readonly field: string, readonly value: unknown) {
    super(`invalid value for ${field}`);
  }
}

export class TransportError extends BridgeError {
  readonly kind = "transport_error";
}

export class UnsupportedContentType extends BridgeError {
  readonly kind = "unsupported_content_type";

  constructor(readonly contentType: string) {
    super(`unsupported content type '${contentType}'`);
  }
}

export class SizeExceeded extends BridgeError {
  readonly kind = "size_exceeded";

  constructor(readonly maxBytes: number) {
    super(`snapshot exceeded ${maxBytes} bytes`);
  }
}

export class FetchTransportError extends BridgeError {
  readonly kind = "fetch_transport_error";
}

export class ShutdownRequested extends BridgeError {
  readonly kind = "shutdown_requested";

  constructor() {
    super("shutdown requested");
  }
}

export class ConfigError extends BridgeError {
  readonly kind = "config_error";

  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
  }
}

export type SnapshotError = UnsupportedContentType | SizeExceeded | FetchTransportError;
