export type ProxyErrorCode =
  | 'HANDSHAKE_FAILED'
  | 'CONNECTION_LOST'
  | 'AUTH_REJECTED'
  | 'FRAMING_ERROR'
  | 'IDLE_TIMEOUT'
  | 'CLIENT_WRITE_FAILED'
  | 'DETECTION_FAILED'
  | 'CONFIG_INVALID'
  | 'DEPENDENCY_MISSING';

export class ProxyError extends Error {
  readonly code: ProxyErrorCode;

  constructor(code: ProxyErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** TCP connect or TLS negotiation failed. */
export class HandshakeError extends ProxyError {
  constructor(message: string, options?: ErrorOptions) {
    super('HANDSHAKE_FAILED', message, options);
  }
}

export class ConnectionLostError extends ProxyError {
  constructor(message = 'Printer closed the stream', options?: ErrorOptions) {
    super('CONNECTION_LOST', message, options);
  }
}

export class AuthRejectedError extends ProxyError {
  constructor(message = 'Printer closed the connection after authentication') {
    super('AUTH_REJECTED', message);
  }
}

export class FramingError extends ProxyError {
  constructor(message: string) {
    super('FRAMING_ERROR', message);
  }
}

export class IdleTimeoutError extends ProxyError {
  readonly idleMs: number;

  constructor(idleMs: number) {
    super('IDLE_TIMEOUT', `No frame received for ${idleMs}ms`);
    this.idleMs = idleMs;
  }
}

export class ClientWriteError extends ProxyError {
  constructor(message: string, options?: ErrorOptions) {
    super('CLIENT_WRITE_FAILED', message, options);
  }
}

export class DetectionError extends ProxyError {
  constructor(message: string) {
    super('DETECTION_FAILED', message);
  }
}

export class ConfigError extends ProxyError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** External programs the selected mode runs are not on PATH. */
export class DependencyError extends ProxyError {
  readonly missing: string[];

  constructor(missing: string[], hints: string[]) {
    super(
      'DEPENDENCY_MISSING',
      [`Missing required dependencies: ${missing.join(', ')}`, ...hints].join('\n'),
    );
    this.missing = missing;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
