import { parseJson } from '#json';

import type { JsonifibleObject } from '#json';

// SECURITY ERRORS //

/** every failure class the credential-isolation layer can report */
export type SecurityErrorCode =
  | 'client_not_found'
  | 'invalid_client_credentials'
  | 'invalid_registration_token'
  | 'upstream_exchange_failed'
  | 'session_not_found'
  | 'session_expired'
  | 'unauthorized'
  | 'storage_decrypt_failed'
  | 'rate_limited';

/**
 * error raised by the proxy, session and storage layers
 * the message is safe to log but callers should only ever see the code
 */
export class SecurityError extends Error {
  public readonly code: SecurityErrorCode;

  /**
   * creates a new SecurityError
   * @param code taxonomy code of the failure
   * @param message diagnostic message for logs
   * @param options standard error options such as cause
   */
  constructor(code: SecurityErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SecurityError';
    this.code = code;
  }
}

/**
 * checks whether a thrown value is a SecurityError with the given code
 * @param error caught value
 * @param code expected code
 * @returns true when the error carries the code
 */
export function isSecurityError(
  error: unknown,
  code?: SecurityErrorCode,
): error is SecurityError {
  return (
    error instanceof SecurityError && (code === undefined || error.code === code)
  );
}

// SERIALIZATION //

/**
 * converts any error caught in a try-catch block to a json-compatible format
 * @param error any value that was thrown/caught
 * @returns a json-serializable representation of the error
 */
export function jsonifyError(error: unknown): JsonifibleObject {
  if (error instanceof Error) {
    return {
      type: 'Error',
      name: error.name,
      message: error.message,
      ...(error instanceof SecurityError && { code: error.code }),
      stack: error.stack,
      ...(error instanceof AggregateError && {
        errors: error.errors.map(jsonifyError),
      }),
      ...(error.cause !== undefined && { cause: jsonifyError(error.cause) }),
    };
  }

  switch (typeof error) {
    case 'object':
      return error === null
        ? { type: 'null', value: null }
        : jsonifyObject(error);
    case 'boolean':
    case 'number':
    case 'string':
    case 'undefined':
      return { type: typeof error, value: error };
    case 'bigint':
      return { type: 'bigint', value: String(error) };
    case 'symbol':
      return { type: 'symbol', description: error.description };
    case 'function':
      return { type: 'function', name: error.name || 'anonymous' };
    default:
      return { type: 'unknown' };
  }
}

/**
 * serialises a non-error object, tolerating circular references
 * @param value object that was thrown
 * @returns json-safe representation
 */
function jsonifyObject(value: object): JsonifibleObject {
  const tag = Object.prototype.toString.call(value);
  if (value instanceof Map || value instanceof Set || tag.startsWith('[object Weak')) {
    return { type: 'unknown', toString: tag };
  }

  const serialized = parseJson(JSON.stringify(value, getCircularReplacer()));

  return {
    type: Array.isArray(value) ? 'array' : 'object',
    value: serialized,
  };
}

/**
 * creates a replacer function that handles circular references
 * @returns function that replaces circular references for json.stringify
 */
function getCircularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet();

  return (_key: string, value: unknown) => {
    if (typeof value === 'function') {
      return undefined;
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };
}
