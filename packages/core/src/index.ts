export type {
  JsonArray,
  JsonifibleObject,
  JsonifibleValue,
  JsonObject,
  JsonPrimitive,
  JsonValue,
} from '#json';
export type { Log, LogLevel } from '#logging';
export type { SecurityErrorCode } from '#error';

export { isJsonObject, parseJson } from '#json';
export { filterLog, isLogLevel } from '#logging';
export { SecurityError, isSecurityError, jsonifyError } from '#error';
export { generateSessionId, toBase62 } from '#id';
export { normalizePrincipal } from '#principal';

/** source of the current time in epoch milliseconds, injectable for tests */
export type Clock = () => number;
