import { createWriteStream } from 'node:fs';

import { jsonifyError } from '@credgate/core';

import type { WriteStream } from 'node:fs';

import type { Clock, JsonifibleObject, Log } from '@credgate/core';

// TYPES //

/** every security-relevant transition that is recorded */
export type AuditEventType =
  | 'session_token_generated'
  | 'session_token_verified'
  | 'session_token_rejected'
  | 'session_registered'
  | 'session_principal_limit_exceeded'
  | 'session_access_granted'
  | 'session_access_denied'
  | 'session_revoked'
  | 'principal_revoked'
  | 'sessions_expired'
  | 'rate_limit_exceeded'
  | 'failed_attempt_recorded'
  | 'proxy_client_registered'
  | 'proxy_client_rejected'
  | 'proxy_client_updated'
  | 'proxy_client_deleted'
  | 'proxy_clients_expired'
  | 'token_exchanged';

/** an immutable audit record */
export interface AuditEvent {
  readonly eventType: AuditEventType;
  /** ISO-8601 time of the event */
  readonly timestamp: string;
  readonly fields: Readonly<JsonifibleObject>;
}

/** append-only destination for audit events */
export interface AuditLog {
  /** appends one event; never blocks on readers */
  append(event: AuditEvent): void;
  /** flushes and releases the underlying resource, if any */
  close?(): Promise<void>;
}

/** events that indicate misuse and are also surfaced as warnings */
const ALERT_EVENTS: ReadonlySet<AuditEventType> = new Set<AuditEventType>([
  'session_token_rejected',
  'session_principal_limit_exceeded',
  'session_access_denied',
  'rate_limit_exceeded',
  'proxy_client_rejected',
]);

/**
 * checks whether an event type is a security alert
 * @param eventType audit event type
 * @returns true for alert events
 */
export function isSecurityAlert(eventType: AuditEventType): boolean {
  return ALERT_EVENTS.has(eventType);
}

// SINKS //

/** keeps events in memory, for tests and introspection */
export class MemoryAuditLog implements AuditLog {
  #events: AuditEvent[] = [];

  /** all recorded events in order */
  public get events(): readonly AuditEvent[] {
    return this.#events;
  }

  public append(event: AuditEvent): void {
    this.#events.push(event);
  }

  /**
   * filters events by type
   * @param eventType type to select
   * @returns matching events in order
   */
  public ofType(eventType: AuditEventType): AuditEvent[] {
    return this.#events.filter((event) => event.eventType === eventType);
  }
}

/** appends one json object per line to an owner-only file */
export class JsonlAuditLog implements AuditLog {
  #stream: WriteStream;

  /**
   * opens the audit file for appending
   * @param path audit file path
   * @param log optional logger for write failures
   */
  constructor(path: string, log?: Log) {
    this.#stream = createWriteStream(path, { flags: 'a', mode: 0o600 });
    this.#stream.on('error', (error) => {
      log?.('error', 'failed to write audit log', {
        path,
        error: jsonifyError(error),
      });
    });
  }

  public append(event: AuditEvent): void {
    this.#stream.write(JSON.stringify(toAuditLine(event)) + '\n');
  }

  public async close(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.#stream.end(() => resolve());
    });
  }
}

/**
 * creates an audit sink that forwards events to a log function
 * @param log log function receiving one `info` entry per event
 * @returns audit log
 */
export function createLogAuditLog(log: Log): AuditLog {
  return {
    append: (event) => log('info', 'audit event', toAuditLine(event)),
  };
}

/**
 * flattens an event into its serialised line
 * @param event audit event
 * @returns json object with `event_type` and `timestamp` first
 */
export function toAuditLine(event: AuditEvent): JsonifibleObject {
  return {
    event_type: event.eventType,
    timestamp: event.timestamp,
    ...event.fields,
  };
}

// RECORDER //

/** stamps, stores and, for alerts, logs audit events */
export class AuditTrail {
  #sink: AuditLog;
  #log?: Log;
  #now: Clock;

  /**
   * creates an audit trail
   * @param sink destination of the events
   * @param options logger and clock
   * @param options.log receives a warning for every alert
   * @param options.now clock for timestamps
   */
  constructor(sink: AuditLog, options: { log?: Log; now?: Clock } = {}) {
    this.#sink = sink;
    this.#log = options.log;
    this.#now = options.now ?? Date.now;
  }

  /**
   * records one event
   * @param eventType audit event type
   * @param fields structured fields, never secrets
   */
  public record(eventType: AuditEventType, fields: JsonifibleObject): void {
    const event: AuditEvent = Object.freeze({
      eventType,
      timestamp: new Date(this.#now()).toISOString(),
      fields: Object.freeze({ ...fields }),
    });

    this.#sink.append(event);

    if (isSecurityAlert(eventType)) {
      this.#log?.('warn', `security alert: ${eventType}`, fields);
    }
  }
}
