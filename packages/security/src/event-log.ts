// Bounded in-memory log of security events
// One instance per sandbox; every append is mirrored to the structured logger

import { type Logger, createLogger } from "@taskguard/kernel";
import {
  SECURITY_EVENT_TYPES,
  type SecurityEvent,
  type SecurityEventType,
  type SecuritySeverity,
  severityRank,
} from "./types.js";

export const DEFAULT_EVENT_LOG_LIMIT = 1000;

export interface SecurityEventLogOptions {
  /** Oldest events are trimmed past this count (default: 1000) */
  maxEvents?: number;
  logger?: Logger;
}

export class SecurityEventLog {
  private events: SecurityEvent[] = [];
  private readonly maxEvents: number;
  private readonly log: Logger;

  constructor(options: SecurityEventLogOptions = {}) {
    this.maxEvents = options.maxEvents ?? DEFAULT_EVENT_LOG_LIMIT;
    this.log = options.logger ?? createLogger({ name: "security-events" });
  }

  append(event: SecurityEvent): void {
    this.events.push(event);

    // Trim if over limit
    while (this.events.length > this.maxEvents) {
      this.events.shift();
    }

    const { logLevel } = SECURITY_EVENT_TYPES[event.type];
    this.log[logLevel](event.description, {
      eventId: event.id,
      eventType: event.type,
      severity: event.severity,
      blocked: event.blocked,
      ...event.context,
    });
  }

  /** All events, oldest first */
  list(): SecurityEvent[] {
    return [...this.events];
  }

  /** The `count` most recent events, newest first */
  recent(count: number): SecurityEvent[] {
    if (count <= 0) return [];
    return this.events.slice(-count).reverse();
  }

  /** Events at or above `minSeverity`, oldest first */
  bySeverity(minSeverity: SecuritySeverity): SecurityEvent[] {
    const threshold = severityRank(minSeverity);
    return this.events.filter((event) => severityRank(event.severity) >= threshold);
  }

  countByType(): Partial<Record<SecurityEventType, number>> {
    const counts: Partial<Record<SecurityEventType, number>> = {};
    for (const event of this.events) {
      counts[event.type] = (counts[event.type] ?? 0) + 1;
    }
    return counts;
  }

  get blockedCount(): number {
    return this.events.filter((event) => event.blocked).length;
  }

  get size(): number {
    return this.events.length;
  }

  get capacity(): number {
    return this.maxEvents;
  }

  clear(): void {
    this.events = [];
  }
}
