/**
 * Logger - Pub/Sub event system for parser diagnostics
 *
 * Parse entry points publish an event for every rejected input. Subscribers
 * can listen to all events or filter by source, event prefix or level.
 */

import { LoggerOptionsSchema, type LoggerOptions } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ParserLog {
  timestamp: number;
  level: LogLevel;
  source: string;        // component that emitted the event (e.g. "parser", "format")
  event: string;          // event name (e.g. "parse:rejected")
  message: string;        // human-readable description
  data?: Record<string, unknown>; // optional structured data
}

export type LogSubscriber = (log: ParserLog) => void;

interface Subscription {
  id: number;
  subscriber: LogSubscriber;
  filter?: {
    source?: string;
    event?: string;
    level?: LogLevel;
  };
}

class LoggerSingleton {
  private subscriptions: Subscription[] = [];
  private nextId = 1;
  private logs: ParserLog[] = [];
  private maxLogs = LoggerOptionsSchema.parse({}).maxLogs;

  /**
   * Apply logger options; invalid values are rejected by the schema
   */
  configure(options: LoggerOptions): void {
    const resolved = LoggerOptionsSchema.parse(options);
    this.maxLogs = resolved.maxLogs;
    this.trim();
  }

  /**
   * Publish a log event
   */
  log(level: LogLevel, source: string, event: string, message: string, data?: Record<string, unknown>): void {
    const entry: ParserLog = {
      timestamp: Date.now(),
      level,
      source,
      event,
      message,
      data,
    };

    this.logs.push(entry);
    this.trim();

    for (const sub of this.subscriptions) {
      if (sub.filter) {
        if (sub.filter.source && sub.filter.source !== source) continue;
        if (sub.filter.event && !event.startsWith(sub.filter.event)) continue;
        if (sub.filter.level && sub.filter.level !== level) continue;
      }
      sub.subscriber(entry);
    }
  }

  debug(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', source, event, message, data);
  }

  info(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', source, event, message, data);
  }

  warn(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', source, event, message, data);
  }

  error(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', source, event, message, data);
  }

  /**
   * Subscribe to log events with optional filter
   */
  subscribe(subscriber: LogSubscriber, filter?: Subscription['filter']): number {
    const id = this.nextId++;
    this.subscriptions.push({ id, subscriber, filter });
    return id;
  }

  unsubscribe(id: number): void {
    this.subscriptions = this.subscriptions.filter(s => s.id !== id);
  }

  /**
   * Get all stored logs
   */
  getLogs(): ParserLog[] {
    return [...this.logs];
  }

  getLogsBySource(source: string): ParserLog[] {
    return this.logs.filter(l => l.source === source);
  }

  /**
   * Clear all logs and subscriptions, and restore default options
   */
  reset(): void {
    this.logs = [];
    this.subscriptions = [];
    this.nextId = 1;
    this.maxLogs = LoggerOptionsSchema.parse({}).maxLogs;
  }

  private trim(): void {
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-Math.floor(this.maxLogs / 2));
    }
  }
}

export const Logger = new LoggerSingleton();
