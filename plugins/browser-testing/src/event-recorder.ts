import type { EnginePage, PageEvent } from './engine.js';

export type ConsoleLevel = 'log' | 'warn' | 'error' | 'info';

export interface ConsoleRecord {
  level: ConsoleLevel;
  text: string;
  timestamp: string;
}

export interface NetworkRecord {
  method: string;
  url: string;
  resourceType: string;
  status: number | null;
  failure: string | null;
  requestTimestamp: string;
  responseTimestamp: string | null;
}

export interface RecorderLimits {
  console: number;
  network: number;
}

export interface NetworkFilter {
  method?: string;
  urlPattern?: string;
}

/**
 * Fixed-capacity FIFO. `push` is O(1) and hands back the evicted item once
 * the buffer is full.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.size;
  }

  push(item: T): T | undefined {
    const tail = (this.head + this.size) % this.capacity;
    if (this.size < this.capacity) {
      this.slots[tail] = item;
      this.size++;
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.size; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.size = 0;
  }
}

export function normalizeConsoleLevel(type: string): ConsoleLevel {
  switch (type) {
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
    case 'assert':
      return 'error';
    case 'info':
      return 'info';
    default:
      return 'log';
  }
}

/**
 * Buffers console messages and network traffic emitted by the active page.
 *
 * Records are appended in emission order. A network record is created when
 * the request goes out and completed in place when its response (or
 * failure) arrives, matched by request id.
 */
export class EventRecorder {
  private readonly consoleLog: RingBuffer<ConsoleRecord>;
  private readonly networkLog: RingBuffer<NetworkRecord>;
  private readonly pending = new Map<string, NetworkRecord>();
  private readonly pendingIds = new WeakMap<NetworkRecord, string>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    limits: RecorderLimits,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.consoleLog = new RingBuffer(limits.console);
    this.networkLog = new RingBuffer(limits.network);
  }

  get attached(): boolean {
    return this.unsubscribe !== null;
  }

  attach(page: EnginePage): void {
    this.detach();
    this.unsubscribe = page.subscribe((event) => this.record(event));
  }

  detach(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  record(event: PageEvent): void {
    const timestamp = this.now().toISOString();
    switch (event.type) {
      case 'console':
        this.consoleLog.push({
          level: normalizeConsoleLevel(event.level),
          text: event.text,
          timestamp,
        });
        return;
      case 'pageerror':
        this.consoleLog.push({ level: 'error', text: `Uncaught ${event.message}`, timestamp });
        return;
      case 'request': {
        const entry: NetworkRecord = {
          method: event.method,
          url: event.url,
          resourceType: event.resourceType,
          status: null,
          failure: null,
          requestTimestamp: timestamp,
          responseTimestamp: null,
        };
        this.pending.set(event.requestId, entry);
        this.pendingIds.set(entry, event.requestId);
        const evicted = this.networkLog.push(entry);
        if (evicted) this.forget(evicted);
        return;
      }
      case 'response': {
        const entry = this.take(event.requestId);
        if (entry) {
          entry.status = event.status;
          entry.responseTimestamp = timestamp;
        }
        return;
      }
      case 'requestfailed': {
        const entry = this.take(event.requestId);
        if (entry) {
          entry.failure = event.failure;
          entry.responseTimestamp = timestamp;
        }
        return;
      }
    }
  }

  consoleRecords(level?: ConsoleLevel): ConsoleRecord[] {
    const records = this.consoleLog.toArray();
    return (level ? records.filter((record) => record.level === level) : records).map((record) => ({
      ...record,
    }));
  }

  networkRecords(filter: NetworkFilter = {}): NetworkRecord[] {
    const method = filter.method?.toUpperCase();
    const urlPattern = filter.urlPattern;
    return this.networkLog
      .toArray()
      .filter(
        (record) =>
          (!method || record.method.toUpperCase() === method) &&
          (!urlPattern || record.url.includes(urlPattern)),
      )
      .map((record) => ({ ...record }));
  }

  get consoleCount(): number {
    return this.consoleLog.length;
  }

  get networkCount(): number {
    return this.networkLog.length;
  }

  clearConsole(): void {
    this.consoleLog.clear();
  }

  clearNetwork(): void {
    this.networkLog.clear();
    this.pending.clear();
  }

  clear(): void {
    this.clearConsole();
    this.clearNetwork();
  }

  private take(requestId: string): NetworkRecord | undefined {
    const entry = this.pending.get(requestId);
    if (entry) this.pending.delete(requestId);
    return entry;
  }

  private forget(entry: NetworkRecord): void {
    const requestId = this.pendingIds.get(entry);
    if (requestId !== undefined && this.pending.get(requestId) === entry) {
      this.pending.delete(requestId);
    }
  }
}
