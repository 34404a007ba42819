/**
 * @tickwise/utils - Shared utilities
 */

import winston from 'winston';
import { v4 as uuidv4 } from 'uuid';

export type LogMeta = Record<string, unknown>;

// Logger
export class Logger {
  private logger: winston.Logger;
  private readonly name: string;

  constructor(name: string, options?: winston.LoggerOptions) {
    this.name = name;
    this.logger = winston.createLogger({
      level: options?.level || process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: name },
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        })
      ],
      ...options
    });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, stack: error.stack, ...meta });
    } else {
      this.logger.error(message, { error, ...meta });
    }
  }

  child(name: string): Logger {
    return new Logger(`${this.name}.${name}`, { level: this.logger.level });
  }

  get level(): string {
    return this.logger.level;
  }

  set level(level: string) {
    this.logger.level = level;
  }
}

// Circular Buffer
export class CircularBuffer<T> {
  private buffer: (T | undefined)[];
  private head: number = 0;
  private tail: number = 0;
  private count: number = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`CircularBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array(capacity);
  }

  /**
   * Push an item, returning the evicted oldest item when the buffer was full
   */
  push(item: T): T | undefined {
    let evicted: T | undefined;

    if (this.count === this.capacity) {
      evicted = this.buffer[this.head];
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.count++;
    }

    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.capacity;

    return evicted;
  }

  pop(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }

    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;

    return item;
  }

  peek(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.buffer[this.head];
  }

  /**
   * Most recently pushed item
   */
  last(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.buffer[(this.tail - 1 + this.capacity) % this.capacity];
  }

  toArray(): T[] {
    const result: T[] = [];
    let index = this.head;

    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[index];
      if (item !== undefined) {
        result.push(item);
      }
      index = (index + 1) % this.capacity;
    }

    return result;
  }

  clear(): void {
    this.buffer = new Array(this.capacity);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }

  get size(): number {
    return this.count;
  }

  get maxSize(): number {
    return this.capacity;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }
}

// ID Generator
export function generateId(prefix?: string): string {
  const id = uuidv4();
  return prefix ? `${prefix}_${id}` : id;
}

/**
 * Local calendar date key (YYYY-MM-DD) for a millisecond timestamp
 */
export function localDateKey(timestamp: number): string {
  const date = new Date(timestamp);
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

// Export graceful shutdown utilities
export * from './graceful-shutdown';
