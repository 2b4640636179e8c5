import type { LogLevel } from "../utils/logger.js";

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  source?: string;
}

export interface LogFilterOptions {
  levels?: LogLevel[];
  source?: string;
  /** Case-insensitive text search in the message */
  search?: string;
}

/**
 * Ring buffer for the most recent log entries.
 * Lets a host surface the tabsets log without reading the console.
 */
export class LogBuffer {
  private buffer: LogEntry[] = [];
  private nextId = 1;
  private listeners: Array<(entry: LogEntry) => void> = [];

  constructor(private readonly maxSize: number = 500) {}

  push(entry: Omit<LogEntry, "id">): LogEntry {
    const record: LogEntry = { id: `log-${this.nextId++}`, ...entry };
    this.buffer.push(record);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
    for (const listener of this.listeners) {
      listener(record);
    }
    return record;
  }

  /**
   * Subscribe to entries as they are recorded.
   * @returns Unsubscribe function
   */
  onEntry(listener: (entry: LogEntry) => void): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  getAll(): LogEntry[] {
    return [...this.buffer];
  }

  getFiltered(options: LogFilterOptions): LogEntry[] {
    const search = options.search?.toLowerCase();
    return this.buffer.filter((entry) => {
      if (options.levels && !options.levels.includes(entry.level)) return false;
      if (options.source && entry.source !== options.source) return false;
      if (search && !entry.message.toLowerCase().includes(search)) return false;
      return true;
    });
  }

  size(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer = [];
  }
}

export const logBuffer = new LogBuffer();
