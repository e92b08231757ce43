import type { LogEntry, LogSink } from '../src/types.js';

export interface MemorySink extends LogSink {
  entries: LogEntry[];
  flushes: number;
}

export function createMemorySink(): MemorySink {
  const sink: MemorySink = {
    entries: [],
    flushes: 0,
    write(entry) {
      sink.entries.push(entry);
    },
    async flush() {
      sink.flushes++;
    },
  };
  return sink;
}

export function lastEntry(sink: MemorySink): LogEntry | undefined {
  return sink.entries[sink.entries.length - 1];
}
