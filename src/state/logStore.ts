import { createStore } from 'zustand/vanilla';
import type { AuditLogEntry, LogLevel } from '../types/logs';

const DEFAULT_LEVELS: LogLevel[] = ['INFO', 'WARN', 'ERROR', 'ACTION'];
const MAX_ENTRIES = 500;

export interface LogState {
  entries: AuditLogEntry[];
  filtered: AuditLogEntry[];
  truncated: boolean;
  search: string;
  activeLevels: LogLevel[];
  record: (level: LogLevel, message: string, detail?: unknown) => AuditLogEntry;
  setSearch: (value: string) => void;
  toggleLevel: (level: LogLevel) => void;
  clear: () => void;
}

export type LogStore = ReturnType<typeof createLogStore>;

function filterEntries(
  entries: AuditLogEntry[],
  search: string,
  activeLevels: LogLevel[],
): AuditLogEntry[] {
  const needle = search.trim().toLowerCase();
  const hasSearch = needle.length > 0;
  const levelSet = new Set(activeLevels);

  return entries.filter((entry) => {
    if (!levelSet.has(entry.level)) {
      return false;
    }
    if (!hasSearch) {
      return true;
    }
    return entry.message.toLowerCase().includes(needle) || entry.raw.toLowerCase().includes(needle);
  });
}

function formatDetail(detail: unknown): string | null {
  if (detail === undefined) {
    return null;
  }
  if (detail instanceof Error) {
    return detail.message;
  }
  if (typeof detail === 'string') {
    return detail;
  }
  try {
    return JSON.stringify(detail);
  } catch {
    return String(detail);
  }
}

export function createLogStore() {
  return createStore<LogState>((set) => ({
    entries: [],
    filtered: [],
    truncated: false,
    search: '',
    activeLevels: [...DEFAULT_LEVELS],
    record(level, message, detail) {
      const formatted = formatDetail(detail);
      const entry: AuditLogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
        detail: formatted,
        raw: formatted === null ? `${level} ${message}` : `${level} ${message} ${formatted}`,
      };
      set((state) => {
        const appended = [...state.entries, entry];
        const truncated = state.truncated || appended.length > MAX_ENTRIES;
        const entries = appended.length > MAX_ENTRIES ? appended.slice(-MAX_ENTRIES) : appended;
        return {
          entries,
          truncated,
          filtered: filterEntries(entries, state.search, state.activeLevels),
        };
      });
      return entry;
    },
    setSearch(value) {
      set((state) => ({
        search: value,
        filtered: filterEntries(state.entries, value, state.activeLevels),
      }));
    },
    toggleLevel(level) {
      set((state) => {
        const nextLevels = state.activeLevels.includes(level)
          ? state.activeLevels.filter((value) => value !== level)
          : [...state.activeLevels, level];
        return {
          activeLevels: nextLevels,
          filtered: filterEntries(state.entries, state.search, nextLevels),
        };
      });
    },
    clear() {
      set({ entries: [], filtered: [], truncated: false });
    },
  }));
}

/**
 * Console output mirrored into the audit log, so hosts can show recent
 * warnings without scraping stderr.
 */
export interface WheelLogger {
  info: (message: string, detail?: unknown) => void;
  warn: (message: string, detail?: unknown) => void;
  error: (message: string, detail?: unknown) => void;
  action: (message: string, detail?: unknown) => void;
}

export function createWheelLogger(store: LogStore, prefix = '[wheel]'): WheelLogger {
  const emit = (level: LogLevel, message: string, detail: unknown) => {
    store.getState().record(level, message, detail);
    const line = `${prefix} ${message}`;
    const args = detail === undefined ? [line] : [line, detail];
    if (level === 'ERROR') {
      console.error(...args);
    } else if (level === 'WARN') {
      console.warn(...args);
    } else {
      console.info(...args);
    }
  };

  return {
    info: (message, detail) => emit('INFO', message, detail),
    warn: (message, detail) => emit('WARN', message, detail),
    error: (message, detail) => emit('ERROR', message, detail),
    action: (message, detail) => emit('ACTION', message, detail),
  };
}
