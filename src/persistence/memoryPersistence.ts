import type { WheelDocument, WheelPersistence } from './types';

export interface MemoryPersistence extends WheelPersistence {
  readonly saved: WheelDocument[];
  lastSaved: () => WheelDocument | null;
}

/** Keeps documents in process; used by tests and previews. */
export function createMemoryPersistence(initial?: unknown): MemoryPersistence {
  const saved: WheelDocument[] = [];
  let current: unknown = initial === undefined ? null : structuredClone(initial);

  return {
    saved,
    async load() {
      return current === null ? null : structuredClone(current);
    },
    async save(document) {
      const copy = structuredClone(document);
      saved.push(copy);
      current = copy;
    },
    lastSaved() {
      return saved.length ? saved[saved.length - 1] : null;
    },
  };
}
