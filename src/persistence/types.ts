import type { Folder } from '../types/wheel';
import type { WheelSettings } from '../types/settings';

export const DOCUMENT_VERSION = 1;

export interface WheelDocument {
  version: number;
  settings: WheelSettings;
  root: Folder;
  folders: Record<string, Folder>;
}

/**
 * External store for the wheel document. Both calls may fail; `load` returns
 * whatever was stored and the caller validates it.
 */
export interface WheelPersistence {
  load: () => Promise<unknown>;
  save: (document: WheelDocument) => Promise<void>;
}
