export * from './types/wheel';
export * from './types/settings';
export * from './types/errors';
export * from './types/slotDraft';
export type { AuditLogEntry, LogLevel } from './types/logs';
export * from './utils/radial-math';
export * from './hotkeys/chordTracker';
export * from './persistence/types';
export { createMemoryPersistence, type MemoryPersistence } from './persistence/memoryPersistence';
export { createJsonFilePersistence } from './persistence/jsonFilePersistence';
export { createFolderGraphStore, type FolderGraphState, type FolderGraphStore } from './state/folderGraphStore';
export { createSettingsStore, type SettingsState, type SettingsStore } from './state/settingsStore';
export {
  createNavigationStore,
  type NavigationSnapshot,
  type NavigationState,
  type NavigationStore,
} from './state/navigationStore';
export { createLogStore, createWheelLogger, type LogStore, type WheelLogger } from './state/logStore';
export { createActionMetricsStore, type ActionMetricsState, type ActionMetricsStore } from './state/actionMetricsStore';
export type { ActionOutcome, ActionOutcomeInput, ActionOutcomeStatus, OutcomeTally } from './state/types';
export * from './pie-overlay/types';
export {
  createFolderId,
  createWheelController,
  type WheelController,
  type WheelControllerOptions,
  type WheelStores,
} from './pie-overlay/wheelController';
