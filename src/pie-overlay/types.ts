import type { ExecutableActionType, Slot } from '../types/wheel';
import type { SlotDraft } from '../types/slotDraft';
import type { WheelSettings } from '../types/settings';
import type { Point, WheelGeometry } from '../utils/radial-math';

export interface CommittedAction {
  type: ExecutableActionType;
  value: string;
}

/** Everything the renderer needs for one frame. */
export interface WheelView {
  path: string[];
  slots: Slot[];
  hoveredIndex: number;
  hoveringSettings: boolean;
  /** Slot in the parent folder that opened the current one, for the center label. */
  parentSlot: Slot | null;
  geometry: WheelGeometry;
  settings: WheelSettings;
}

export interface SlotEditRequest {
  path: string[];
  index: number;
  draft: SlotDraft;
  /** Orphaned folders the user may reattach. */
  orphans: string[];
  /** Folders a purge would delete if this slot's folder is replaced. */
  replacedSubtree: string[];
}

export interface SlotEditOptions {
  /** Delete the overwritten folder's subtree instead of leaving it orphaned. */
  purgeReplacedFolder?: boolean;
}

export interface SlotEditResult {
  slot: Slot;
  orphaned: string[];
  purged: string[];
}

export type CommitOutcome =
  | { kind: 'none' }
  | { kind: 'settings' }
  | { kind: 'navigation'; index: number }
  | { kind: 'editor'; request: SlotEditRequest }
  | { kind: 'dispatched'; index: number; action: CommittedAction };

export type LoadOutcome = 'loaded' | 'created' | 'recovered';

export interface ActionExecutor {
  execute: (action: CommittedAction) => void | Promise<void>;
}

export interface WheelRenderer {
  render: (view: WheelView) => void;
  hide: () => void;
}

export interface SlotEditorHost {
  openSlotEditor: (request: SlotEditRequest) => void;
}

export interface SettingsHost {
  openSettings: () => void;
}

export interface WheelNotifier {
  warn: (message: string) => void;
}

export interface CursorSource {
  position: () => Point;
}
