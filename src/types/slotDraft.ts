import { WheelError } from './errors';
import { cloneSlot, createEmptySlot, type Slot, type SlotActionType, type SlotIcon } from './wheel';

export const DEFAULT_FOLDER_LABEL = 'Folder';
const COMMAND_LABEL_LENGTH = 30;

export interface SlotDraft {
  label: string;
  actionType: SlotActionType;
  value: string | null;
  icon: SlotIcon | null;
  showLabel: boolean;
  /** Orphaned folder id to reattach instead of creating a new folder. */
  restoreFolderId: string | null;
}

export function createSlotDraft(slot: Slot): SlotDraft {
  const copy = cloneSlot(slot);
  return {
    label: copy.actionType === 'none' ? '' : copy.label,
    actionType: copy.actionType,
    value: copy.value,
    icon: copy.icon,
    showLabel: copy.showLabel,
    restoreFolderId: null,
  };
}

function requireValue(draft: SlotDraft, missing: string): string {
  const value = draft.value?.trim() ?? '';
  if (!value) {
    throw new WheelError('INVALID_DRAFT', missing);
  }
  return value;
}

function lastPathSegment(path: string): string {
  const segments = path.split(/[\\/]/).filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? path;
}

/**
 * Turns an editor draft into a slot. Folder slots come back with a `null`
 * value: the caller assigns the folder id.
 */
export function finalizeSlotDraft(draft: SlotDraft): Slot {
  const label = draft.label.trim();
  const icon = draft.icon ? { ...draft.icon } : null;

  switch (draft.actionType) {
    case 'none':
      return createEmptySlot();
    case 'back':
      throw new WheelError('INVALID_DRAFT', 'The back slot cannot be assigned.');
    case 'keystroke': {
      const value = requireValue(draft, 'Please press a key combination.');
      return { label: label || value, actionType: 'keystroke', value, icon, showLabel: draft.showLabel };
    }
    case 'command': {
      const value = requireValue(draft, 'Please enter a command.');
      return {
        label: label || value.slice(0, COMMAND_LABEL_LENGTH),
        actionType: 'command',
        value,
        icon,
        showLabel: draft.showLabel,
      };
    }
    case 'launch': {
      const value = requireValue(draft, 'Please enter a program path.');
      return { label: label || lastPathSegment(value), actionType: 'launch', value, icon, showLabel: draft.showLabel };
    }
    case 'folder':
      return {
        label: label || DEFAULT_FOLDER_LABEL,
        actionType: 'folder',
        value: null,
        icon,
        showLabel: draft.showLabel,
      };
  }
}
