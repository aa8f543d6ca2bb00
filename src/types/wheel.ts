export const SLOT_COUNT = 8;
export const BACK_SLOT_INDEX = 7;
export const EMPTY_SLOT_LABEL = 'Select to add action';
export const BACK_SLOT_LABEL = 'Back';

// Clockwise from the right-hand axis.
export const SLOT_POSITION_NAMES = [
  'right',
  'bottom-right',
  'bottom',
  'bottom-left',
  'left',
  'top-left',
  'top',
  'top-right',
] as const;

export type SlotPositionName = (typeof SLOT_POSITION_NAMES)[number];

export type SlotActionType = 'none' | 'keystroke' | 'command' | 'launch' | 'folder' | 'back';

export type ExecutableActionType = Extract<SlotActionType, 'keystroke' | 'command' | 'launch'>;

export const SLOT_ACTION_TYPES: readonly SlotActionType[] = [
  'none',
  'keystroke',
  'command',
  'launch',
  'folder',
  'back',
];

export interface SlotIcon {
  kind: 'emoji' | 'image';
  data: string;
}

export interface Slot {
  label: string;
  actionType: SlotActionType;
  value: string | null;
  icon: SlotIcon | null;
  showLabel: boolean;
}

export interface Folder {
  slots: Slot[];
}

/** Folder arena keyed by stable ids; the root folder lives outside it. */
export interface FolderGraph {
  root: Folder;
  folders: Record<string, Folder>;
}

export type NavigationPath = readonly string[];

export function createEmptySlot(): Slot {
  return {
    label: EMPTY_SLOT_LABEL,
    actionType: 'none',
    value: null,
    icon: null,
    showLabel: true,
  };
}

export function createBackSlot(): Slot {
  return {
    label: BACK_SLOT_LABEL,
    actionType: 'back',
    value: null,
    icon: null,
    showLabel: true,
  };
}

export function createRootFolder(): Folder {
  return { slots: Array.from({ length: SLOT_COUNT }, () => createEmptySlot()) };
}

export function createChildFolder(): Folder {
  const slots = Array.from({ length: SLOT_COUNT }, () => createEmptySlot());
  slots[BACK_SLOT_INDEX] = createBackSlot();
  return { slots };
}

export function createDefaultGraph(): FolderGraph {
  return { root: createRootFolder(), folders: {} };
}

export function cloneSlot(slot: Slot): Slot {
  return { ...slot, icon: slot.icon ? { ...slot.icon } : null };
}

export function isSlotIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < SLOT_COUNT;
}

export function isExecutableActionType(type: SlotActionType): type is ExecutableActionType {
  return type === 'keystroke' || type === 'command' || type === 'launch';
}

export function isNavigationActionType(type: SlotActionType): boolean {
  return type === 'folder' || type === 'back';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSlotActionType(value: unknown): value is SlotActionType {
  return typeof value === 'string' && SLOT_ACTION_TYPES.some((type) => type === value);
}

function normalizeIcon(raw: unknown): SlotIcon | null {
  if (!isRecord(raw)) {
    return null;
  }
  const { kind, data } = raw;
  if ((kind === 'emoji' || kind === 'image') && typeof data === 'string' && data.length > 0) {
    return { kind, data };
  }
  return null;
}

/**
 * Coerces a stored slot into a well-formed one. Unknown action types and
 * actions missing their value collapse to an empty slot.
 */
export function normalizeSlot(raw: unknown): Slot {
  if (!isRecord(raw)) {
    return createEmptySlot();
  }
  // Older documents keep the action under `type` with `null` for empty slots.
  const rawType = raw.actionType ?? raw.type ?? 'none';
  const actionType: SlotActionType = rawType === null ? 'none' : isSlotActionType(rawType) ? rawType : 'none';
  const value = typeof raw.value === 'string' && raw.value.length > 0 ? raw.value : null;

  if (actionType === 'none') {
    return createEmptySlot();
  }
  if (actionType === 'back') {
    return createBackSlot();
  }
  if (value === null) {
    return createEmptySlot();
  }

  return {
    label: typeof raw.label === 'string' ? raw.label : value,
    actionType,
    value,
    icon: normalizeIcon(raw.icon),
    showLabel: typeof raw.showLabel === 'boolean' ? raw.showLabel : true,
  };
}

export function normalizeFolder(raw: unknown, isRoot: boolean): Folder {
  const rawSlots = isRecord(raw) && Array.isArray(raw.slots) ? raw.slots : [];
  const slots = Array.from({ length: SLOT_COUNT }, (_, index) => normalizeSlot(rawSlots[index]));

  slots.forEach((slot, index) => {
    if (slot.actionType === 'back' && (isRoot || index !== BACK_SLOT_INDEX)) {
      slots[index] = createEmptySlot();
    }
  });
  if (!isRoot) {
    slots[BACK_SLOT_INDEX] = createBackSlot();
  }

  return { slots };
}

/** Accepts both `{ root, folders }` and the flat `{ root, <id>: folder }` layout. */
export function normalizeGraph(raw: unknown): FolderGraph | null {
  if (!isRecord(raw) || !isRecord(raw.root)) {
    return null;
  }

  const folders: Record<string, Folder> = {};
  const source = isRecord(raw.folders)
    ? raw.folders
    : Object.fromEntries(
        Object.entries(raw).filter(([key]) => key !== 'root' && key !== 'settings' && key !== 'version'),
      );

  for (const [id, folder] of Object.entries(source)) {
    if (id.length > 0 && isRecord(folder)) {
      folders[id] = normalizeFolder(folder, false);
    }
  }

  return { root: normalizeFolder(raw.root, true), folders };
}
