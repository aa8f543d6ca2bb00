import { ACTIVATION_KEYS, type ActivationKey } from '../types/settings';

export type HotkeySignal = 'activated' | 'deactivated';
export type HotkeyListener = (signal: HotkeySignal) => void;
export type UnlistenFn = () => void;

/** Edge-triggered activation signals delivered from the key-capture side. */
export interface HotkeySource {
  subscribe: (listener: HotkeyListener) => UnlistenFn;
  /** Sources that match keys themselves follow `activationKeys` from settings. */
  setKeys?: (keys: readonly [ActivationKey, ActivationKey]) => void;
}

export interface ChordTracker extends HotkeySource {
  press: (key: string) => void;
  release: (key: string) => void;
  setKeys: (keys: readonly [ActivationKey, ActivationKey]) => void;
  isActive: () => boolean;
  reset: () => void;
}

const NORMALIZED_KEYS: Record<string, ActivationKey> = {
  super: 'super',
  meta: 'super',
  cmd: 'super',
  command: 'super',
  win: 'super',
  os: 'super',
  alt: 'alt',
  option: 'alt',
  altgr: 'alt',
  ctrl: 'ctrl',
  control: 'ctrl',
  shift: 'shift',
};

const SIDE_SUFFIX = /(?:[_\s-]?(?:left|right|l|r))$/;
const SIDE_PREFIX = /^(?:left|right)[_\s-]?/;

/**
 * Maps key names from capture libraries (`Key.cmd_l`, `MetaLeft`, `Alt_R`,
 * `Control`) onto activation keys. Anything else is `null`.
 */
export function normalizeKeyName(key: string): ActivationKey | null {
  const lower = key.trim().toLowerCase().replace(/^key\./, '');
  const direct = NORMALIZED_KEYS[lower];
  if (direct) {
    return direct;
  }
  const stripped = lower.replace(SIDE_PREFIX, '').replace(SIDE_SUFFIX, '');
  return NORMALIZED_KEYS[stripped] ?? null;
}

function isActivationKey(value: string): value is ActivationKey {
  return ACTIVATION_KEYS.some((key) => key === value);
}

/**
 * Fires `activated` once both chord keys are held and `deactivated` as soon
 * as either is released. Left and right variants count as the same key.
 */
export function createChordTracker(keys: readonly [ActivationKey, ActivationKey]): ChordTracker {
  const listeners = new Set<HotkeyListener>();
  const held = new Map<ActivationKey, Set<string>>();
  let chord: readonly [ActivationKey, ActivationKey] = [...keys];
  let active = false;

  const emit = (signal: HotkeySignal) => {
    listeners.forEach((listener) => listener(signal));
  };

  const isHeld = (key: ActivationKey) => (held.get(key)?.size ?? 0) > 0;

  const update = () => {
    const chordHeld = isHeld(chord[0]) && isHeld(chord[1]);
    if (chordHeld && !active) {
      active = true;
      emit('activated');
    } else if (!chordHeld && active) {
      active = false;
      emit('deactivated');
    }
  };

  return {
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    press(key) {
      const normalized = normalizeKeyName(key);
      if (!normalized) {
        return;
      }
      const variants = held.get(normalized) ?? new Set<string>();
      variants.add(key.trim().toLowerCase());
      held.set(normalized, variants);
      update();
    },
    release(key) {
      const normalized = normalizeKeyName(key);
      if (!normalized) {
        return;
      }
      held.get(normalized)?.delete(key.trim().toLowerCase());
      update();
    },
    setKeys(next) {
      const valid = next.filter(isActivationKey);
      if (valid.length !== 2 || valid[0] === valid[1]) {
        return;
      }
      chord = [valid[0], valid[1]];
      update();
    },
    isActive: () => active,
    reset() {
      held.clear();
      if (active) {
        active = false;
        emit('deactivated');
      }
    },
  };
}
