import { vi } from 'vitest';
import type { Slot } from '../types/wheel';
import type { HitTarget } from '../utils/radial-math';

export function folderSlot(label: string, id: string): Slot {
  return { label, actionType: 'folder', value: id, icon: null, showLabel: true };
}

export function commandSlot(label: string, value: string): Slot {
  return { label, actionType: 'command', value, icon: null, showLabel: true };
}

export function keystrokeSlot(label: string, value: string): Slot {
  return { label, actionType: 'keystroke', value, icon: null, showLabel: true };
}

export function slotTarget(index: number): HitTarget {
  return { kind: 'slot', index };
}

export const SETTINGS_TARGET: HitTarget = { kind: 'settings' };

export function silenceConsole() {
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
}

export async function flushMicrotasks(rounds = 5) {
  for (let i = 0; i < rounds; i += 1) {
    await Promise.resolve();
  }
}
