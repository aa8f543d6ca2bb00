import { describe, expect, test } from 'vitest';
import { isWheelError } from '../errors';
import { createSlotDraft, finalizeSlotDraft, type SlotDraft } from '../slotDraft';
import { createEmptySlot } from '../wheel';

function draft(overrides: Partial<SlotDraft>): SlotDraft {
  return {
    label: '',
    actionType: 'none',
    value: null,
    icon: null,
    showLabel: true,
    restoreFolderId: null,
    ...overrides,
  };
}

describe('slot drafts', () => {
  test('an empty slot opens with a blank label', () => {
    expect(createSlotDraft(createEmptySlot())).toEqual(draft({}));
  });

  test('fills in labels from the action value', () => {
    expect(finalizeSlotDraft(draft({ actionType: 'keystroke', value: 'Ctrl+Shift+T' })).label).toBe('Ctrl+Shift+T');
    expect(
      finalizeSlotDraft(draft({ actionType: 'command', value: 'notify-send "build finished successfully"' })).label,
    ).toBe('notify-send "build finished su');
    expect(finalizeSlotDraft(draft({ actionType: 'launch', value: '/opt/tools/bin/editor' })).label).toBe('editor');
    expect(finalizeSlotDraft(draft({ actionType: 'launch', value: 'C:\\Tools\\viewer.exe' })).label).toBe('viewer.exe');
  });

  test('trims labels and values', () => {
    expect(finalizeSlotDraft(draft({ actionType: 'command', label: '  Term  ', value: '  xterm ' }))).toEqual({
      label: 'Term',
      actionType: 'command',
      value: 'xterm',
      icon: null,
      showLabel: true,
    });
  });

  test('folder drafts get the default label and no value', () => {
    expect(finalizeSlotDraft(draft({ actionType: 'folder' }))).toEqual({
      label: 'Folder',
      actionType: 'folder',
      value: null,
      icon: null,
      showLabel: true,
    });
  });

  test('clearing a slot ignores the rest of the draft', () => {
    expect(finalizeSlotDraft(draft({ actionType: 'none', label: 'Old', value: 'stale' }))).toEqual(createEmptySlot());
  });

  test('rejects actions without a value', () => {
    expect(() => finalizeSlotDraft(draft({ actionType: 'command', value: '   ' }))).toThrow('Please enter a command.');
    expect(() => finalizeSlotDraft(draft({ actionType: 'keystroke' }))).toThrow('Please press a key combination.');
    expect(() => finalizeSlotDraft(draft({ actionType: 'launch', value: '' }))).toThrow('Please enter a program path.');
  });

  test('the back action cannot be assigned', () => {
    let caught: unknown = null;
    try {
      finalizeSlotDraft(draft({ actionType: 'back' }));
    } catch (error) {
      caught = error;
    }
    expect(isWheelError(caught, 'INVALID_DRAFT')).toBe(true);
  });
});
