import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { createFolderGraphStore } from '../folderGraphStore';
import { createLogStore, createWheelLogger } from '../logStore';
import { createNavigationStore } from '../navigationStore';
import { createSettingsStore } from '../settingsStore';
import { normalizeSettings, type WheelSettings } from '../../types/settings';
import type { NavigationPath } from '../../types/wheel';
import { NO_HIT } from '../../utils/radial-math';
import { SETTINGS_TARGET, commandSlot, folderSlot, silenceConsole, slotTarget } from '../../__tests__/fixtures';

function setup(overrides: Partial<WheelSettings> = {}) {
  const graphStore = createFolderGraphStore();
  const settingsStore = createSettingsStore({ initialSettings: normalizeSettings(overrides) });
  const logStore = createLogStore();
  const onNavigate = vi.fn((_path: NavigationPath) => undefined);
  const navigation = createNavigationStore({
    graphStore,
    settingsStore,
    logger: createWheelLogger(logStore),
    onNavigate,
  });

  // root: 0 -> apps (0 -> editors), 1 command, 2 -> empty, 7 -> media
  const { setSlot } = graphStore.getState();
  setSlot([], 0, folderSlot('Apps', 'apps'));
  setSlot(['apps'], 0, folderSlot('Editors', 'editors'));
  setSlot([], 1, commandSlot('Echo', 'echo hi'));
  setSlot([], 2, folderSlot('Empty', 'empty'));
  setSlot([], 7, folderSlot('Media', 'media'));

  return { graphStore, settingsStore, logStore, navigation, onNavigate };
}

describe('navigationStore', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    silenceConsole();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  test('dwelling on a folder slot pushes exactly once', () => {
    const { navigation, onNavigate } = setup();

    navigation.getState().evaluate(slotTarget(2));
    vi.advanceTimersByTime(399);
    expect(navigation.getState().path).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(navigation.getState().path).toEqual(['empty']);

    vi.advanceTimersByTime(5000);
    expect(navigation.getState().path).toEqual(['empty']);
    expect(onNavigate).toHaveBeenCalledTimes(1);
    expect(onNavigate).toHaveBeenCalledWith(['empty']);
  });

  test('action slots never navigate', () => {
    const { navigation, onNavigate } = setup();

    navigation.getState().evaluate(slotTarget(1));
    expect(navigation.getState().dwellArmedFor).toBeNull();
    vi.advanceTimersByTime(10_000);

    expect(navigation.getState().path).toEqual([]);
    expect(navigation.getState().hoveredIndex).toBe(1);
    expect(onNavigate).not.toHaveBeenCalled();
  });

  test('a folder under the cursor after a push continues after the extended dwell', () => {
    const { navigation } = setup();

    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(400);
    expect(navigation.getState().path).toEqual(['apps']);
    expect(navigation.getState().dwellArmedFor).toBe(0);

    vi.advanceTimersByTime(599);
    expect(navigation.getState().path).toEqual(['apps']);
    vi.advanceTimersByTime(1);
    expect(navigation.getState().path).toEqual(['apps', 'editors']);
  });

  test('the extension applies only to the first evaluation after a push', () => {
    const { navigation } = setup();

    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(400);
    navigation.getState().evaluate(NO_HIT);
    expect(navigation.getState().dwellArmedFor).toBeNull();

    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(400);
    expect(navigation.getState().path).toEqual(['apps', 'editors']);
  });

  test('back is suppressed right after a push until the slot changes', () => {
    const { navigation } = setup();

    navigation.getState().evaluate(slotTarget(7));
    vi.advanceTimersByTime(400);
    expect(navigation.getState().path).toEqual(['media']);
    expect(navigation.getState().dwellSuppressed).toEqual({ back: true, folder: false });
    expect(navigation.getState().dwellArmedFor).toBeNull();

    navigation.getState().evaluate(slotTarget(7));
    vi.advanceTimersByTime(5000);
    expect(navigation.getState().path).toEqual(['media']);

    navigation.getState().evaluate(slotTarget(6));
    navigation.getState().evaluate(slotTarget(7));
    expect(navigation.getState().dwellArmedFor).toBe(7);
    vi.advanceTimersByTime(400);
    expect(navigation.getState().path).toEqual([]);
  });

  test('after a pop the folder under the cursor does not re-enter', () => {
    const { navigation, onNavigate } = setup();

    navigation.getState().evaluate(slotTarget(7));
    vi.advanceTimersByTime(400);
    navigation.getState().evaluate(slotTarget(6));
    navigation.getState().evaluate(slotTarget(7));
    vi.advanceTimersByTime(400);

    expect(navigation.getState().path).toEqual([]);
    expect(navigation.getState().dwellSuppressed).toEqual({ back: false, folder: true });
    vi.advanceTimersByTime(5000);
    expect(navigation.getState().path).toEqual([]);
    expect(onNavigate).toHaveBeenCalledTimes(2);
  });

  test('back from a nested folder keeps climbing while the cursor stays', () => {
    const { navigation } = setup();

    navigation.setState({ path: ['apps', 'editors'] });
    navigation.getState().evaluate(slotTarget(7));
    vi.advanceTimersByTime(400);
    expect(navigation.getState().path).toEqual(['apps']);

    // apps[7] is also a back slot, and only folders are suppressed after a pop.
    expect(navigation.getState().dwellArmedFor).toBe(7);
    vi.advanceTimersByTime(600);
    expect(navigation.getState().path).toEqual([]);
  });

  test('leaving the wheel clears suppression', () => {
    const { navigation } = setup();

    navigation.getState().evaluate(slotTarget(7));
    vi.advanceTimersByTime(400);
    navigation.getState().evaluate(NO_HIT);
    expect(navigation.getState().dwellSuppressed).toEqual({ back: false, folder: false });
    expect(navigation.getState().hoveredIndex).toBe(-1);

    navigation.getState().evaluate(slotTarget(7));
    vi.advanceTimersByTime(400);
    expect(navigation.getState().path).toEqual([]);
  });

  test('hovering settings cancels a pending dwell', () => {
    const { navigation } = setup();

    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(200);
    navigation.getState().evaluate(SETTINGS_TARGET);

    expect(navigation.getState().hoveringSettings).toBe(true);
    expect(navigation.getState().hoveredIndex).toBe(-1);
    expect(navigation.getState().dwellArmedFor).toBeNull();
    vi.advanceTimersByTime(1000);
    expect(navigation.getState().path).toEqual([]);
  });

  test('moving to another slot restarts the timer', () => {
    const { navigation } = setup();

    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(300);
    navigation.getState().evaluate(slotTarget(1));
    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(300);
    expect(navigation.getState().path).toEqual([]);

    vi.advanceTimersByTime(100);
    expect(navigation.getState().path).toEqual(['apps']);
  });

  test('repeated samples on the same slot keep the first deadline', () => {
    const { navigation } = setup();

    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(300);
    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(100);
    expect(navigation.getState().path).toEqual(['apps']);
  });

  test('a folder missing from the graph is recreated on entry', () => {
    const { graphStore, logStore, navigation } = setup();
    graphStore.getState().deleteRecursive('empty');
    expect(graphStore.getState().hasFolder('empty')).toBe(false);

    navigation.getState().evaluate(slotTarget(2));
    vi.advanceTimersByTime(400);

    expect(navigation.getState().path).toEqual(['empty']);
    expect(graphStore.getState().hasFolder('empty')).toBe(true);
    expect(logStore.getState().entries.at(-1)?.message).toBe('Folder "empty" was missing and has been recreated');
  });

  test('an unresolvable path falls back to root', () => {
    const { graphStore, logStore, navigation } = setup();
    navigation.setState({ path: ['ghost'] });

    expect(navigation.getState().currentFolder()).toBe(graphStore.getState().graph.root);
    expect(navigation.getState().path).toEqual([]);
    expect(logStore.getState().entries.at(-1)?.level).toBe('WARN');
  });

  test('slot-change mode keeps suppression through a revalidation', () => {
    const { navigation } = setup();

    navigation.getState().evaluate(slotTarget(7));
    vi.advanceTimersByTime(400);
    navigation.getState().revalidate();

    expect(navigation.getState().dwellArmedFor).toBeNull();
    expect(navigation.getState().dwellSuppressed).toEqual({ back: true, folder: false });
  });

  test('first-observation mode lifts suppression after one evaluation', () => {
    const { navigation } = setup({ suppressionClear: 'first-observation' });

    navigation.getState().evaluate(slotTarget(7));
    vi.advanceTimersByTime(400);
    expect(navigation.getState().path).toEqual(['media']);
    expect(navigation.getState().dwellArmedFor).toBeNull();
    expect(navigation.getState().dwellSuppressed).toEqual({ back: false, folder: false });

    navigation.getState().revalidate();
    expect(navigation.getState().dwellArmedFor).toBe(7);
    vi.advanceTimersByTime(400);
    expect(navigation.getState().path).toEqual([]);
  });

  test('reset returns to root and drops the pending dwell', () => {
    const { navigation, onNavigate } = setup();

    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(400);
    navigation.getState().reset();

    expect(navigation.getState().snapshot()).toEqual({ path: [], hoveredIndex: -1, hoveringSettings: false });
    vi.advanceTimersByTime(5000);
    expect(onNavigate).toHaveBeenCalledTimes(1);
  });

  test('the dwell interval follows the current settings', () => {
    const { navigation, settingsStore } = setup();
    settingsStore.getState().applySettings({ dwellMs: 800 });

    navigation.getState().evaluate(slotTarget(0));
    vi.advanceTimersByTime(799);
    expect(navigation.getState().path).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(navigation.getState().path).toEqual(['apps']);
  });
});
