import { customAlphabet } from 'nanoid/non-secure';
import { createActionMetricsStore, type ActionMetricsStore } from '../state/actionMetricsStore';
import { createFolderGraphStore, type FolderGraphStore } from '../state/folderGraphStore';
import { createLogStore, createWheelLogger, type LogStore, type WheelLogger } from '../state/logStore';
import { createNavigationStore, type NavigationSnapshot, type NavigationStore } from '../state/navigationStore';
import { createSettingsStore, type SettingsStore } from '../state/settingsStore';
import { createDocumentSaver } from '../persistence/documentSaver';
import { DOCUMENT_VERSION, type WheelDocument, type WheelPersistence } from '../persistence/types';
import type { HotkeySource, UnlistenFn } from '../hotkeys/chordTracker';
import { WheelError, isWheelError, toErrorMessage } from '../types/errors';
import { createSlotDraft, finalizeSlotDraft, type SlotDraft } from '../types/slotDraft';
import type { WheelSettings } from '../types/settings';
import {
  createDefaultGraph,
  isExecutableActionType,
  isSlotIndex,
  normalizeGraph,
  type Folder,
  type NavigationPath,
  type Slot,
} from '../types/wheel';
import { hitTest, type CursorOffset, type Point } from '../utils/radial-math';
import type {
  ActionExecutor,
  CommitOutcome,
  CommittedAction,
  CursorSource,
  LoadOutcome,
  SettingsHost,
  SlotEditOptions,
  SlotEditRequest,
  SlotEditResult,
  SlotEditorHost,
  WheelNotifier,
  WheelRenderer,
  WheelView,
} from './types';

const folderSuffix = customAlphabet('0123456789abcdef', 8);

export function createFolderId(): string {
  return `folder_${folderSuffix()}`;
}

export interface WheelControllerOptions {
  persistence: WheelPersistence;
  executor: ActionExecutor;
  renderer?: WheelRenderer;
  slotEditor?: SlotEditorHost;
  settingsHost?: SettingsHost;
  notifier?: WheelNotifier;
  /** Without a cursor source the host drives `onTick` itself. */
  cursor?: CursorSource;
  logPrefix?: string;
}

export interface WheelStores {
  graph: FolderGraphStore;
  settings: SettingsStore;
  navigation: NavigationStore;
  log: LogStore;
  metrics: ActionMetricsStore;
}

export interface WheelController {
  stores: WheelStores;
  logger: WheelLogger;
  load: () => Promise<LoadOutcome>;
  activateAtRoot: () => void;
  deactivateAndCommit: () => CommitOutcome;
  onTick: (offset: CursorOffset) => void;
  onPrimaryClick: () => CommitOutcome;
  onSecondaryClick: () => SlotEditRequest | null;
  applySettings: (input: Partial<WheelSettings>) => WheelSettings;
  editSlot: (path: NavigationPath, index: number) => SlotEditRequest;
  commitSlotEdit: (
    path: NavigationPath,
    index: number,
    draft: SlotDraft,
    options?: SlotEditOptions,
  ) => SlotEditResult;
  connectHotkeys: (source: HotkeySource) => UnlistenFn;
  isVisible: () => boolean;
  lastPersistError: () => string | null;
  /** Resolves when queued saves have settled. */
  flush: () => Promise<void>;
  dispose: () => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createWheelController(options: WheelControllerOptions): WheelController {
  const { persistence, executor, renderer, slotEditor, settingsHost, notifier, cursor } = options;

  const log = createLogStore();
  const logger = createWheelLogger(log, options.logPrefix);
  const metrics = createActionMetricsStore();

  let visible = false;
  let anchor: Point | null = null;
  let pollTimer: ReturnType<typeof setInterval> | null = null;
  let pollIntervalMs = 0;
  let warnedAboutLoad = false;
  const pendingKeystrokes = new Set<ReturnType<typeof setTimeout>>();
  const hotkeySubscriptions = new Set<UnlistenFn>();
  const hotkeySources = new Set<HotkeySource>();

  const getDocument = (): WheelDocument => {
    const { graph } = graphStore.getState();
    return {
      version: DOCUMENT_VERSION,
      settings: settingsStore.getState().settings,
      root: graph.root,
      folders: graph.folders,
    };
  };

  const saver = createDocumentSaver({ persistence, getDocument, logger });
  const graphStore = createFolderGraphStore({ requestSave: saver.requestSave });
  const settingsStore = createSettingsStore({ requestSave: saver.requestSave });
  const unsubscribeSettings = settingsStore.subscribe((state, previous) => {
    if (state.settings.activationKeys !== previous.settings.activationKeys) {
      hotkeySources.forEach((source) => source.setKeys?.(state.settings.activationKeys));
    }
  });
  const navigation = createNavigationStore({
    graphStore,
    settingsStore,
    logger,
    onNavigate: (path) => {
      logger.info(`Navigated to ${path.length ? path.join(' / ') : 'root'}`);
      render();
    },
  });

  function buildView(): WheelView {
    const nav = navigation.getState();
    const folder = nav.currentFolder();
    const { settings, geometry } = settingsStore.getState();
    const path = [...navigation.getState().path];
    return {
      path,
      slots: folder.slots,
      hoveredIndex: nav.hoveredIndex,
      hoveringSettings: nav.hoveringSettings,
      parentSlot: graphStore.getState().findParentSlot(path),
      geometry,
      settings,
    };
  }

  function render() {
    if (visible && renderer) {
      renderer.render(buildView());
    }
  }

  function stopPolling() {
    if (pollTimer) {
      clearInterval(pollTimer);
      pollTimer = null;
    }
  }

  function startPolling() {
    stopPolling();
    if (!cursor) {
      return;
    }
    pollIntervalMs = settingsStore.getState().settings.pollIntervalMs;
    pollTimer = setInterval(() => {
      const origin = anchor;
      if (!origin) {
        return;
      }
      const position = cursor.position();
      onTick({ dx: position.x - origin.x, dy: position.y - origin.y });
    }, pollIntervalMs);
  }

  function close() {
    stopPolling();
    navigation.getState().cancelDwell();
    anchor = null;
    if (visible) {
      visible = false;
      renderer?.hide();
    }
  }

  function resolveOrThrow(path: NavigationPath): Folder {
    const folder = graphStore.getState().resolve(path);
    if (!folder) {
      throw new WheelError('FOLDER_NOT_FOUND', `Folder "${path.join('/')}" does not exist.`);
    }
    return folder;
  }

  function runAction(action: CommittedAction) {
    const startedAt = Date.now();
    const record = (status: 'success' | 'failure', message: string | null) => {
      metrics.getState().record({
        actionType: action.type,
        value: action.value,
        status,
        message,
        durationMs: Date.now() - startedAt,
      });
    };
    const fail = (error: unknown) => {
      logger.error(`Action ${action.type} failed`, error);
      record('failure', toErrorMessage(error));
    };

    try {
      void Promise.resolve(executor.execute(action))
        .then(() => record('success', null))
        .catch(fail);
    } catch (error) {
      fail(error);
    }
  }

  function dispatch(action: CommittedAction) {
    logger.action(`Dispatching ${action.type}`, action.value);
    const delay = settingsStore.getState().settings.keystrokeDelayMs;
    if (action.type !== 'keystroke' || delay <= 0) {
      runAction(action);
      return;
    }
    // Lets the activation keys come up before the keystroke is injected.
    const timer = setTimeout(() => {
      pendingKeystrokes.delete(timer);
      runAction(action);
    }, delay);
    pendingKeystrokes.add(timer);
  }

  function buildEditRequest(path: NavigationPath, index: number, slot: Slot): SlotEditRequest {
    const graph = graphStore.getState();
    return {
      path: [...path],
      index,
      draft: createSlotDraft(slot),
      orphans: [...graph.findOrphans()].sort(),
      replacedSubtree: slot.actionType === 'folder' && slot.value ? graph.collectSubtree(slot.value) : [],
    };
  }

  function commit(snapshot: NavigationSnapshot): CommitOutcome {
    if (snapshot.hoveringSettings) {
      logger.info('Opening settings');
      settingsHost?.openSettings();
      return { kind: 'settings' };
    }
    if (snapshot.hoveredIndex < 0) {
      return { kind: 'none' };
    }

    const folder = graphStore.getState().resolve(snapshot.path);
    if (!folder) {
      logger.warn(`Folder "${snapshot.path.join('/')}" no longer exists, nothing committed`);
      navigation.getState().reset();
      return { kind: 'none' };
    }
    const index = snapshot.hoveredIndex;
    const slot = folder.slots[index];

    if (slot.actionType === 'folder' || slot.actionType === 'back') {
      return { kind: 'navigation', index };
    }
    if (slot.actionType === 'none') {
      const request = buildEditRequest(snapshot.path, index, slot);
      slotEditor?.openSlotEditor(request);
      return { kind: 'editor', request };
    }
    if (!isExecutableActionType(slot.actionType)) {
      return { kind: 'none' };
    }
    if (!slot.value) {
      logger.warn(`Slot ${index} has no value to run`);
      metrics.getState().record({ actionType: slot.actionType, value: '', status: 'skipped', message: 'No value' });
      return { kind: 'none' };
    }

    const action: CommittedAction = { type: slot.actionType, value: slot.value };
    dispatch(action);
    return { kind: 'dispatched', index, action };
  }

  function onTick(offset: CursorOffset) {
    if (!visible) {
      return;
    }
    const target = hitTest(offset, settingsStore.getState().geometry);
    navigation.getState().evaluate(target);
    render();
  }

  function activateAtRoot() {
    close();
    navigation.getState().reset();
    visible = true;
    anchor = cursor ? cursor.position() : null;
    startPolling();
    render();
  }

  function deactivateAndCommit(): CommitOutcome {
    if (!visible) {
      return { kind: 'none' };
    }
    // Taken before anything else so a pending dwell cannot change the target.
    const snapshot = navigation.getState().snapshot();
    close();
    return commit(snapshot);
  }

  function onPrimaryClick(): CommitOutcome {
    if (!visible) {
      return { kind: 'none' };
    }
    const snapshot = navigation.getState().snapshot();
    if (snapshot.hoveredIndex < 0 && !snapshot.hoveringSettings) {
      return { kind: 'none' };
    }
    close();
    return commit(snapshot);
  }

  function editSlot(path: NavigationPath, index: number): SlotEditRequest {
    if (!isSlotIndex(index)) {
      throw new WheelError('INVALID_INDEX', `Slot index ${index} is out of range.`);
    }
    const slot = resolveOrThrow(path).slots[index];
    if (slot.actionType === 'back') {
      throw new WheelError('INVALID_INDEX', 'The back slot cannot be edited.');
    }
    return buildEditRequest(path, index, slot);
  }

  function onSecondaryClick(): SlotEditRequest | null {
    if (!visible) {
      return null;
    }
    const { path, hoveredIndex } = navigation.getState().snapshot();
    if (hoveredIndex < 0) {
      return null;
    }
    let request: SlotEditRequest;
    try {
      request = editSlot(path, hoveredIndex);
    } catch (error) {
      if (isWheelError(error, 'INVALID_INDEX')) {
        logger.info(error.message);
        return null;
      }
      throw error;
    }
    // The editor replaces the overlay; the later key release commits nothing.
    close();
    slotEditor?.openSlotEditor(request);
    return request;
  }

  function commitSlotEdit(
    path: NavigationPath,
    index: number,
    draft: SlotDraft,
    editOptions: SlotEditOptions = {},
  ): SlotEditResult {
    if (!isSlotIndex(index)) {
      throw new WheelError('INVALID_INDEX', `Slot index ${index} is out of range.`);
    }
    const previous = resolveOrThrow(path).slots[index];
    if (previous.actionType === 'back') {
      throw new WheelError('INVALID_INDEX', 'The back slot cannot be edited.');
    }

    const graph = graphStore.getState();
    let slot = finalizeSlotDraft(draft);
    if (slot.actionType === 'folder') {
      const currentId = previous.actionType === 'folder' ? previous.value : null;
      const restoreId = draft.restoreFolderId?.trim() || null;
      if (restoreId && restoreId !== currentId && !graph.findOrphans().has(restoreId)) {
        throw new WheelError('INVALID_DRAFT', `Folder "${restoreId}" is not an orphaned folder.`);
      }
      // A restored orphan wins; otherwise an existing folder keeps its id.
      let folderId = restoreId ?? currentId;
      if (!folderId) {
        do {
          folderId = createFolderId();
        } while (graph.hasFolder(folderId));
      }
      slot = { ...slot, value: folderId };
    }

    graph.setSlot(path, index, slot);

    const replacedId =
      previous.actionType === 'folder' && previous.value && previous.value !== slot.value ? previous.value : null;
    let orphaned: string[] = [];
    let purged: string[] = [];
    if (replacedId) {
      if (editOptions.purgeReplacedFolder) {
        purged = graphStore.getState().deleteRecursive(replacedId);
        logger.info(`Deleted folder ${replacedId} and ${Math.max(0, purged.length - 1)} nested folder(s)`);
      } else if (graphStore.getState().findOrphans().has(replacedId)) {
        orphaned = [replacedId];
        logger.info(`Folder ${replacedId} is now orphaned`);
      }
    }

    if (visible) {
      navigation.getState().revalidate();
      render();
    }

    const stored = resolveOrThrow(path).slots[index];
    return { slot: stored, orphaned, purged };
  }

  function applySettings(input: Partial<WheelSettings>): WheelSettings {
    const settings = settingsStore.getState().applySettings(input);
    if (pollTimer && settings.pollIntervalMs !== pollIntervalMs) {
      startPolling();
    }
    render();
    return settings;
  }

  function recover(reason: string): LoadOutcome {
    graphStore.getState().replaceGraph(createDefaultGraph());
    settingsStore.getState().hydrate({});
    const message = `Could not load the wheel configuration (${reason}); using an empty wheel.`;
    logger.warn(message);
    if (!warnedAboutLoad) {
      warnedAboutLoad = true;
      notifier?.warn(message);
    }
    return 'recovered';
  }

  async function load(): Promise<LoadOutcome> {
    let raw: unknown;
    try {
      raw = await persistence.load();
    } catch (error) {
      return recover(toErrorMessage(error));
    }

    if (raw === null || raw === undefined) {
      graphStore.getState().replaceGraph(createDefaultGraph());
      settingsStore.getState().hydrate({});
      await saver.requestSave();
      return 'created';
    }

    const graph = normalizeGraph(raw);
    if (!graph) {
      return recover('unexpected document shape');
    }
    graphStore.getState().replaceGraph(graph);
    settingsStore.getState().hydrate(isRecord(raw) ? raw.settings : undefined);
    logger.info(`Loaded ${Object.keys(graph.folders).length} folder(s)`);
    return 'loaded';
  }

  function connectHotkeys(source: HotkeySource): UnlistenFn {
    source.setKeys?.(settingsStore.getState().settings.activationKeys);
    hotkeySources.add(source);
    const unlisten = source.subscribe((signal) => {
      if (signal === 'activated') {
        activateAtRoot();
        return;
      }
      deactivateAndCommit();
    });
    hotkeySubscriptions.add(unlisten);
    return () => {
      hotkeySources.delete(source);
      hotkeySubscriptions.delete(unlisten);
      unlisten();
    };
  }

  function dispose() {
    close();
    pendingKeystrokes.forEach((timer) => clearTimeout(timer));
    pendingKeystrokes.clear();
    hotkeySubscriptions.forEach((unlisten) => unlisten());
    hotkeySubscriptions.clear();
    hotkeySources.clear();
    unsubscribeSettings();
  }

  return {
    stores: { graph: graphStore, settings: settingsStore, navigation, log, metrics },
    logger,
    load,
    activateAtRoot,
    deactivateAndCommit,
    onTick,
    onPrimaryClick,
    onSecondaryClick,
    applySettings,
    editSlot,
    commitSlotEdit,
    connectHotkeys,
    isVisible: () => visible,
    lastPersistError: saver.lastError,
    flush: saver.flush,
    dispose,
  };
}
