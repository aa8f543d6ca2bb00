import { createStore } from 'zustand/vanilla';
import type { FolderGraphStore } from './folderGraphStore';
import type { SettingsStore } from './settingsStore';
import type { WheelLogger } from './logStore';
import type { Folder, NavigationPath } from '../types/wheel';
import { NO_HIT, isSameTarget, type HitTarget } from '../utils/radial-math';

export interface DwellSuppression {
  back: boolean;
  folder: boolean;
}

export interface NavigationSnapshot {
  path: string[];
  hoveredIndex: number;
  hoveringSettings: boolean;
}

type HoverCause = 'change' | 'transition' | 'revalidate';

export interface NavigationState {
  /** Folder ids from root to the displayed folder; empty is root. */
  path: string[];
  hoveredIndex: number;
  hoveringSettings: boolean;
  dwellSuppressed: DwellSuppression;
  dwellArmedFor: number | null;
  /** Set by a dwell navigation until the next hover evaluation. */
  justTransitioned: boolean;
  lastTarget: HitTarget;
  reset: () => void;
  evaluate: (target: HitTarget) => void;
  revalidate: () => void;
  cancelDwell: () => void;
  fireDwell: () => void;
  currentFolder: () => Folder;
  snapshot: () => NavigationSnapshot;
}

export interface NavigationStoreOptions {
  graphStore: FolderGraphStore;
  settingsStore: SettingsStore;
  logger: WheelLogger;
  /** Called after every dwell navigation so the view can be refreshed. */
  onNavigate?: (path: NavigationPath) => void;
}

export type NavigationStore = ReturnType<typeof createNavigationStore>;

const NO_SUPPRESSION: DwellSuppression = { back: false, folder: false };

type HoverFields = Pick<
  NavigationState,
  'path' | 'hoveredIndex' | 'hoveringSettings' | 'dwellSuppressed' | 'dwellArmedFor' | 'justTransitioned' | 'lastTarget'
>;

function initialHoverState(): HoverFields {
  return {
    path: [],
    hoveredIndex: -1,
    hoveringSettings: false,
    dwellSuppressed: NO_SUPPRESSION,
    dwellArmedFor: null,
    justTransitioned: false,
    lastTarget: NO_HIT,
  };
}

export function createNavigationStore({ graphStore, settingsStore, logger, onNavigate }: NavigationStoreOptions) {
  let dwellTimer: ReturnType<typeof setTimeout> | null = null;

  const clearDwellTimer = () => {
    if (dwellTimer) {
      clearTimeout(dwellTimer);
      dwellTimer = null;
    }
  };

  return createStore<NavigationState>((set, get) => {
    const resolveCurrent = (): Folder => {
      const { path } = get();
      const folder = graphStore.getState().resolve(path);
      if (folder) {
        return folder;
      }
      logger.warn(`Folder "${path.join('/')}" no longer exists, returning to root`);
      set({ path: [] });
      return graphStore.getState().graph.root;
    };

    const armDwell = (index: number, delayMs: number) => {
      clearDwellTimer();
      dwellTimer = setTimeout(() => {
        dwellTimer = null;
        get().fireDwell();
      }, delayMs);
      set({ dwellArmedFor: index });
    };

    const hoverSlot = (index: number, cause: HoverCause) => {
      clearDwellTimer();
      const { settings } = settingsStore.getState();
      const suppressed = cause === 'change' ? NO_SUPPRESSION : get().dwellSuppressed;
      const slot = resolveCurrent().slots[index];

      set({
        hoveredIndex: index,
        hoveringSettings: false,
        dwellArmedFor: null,
        justTransitioned: false,
      });

      const navigable =
        (slot.actionType === 'folder' && slot.value !== null && !suppressed.folder) ||
        (slot.actionType === 'back' && !suppressed.back);
      if (navigable) {
        const extra = cause === 'transition' ? settings.autoContinueExtraMs : 0;
        armDwell(index, settings.dwellMs + extra);
      }

      set({
        dwellSuppressed: settings.suppressionClear === 'first-observation' ? NO_SUPPRESSION : suppressed,
      });
    };

    const completeTransition = (path: string[], suppressed: DwellSuppression) => {
      set({ path, dwellSuppressed: suppressed, justTransitioned: true });
      onNavigate?.(path);
      // Re-evaluate whatever now sits under the unmoved cursor.
      get().evaluate(get().lastTarget);
    };

    return {
      ...initialHoverState(),

      reset() {
        clearDwellTimer();
        set(initialHoverState());
      },

      evaluate(target) {
        const state = get();
        if (!isSameTarget(state.lastTarget, target)) {
          set({ lastTarget: target });
        }

        if (target.kind === 'settings') {
          if (!state.hoveringSettings || state.justTransitioned) {
            clearDwellTimer();
            set({
              hoveringSettings: true,
              hoveredIndex: -1,
              dwellArmedFor: null,
              dwellSuppressed: NO_SUPPRESSION,
              justTransitioned: false,
            });
          }
          return;
        }

        if (target.kind === 'none') {
          const idle =
            state.hoveredIndex === -1 &&
            !state.hoveringSettings &&
            !state.justTransitioned &&
            !state.dwellSuppressed.back &&
            !state.dwellSuppressed.folder;
          if (!idle) {
            clearDwellTimer();
            set({
              hoveredIndex: -1,
              hoveringSettings: false,
              dwellArmedFor: null,
              dwellSuppressed: NO_SUPPRESSION,
              justTransitioned: false,
            });
          }
          return;
        }

        if (state.justTransitioned) {
          hoverSlot(target.index, 'transition');
          return;
        }
        if (!state.hoveringSettings && state.hoveredIndex === target.index) {
          return;
        }
        hoverSlot(target.index, 'change');
      },

      revalidate() {
        const state = get();
        if (state.hoveringSettings || state.hoveredIndex < 0) {
          return;
        }
        hoverSlot(state.hoveredIndex, state.justTransitioned ? 'transition' : 'revalidate');
      },

      cancelDwell() {
        clearDwellTimer();
        set({ dwellArmedFor: null });
      },

      fireDwell() {
        const state = get();
        const index = state.dwellArmedFor;
        clearDwellTimer();
        set({ dwellArmedFor: null });
        if (index === null || index !== state.hoveredIndex || state.hoveringSettings) {
          return;
        }

        const slot = resolveCurrent().slots[index];
        const { path } = get();

        if (slot.actionType === 'folder' && slot.value) {
          const graph = graphStore.getState();
          if (!graph.hasFolder(slot.value)) {
            logger.warn(`Folder "${slot.value}" was missing and has been recreated`);
            graph.createFolder(slot.value);
          }
          completeTransition([...path, slot.value], { back: true, folder: false });
          return;
        }

        if (slot.actionType === 'back') {
          completeTransition(path.slice(0, -1), { back: false, folder: true });
        }
      },

      currentFolder() {
        return resolveCurrent();
      },

      snapshot() {
        const { path, hoveredIndex, hoveringSettings } = get();
        return { path: [...path], hoveredIndex, hoveringSettings };
      },
    };
  });
}
