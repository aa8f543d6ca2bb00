import { produce, type Draft } from 'immer';
import { createStore } from 'zustand/vanilla';
import { WheelError } from '../types/errors';
import {
  BACK_SLOT_INDEX,
  cloneSlot,
  createChildFolder,
  createDefaultGraph,
  isSlotIndex,
  type Folder,
  type FolderGraph,
  type NavigationPath,
  type Slot,
} from '../types/wheel';

export interface FolderGraphState {
  graph: FolderGraph;
  /** `null` is NotFound: callers fall back to root and reset their cursor. */
  resolve: (path: NavigationPath) => Folder | null;
  hasFolder: (id: string) => boolean;
  createFolder: (id: string) => Folder;
  setSlot: (path: NavigationPath, index: number, slot: Slot) => void;
  findOrphans: () => Set<string>;
  collectSubtree: (id: string) => string[];
  deleteRecursive: (id: string) => string[];
  /** Slot in the parent folder that links to the folder at `path`. */
  findParentSlot: (path: NavigationPath) => Slot | null;
  replaceGraph: (graph: FolderGraph) => void;
}

export interface FolderGraphStoreOptions {
  initialGraph?: FolderGraph;
  requestSave?: () => Promise<void>;
}

export type FolderGraphStore = ReturnType<typeof createFolderGraphStore>;

function referencedFolderIds(folder: Folder): string[] {
  return folder.slots.flatMap((slot) => (slot.actionType === 'folder' && slot.value ? [slot.value] : []));
}

function draftFolderAt(draft: Draft<FolderGraph>, path: NavigationPath): Draft<Folder> | undefined {
  if (path.length === 0) {
    return draft.root;
  }
  return draft.folders[path[path.length - 1]];
}

export function createFolderGraphStore(options: FolderGraphStoreOptions = {}) {
  const { requestSave } = options;

  const persist = () => {
    if (requestSave) {
      void requestSave();
    }
  };

  return createStore<FolderGraphState>((set, get) => ({
    graph: options.initialGraph ?? createDefaultGraph(),

    resolve(path) {
      const { graph } = get();
      if (path.length === 0) {
        return graph.root;
      }
      const id = path[path.length - 1];
      return Object.hasOwn(graph.folders, id) ? graph.folders[id] : null;
    },

    hasFolder(id) {
      return Object.hasOwn(get().graph.folders, id);
    },

    createFolder(id) {
      const existing = get().resolve([id]);
      if (existing) {
        return existing;
      }
      set((state) => ({
        graph: produce(state.graph, (draft) => {
          draft.folders[id] = createChildFolder();
        }),
      }));
      persist();
      return get().graph.folders[id];
    },

    setSlot(path, index, slot) {
      if (!isSlotIndex(index)) {
        throw new WheelError('INVALID_INDEX', `Slot index ${index} is out of range.`);
      }
      const target = get().resolve(path);
      if (!target) {
        throw new WheelError('FOLDER_NOT_FOUND', `Folder "${path.join('/')}" does not exist.`);
      }
      if (index === BACK_SLOT_INDEX && target.slots[index].actionType === 'back') {
        throw new WheelError('INVALID_INDEX', 'The back slot cannot be changed.');
      }
      if (slot.actionType === 'back') {
        throw new WheelError('INVALID_INDEX', 'Back slots are managed by their folder.');
      }
      if (slot.actionType === 'folder' && !slot.value) {
        throw new WheelError('INVALID_DRAFT', 'Folder slots need a folder id.');
      }

      const childId = slot.actionType === 'folder' ? slot.value : null;
      set((state) => ({
        graph: produce(state.graph, (draft) => {
          const folder = draftFolderAt(draft, path);
          if (!folder) {
            return;
          }
          folder.slots[index] = cloneSlot(slot);
          if (childId && !Object.hasOwn(draft.folders, childId)) {
            draft.folders[childId] = createChildFolder();
          }
        }),
      }));
      persist();
    },

    findOrphans() {
      const { graph } = get();
      const referenced = new Set<string>(referencedFolderIds(graph.root));
      for (const folder of Object.values(graph.folders)) {
        referencedFolderIds(folder).forEach((id) => referenced.add(id));
      }
      return new Set(Object.keys(graph.folders).filter((id) => !referenced.has(id)));
    },

    collectSubtree(id) {
      const { folders } = get().graph;
      const visited = new Set<string>();
      const pending = [id];
      while (pending.length) {
        const current = pending.pop();
        if (current === undefined || visited.has(current) || !Object.hasOwn(folders, current)) {
          continue;
        }
        visited.add(current);
        pending.push(...referencedFolderIds(folders[current]));
      }
      return [...visited];
    },

    deleteRecursive(id) {
      const doomed = get().collectSubtree(id);
      if (!doomed.length) {
        return [];
      }
      set((state) => ({
        graph: produce(state.graph, (draft) => {
          doomed.forEach((folderId) => {
            delete draft.folders[folderId];
          });
        }),
      }));
      persist();
      return doomed;
    },

    findParentSlot(path) {
      if (path.length === 0) {
        return null;
      }
      const id = path[path.length - 1];
      const parent = get().resolve(path.slice(0, -1));
      return parent?.slots.find((slot) => slot.actionType === 'folder' && slot.value === id) ?? null;
    },

    replaceGraph(graph) {
      set({ graph });
    },
  }));
}
