import { createStore } from 'zustand/vanilla';
import { DEFAULT_SETTINGS, normalizeSettings, type WheelSettings } from '../types/settings';
import { createWheelGeometry, type WheelGeometry } from '../utils/radial-math';

export interface SettingsState {
  settings: WheelSettings;
  geometry: WheelGeometry;
  /** Merges, clamps and persists; returns the settings now in effect. */
  applySettings: (input: Partial<WheelSettings>) => WheelSettings;
  /** Replaces settings from a loaded document without a save. */
  hydrate: (raw: unknown) => void;
  resetSettings: () => WheelSettings;
}

export interface SettingsStoreOptions {
  initialSettings?: WheelSettings;
  requestSave?: () => Promise<void>;
}

export type SettingsStore = ReturnType<typeof createSettingsStore>;

function geometryFor(settings: WheelSettings): WheelGeometry {
  return createWheelGeometry(settings.wheelRadius, settings.innerRadius);
}

export function createSettingsStore(options: SettingsStoreOptions = {}) {
  const { requestSave } = options;
  const initial = normalizeSettings(options.initialSettings ?? DEFAULT_SETTINGS);

  const persist = () => {
    if (requestSave) {
      void requestSave();
    }
  };

  return createStore<SettingsState>((set, get) => ({
    settings: initial,
    geometry: geometryFor(initial),
    applySettings(input) {
      const settings = normalizeSettings(input, get().settings);
      set({ settings, geometry: geometryFor(settings) });
      persist();
      return settings;
    },
    hydrate(raw) {
      const settings = normalizeSettings(raw);
      set({ settings, geometry: geometryFor(settings) });
    },
    resetSettings() {
      const settings = normalizeSettings(DEFAULT_SETTINGS);
      set({ settings, geometry: geometryFor(settings) });
      persist();
      return settings;
    },
  }));
}
