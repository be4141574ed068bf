/**
 * Classification Settings Store
 *
 * Holds the classification config the monitor reads on every frame.
 * Uses a Zustand vanilla store; persistence is opt-in through any
 * StateStorage (localStorage, a file-backed adapter, an in-memory map).
 */

import { z } from 'zod';
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { persist, createJSONStorage } from 'zustand/middleware';
import type { StateStorage } from 'zustand/middleware';
import { DEFAULT_CLASSIFICATION_CONFIG } from '../types/posture';
import type { ClassificationConfig } from '../types/posture';

export const SETTINGS_STORAGE_KEY = 'posture-classification-settings';

export interface SettingsStore extends ClassificationConfig {
  // Actions
  setTargetLegAngle: (degrees: number) => void;
  setToleranceFactor: (factor: number) => void;
  setRequireTrackedJoints: (required: boolean) => void;
  resetSettings: () => void;
}

export type SettingsStoreApi = StoreApi<SettingsStore>;

// Out-of-range targets are stored as given; the leg classifier reports them as INVALID
const classificationConfigSchema = z.object({
  targetLegAngleDegrees: z.number().finite().default(DEFAULT_CLASSIFICATION_CONFIG.targetLegAngleDegrees),
  toleranceFactor: z.number().finite().default(DEFAULT_CLASSIFICATION_CONFIG.toleranceFactor),
  requireTrackedJoints: z.boolean().default(DEFAULT_CLASSIFICATION_CONFIG.requireTrackedJoints),
});

const persistedSettingsSchema = z.object({
  state: classificationConfigSchema,
  version: z.number().optional(),
});

function createSettingsActions(set: SettingsStoreApi['setState']): SettingsStore {
  return {
    ...DEFAULT_CLASSIFICATION_CONFIG,

    setTargetLegAngle: (degrees) => set({ targetLegAngleDegrees: degrees }),

    setToleranceFactor: (factor) => set({ toleranceFactor: factor }),

    setRequireTrackedJoints: (required) => set({ requireTrackedJoints: required }),

    resetSettings: () => set(DEFAULT_CLASSIFICATION_CONFIG),
  };
}

export function selectClassificationConfig(state: ClassificationConfig): ClassificationConfig {
  return {
    targetLegAngleDegrees: state.targetLegAngleDegrees,
    toleranceFactor: state.toleranceFactor,
    requireTrackedJoints: state.requireTrackedJoints,
  };
}

/**
 * Create a settings store, persisted when a storage is given
 */
export function createSettingsStore(storage?: StateStorage): SettingsStoreApi {
  if (!storage) {
    return createStore<SettingsStore>()((set) => createSettingsActions(set));
  }

  return createStore<SettingsStore>()(
    persist((set) => createSettingsActions(set), {
      name: SETTINGS_STORAGE_KEY,
      storage: createJSONStorage(() => storage),
      partialize: (state) => selectClassificationConfig(state),
      merge: (persistedState, currentState) => {
        const parsed = classificationConfigSchema.safeParse(persistedState);
        if (!parsed.success) {
          console.warn('[SettingsStore] Ignoring malformed settings:', parsed.error.issues[0]?.message);
          return currentState;
        }
        return { ...currentState, ...parsed.data };
      },
    })
  );
}

/**
 * Load settings written by a persisted store or saveClassificationSettings
 */
export async function loadClassificationSettings(
  storage: StateStorage
): Promise<ClassificationConfig | null> {
  try {
    const stored = await storage.getItem(SETTINGS_STORAGE_KEY);
    if (!stored) {
      return null;
    }
    const parsed = persistedSettingsSchema.safeParse(JSON.parse(stored));
    if (!parsed.success) {
      console.warn('[SettingsStore] Ignoring malformed settings:', parsed.error.issues[0]?.message);
      return null;
    }
    return parsed.data.state;
  } catch (error) {
    console.error('[SettingsStore] Error loading settings:', error);
    return null;
  }
}

export async function saveClassificationSettings(
  storage: StateStorage,
  settings: ClassificationConfig
): Promise<void> {
  try {
    await storage.setItem(
      SETTINGS_STORAGE_KEY,
      JSON.stringify({ state: selectClassificationConfig(settings), version: 0 })
    );
  } catch (error) {
    console.error('[SettingsStore] Error saving settings:', error);
  }
}

export async function clearClassificationSettings(storage: StateStorage): Promise<void> {
  try {
    await storage.removeItem(SETTINGS_STORAGE_KEY);
  } catch (error) {
    console.error('[SettingsStore] Error clearing settings:', error);
  }
}
