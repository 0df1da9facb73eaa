import { createStore } from 'zustand/vanilla';

export interface IdentityWarning {
  userId: string;
  previousKey?: string;
  currentKey: string;
  detectedAt: number;
}

export interface E2EEState {
  isInitialized: boolean;
  isLoading: boolean;
  error: string | null;
  deviceId: string | null;
  fingerprint: string | null;
  prekeyCount: number | null;
  identityWarnings: IdentityWarning[];

  // Actions
  setLoading: (isLoading: boolean) => void;
  setReady: (deviceId: string, fingerprint: string) => void;
  setError: (error: string | null) => void;
  setPrekeyCount: (count: number) => void;
  addIdentityWarning: (warning: IdentityWarning) => void;
  dismissIdentityWarning: (userId: string) => void;
  reset: () => void;
}

const initialState = {
  isInitialized: false,
  isLoading: false,
  error: null,
  deviceId: null,
  fingerprint: null,
  prekeyCount: null,
  identityWarnings: [],
};

export const createE2EEStore = () =>
  createStore<E2EEState>()((set) => ({
    ...initialState,

    setLoading: (isLoading) => set({ isLoading }),

    setReady: (deviceId, fingerprint) =>
      set({ isInitialized: true, isLoading: false, error: null, deviceId, fingerprint }),

    setError: (error) => set({ error, isLoading: false }),

    setPrekeyCount: (prekeyCount) => set({ prekeyCount }),

    addIdentityWarning: (warning) =>
      set((state) => ({
        identityWarnings: [
          ...state.identityWarnings.filter((w) => w.userId !== warning.userId),
          warning,
        ],
      })),

    dismissIdentityWarning: (userId) =>
      set((state) => ({
        identityWarnings: state.identityWarnings.filter((w) => w.userId !== userId),
      })),

    reset: () => set({ ...initialState, identityWarnings: [] }),
  }));

export type E2EEStore = ReturnType<typeof createE2EEStore>;
