import { createStore } from 'zustand/vanilla';
import type { NarrationSnapshot } from '@/services/narration/types';

interface NarrationStoreState {
  snapshot: NarrationSnapshot;
  setSnapshot: (updates: Partial<NarrationSnapshot>) => void;
  reset: (speed: number) => void;
}

export const initialSnapshot = (speed = 1): NarrationSnapshot => ({
  state: 'idle',
  position: 0,
  sectionIndex: 0,
  speed,
  isCompleted: false,
  queueDepth: 0,
  recycleDepth: 0,
  totalElapsed: 0,
  lastError: null,
});

// one store per playback session; presentation layers subscribe to it
export const createNarrationStore = (speed = 1) =>
  createStore<NarrationStoreState>((set) => ({
    snapshot: initialSnapshot(speed),
    setSnapshot: (updates) => set((state) => ({ snapshot: { ...state.snapshot, ...updates } })),
    reset: (speed) => set({ snapshot: initialSnapshot(speed) }),
  }));

export type NarrationStore = ReturnType<typeof createNarrationStore>;
