/**
 * History Store
 *
 * Bounded undo/redo stacks of session checkpoints. The store only keeps the
 * entries; capturing and re-applying scene state is the host's job.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { HistorySnapshot } from './types';

export interface HistoryState {
  /** Checkpoints that can be rolled back to, oldest first */
  undoStack: HistorySnapshot[];
  /** Checkpoints rolled back past, most recent last */
  redoStack: HistorySnapshot[];
  /** Oldest checkpoints are dropped beyond this many */
  maxSize: number;
}

export interface HistoryActions {
  /** Record a checkpoint; anything undone is no longer redoable */
  push: (data: unknown, label: string) => void;
  /** Take the latest checkpoint off the undo stack */
  undo: () => HistorySnapshot | null;
  /** Take the latest undone checkpoint back */
  redo: () => HistorySnapshot | null;
  canUndo: () => boolean;
  canRedo: () => boolean;
  clear: () => void;
}

export type HistoryStore = HistoryState & HistoryActions;

const DEFAULT_MAX_SIZE = 50;

/**
 * Create an independent history store (one per scene)
 */
export const createHistoryStore = (initial: Partial<HistoryState> = {}) =>
  createStore<HistoryStore>()(
    immer((set, get) => ({
      undoStack: [],
      redoStack: [],
      maxSize: DEFAULT_MAX_SIZE,
      ...initial,

      push: (data, label) => {
        set((state) => {
          state.undoStack.push({ timestamp: Date.now(), label, data });
          if (state.undoStack.length > state.maxSize) {
            state.undoStack.splice(0, state.undoStack.length - state.maxSize);
          }
          state.redoStack = [];
        });
      },

      // Entries are read before `set` so callers never hold a revoked draft
      undo: () => {
        const { undoStack } = get();
        const entry = undoStack.at(-1);
        if (!entry) return null;

        set((state) => {
          state.undoStack.pop();
          state.redoStack.push(entry);
        });
        return entry;
      },

      redo: () => {
        const { redoStack } = get();
        const entry = redoStack.at(-1);
        if (!entry) return null;

        set((state) => {
          state.redoStack.pop();
          state.undoStack.push(entry);
        });
        return entry;
      },

      canUndo: () => get().undoStack.length > 0,

      canRedo: () => get().redoStack.length > 0,

      clear: () => {
        set((state) => {
          state.undoStack = [];
          state.redoStack = [];
        });
      },
    }))
  );

export type HistoryStoreApi = ReturnType<typeof createHistoryStore>;

// Selectors
export const selectCheckpointLabels = (state: HistoryStore) =>
  state.undoStack.map((entry) => entry.label);
