// apps/client/src/app/store/syncStore.ts

import { createStore, type StoreApi } from "zustand/vanilla";

export const SYNC_STATUS_VALUES = ["idle", "syncing"] as const;
export type SyncStatus = (typeof SYNC_STATUS_VALUES)[number];

export type SyncOutcomeSummary = {
  name: string;
  ok: boolean;
  error?: string;
};

export type SyncState = {
  status: SyncStatus;
  lastStartedAt: number | null;
  lastFinishedAt: number | null;
  skippedCount: number;
  lastOutcomes: SyncOutcomeSummary[];

  // idle -> syncing; false when a sync is already running (request dropped).
  beginSync: (now: number) => boolean;
  endSync: (now: number, outcomes: SyncOutcomeSummary[]) => void;
  reset: () => void;
};

export type SyncStore = StoreApi<SyncState>;

type SyncData = Omit<SyncState, "beginSync" | "endSync" | "reset">;

const initial: SyncData = {
  status: "idle",
  lastStartedAt: null,
  lastFinishedAt: null,
  skippedCount: 0,
  lastOutcomes: [],
};

export function createSyncStore(): SyncStore {
  return createStore<SyncState>((set, get) => ({
    ...initial,

    beginSync: (now) => {
      // check-and-set in one synchronous step
      if (get().status === "syncing") {
        set((s) => ({ skippedCount: s.skippedCount + 1 }));
        return false;
      }
      set({ status: "syncing", lastStartedAt: now });
      return true;
    },

    endSync: (now, outcomes) =>
      set({ status: "idle", lastFinishedAt: now, lastOutcomes: outcomes }),

    reset: () => set({ ...initial }),
  }));
}
