import { createStore } from "zustand/vanilla";
import type { FileChooserCallback } from "@/lib/definitions";

interface UploadSlotState {
  pending: FileChooserCallback | null;
  hold: (callback: FileChooserCallback) => void;
  // Empties the slot and hands the callback to the caller
  take: () => FileChooserCallback | null;
  // Clears the slot only if it still holds `callback`
  release: (callback: FileChooserCallback) => void;
}

export const createUploadSlotStore = () =>
  createStore<UploadSlotState>()((set, get) => ({
    pending: null,
    hold: (callback) => set({ pending: callback }),
    take: () => {
      const { pending } = get();
      if (pending) set({ pending: null });
      return pending;
    },
    release: (callback) => {
      if (get().pending === callback) set({ pending: null });
    },
  }));

export type UploadSlotStore = ReturnType<typeof createUploadSlotStore>;
