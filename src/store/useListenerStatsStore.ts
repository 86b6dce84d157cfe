/**
 * Listener Stats Store: datagram counters for telemetry listeners
 * received → decoded | failed, plus queue drops
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { PacketName } from "../lib/packets/PacketRegistry";

export interface ListenerStatsState {
  received: number;
  bytesReceived: number;
  decoded: number;
  failed: number;
  /** Datagrams dropped from a full pending queue */
  dropped: number;
  byType: Partial<Record<PacketName, number>>;
  /** Error name → count */
  failuresByKind: Record<string, number>;
  lastDatagramAt: number | null;

  // Actions
  recordReceived: (byteLength: number) => void;
  recordDecoded: (name: PacketName) => void;
  recordFailure: (errorName: string) => void;
  recordDropped: (count: number) => void;
  reset: () => void;
}

export type ListenerStatsStore = StoreApi<ListenerStatsState>;

const initialCounters = () => ({
  received: 0,
  bytesReceived: 0,
  decoded: 0,
  failed: 0,
  dropped: 0,
  byType: {},
  failuresByKind: {},
  lastDatagramAt: null,
});

export function createListenerStatsStore(): ListenerStatsStore {
  return createStore<ListenerStatsState>()((set) => ({
    ...initialCounters(),

    recordReceived: (byteLength) => {
      set((state) => ({
        received: state.received + 1,
        bytesReceived: state.bytesReceived + byteLength,
        lastDatagramAt: Date.now(),
      }));
    },

    recordDecoded: (name) => {
      set((state) => ({
        decoded: state.decoded + 1,
        byType: { ...state.byType, [name]: (state.byType[name] ?? 0) + 1 },
      }));
    },

    recordFailure: (errorName) => {
      set((state) => ({
        failed: state.failed + 1,
        failuresByKind: {
          ...state.failuresByKind,
          [errorName]: (state.failuresByKind[errorName] ?? 0) + 1,
        },
      }));
    },

    recordDropped: (count) => {
      set((state) => ({ dropped: state.dropped + count }));
    },

    reset: () => set(initialCounters()),
  }));
}

/** Shared store used by listeners that are not given their own. */
export const useListenerStatsStore = createListenerStatsStore();
