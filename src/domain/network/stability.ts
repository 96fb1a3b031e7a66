export const REQUIRED_STABLE_COUNT = 2;
export const CONNECTIVITY_DEBOUNCE_MS = 1000;

export interface NetworkStabilityState {
  isStable: boolean;
  consecutiveSuccesses: number;
  lastConnectivityChangeAt: number | null;
}

export type NetworkStabilityEvent =
  | { type: "PROBE_SUCCEEDED" }
  | { type: "PROBE_FAILED" }
  | { type: "CONNECTIVITY_CHANGED"; online: boolean; at: number };

export const initialNetworkStabilityState: NetworkStabilityState = {
  isStable: false,
  consecutiveSuccesses: 0,
  lastConnectivityChangeAt: null,
};

const UNSTABLE = { isStable: false, consecutiveSuccesses: 0 } as const;

export function networkStabilityReducer(
  state: NetworkStabilityState,
  event: NetworkStabilityEvent,
): NetworkStabilityState {
  switch (event.type) {
    case "PROBE_SUCCEEDED": {
      const consecutiveSuccesses = state.consecutiveSuccesses + 1;
      return {
        ...state,
        consecutiveSuccesses,
        isStable: consecutiveSuccesses >= REQUIRED_STABLE_COUNT,
      };
    }
    case "PROBE_FAILED":
      if (!state.isStable && state.consecutiveSuccesses === 0) return state;
      return { ...state, ...UNSTABLE };
    case "CONNECTIVITY_CHANGED": {
      const last = state.lastConnectivityChangeAt;
      if (last !== null && event.at - last < CONNECTIVITY_DEBOUNCE_MS) {
        return state;
      }
      if (event.online) {
        return { ...state, lastConnectivityChangeAt: event.at };
      }
      return { ...UNSTABLE, lastConnectivityChangeAt: event.at };
    }
    default:
      return state;
  }
}
