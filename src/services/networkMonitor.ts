import type { Clock } from "../domain/runtime/clock";
import {
  initialNetworkStabilityState,
  type NetworkStabilityEvent,
  type NetworkStabilityState,
  networkStabilityReducer,
} from "../domain/network/stability";
import { NETWORK_CHECK_INTERVAL_MS, PROBE_URL } from "../utils/constants";
import type { FetchLike } from "./httpTransport";

/** Resolves true when the network answered. Must not reject. */
export type ConnectivityProbe = () => Promise<boolean>;

export type StabilityListener = (stable: boolean) => void;

export interface NetworkMonitorOptions {
  probe: ConnectivityProbe;
  clock?: Clock;
  intervalMs?: number;
}

const PROBE_TIMEOUT_MS = 5000;
const systemClock: Clock = { now: () => new Date() };

export function createFetchProbe(
  url: string = PROBE_URL,
  fetchImpl: FetchLike = fetch,
): ConnectivityProbe {
  return async () => {
    try {
      const response = await fetchImpl(url, {
        method: "HEAD",
        signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
      });
      return response.status < 500;
    } catch {
      return false;
    }
  };
}

export class NetworkMonitor {
  private state: NetworkStabilityState = initialNetworkStabilityState;
  private readonly listeners = new Set<StabilityListener>();
  private readonly probe: ConnectivityProbe;
  private readonly clock: Clock;
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private checking: Promise<boolean> | null = null;

  constructor(options: NetworkMonitorOptions) {
    this.probe = options.probe;
    this.clock = options.clock ?? systemClock;
    this.intervalMs = options.intervalMs ?? NETWORK_CHECK_INTERVAL_MS;
  }

  isStable(): boolean {
    return this.state.isStable;
  }

  subscribe(listener: StabilityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.checkNow().catch((error: unknown) => {
        console.warn("Network probe failed:", error);
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Runs one probe; overlapping calls share it. */
  checkNow(): Promise<boolean> {
    if (!this.checking) {
      this.checking = this.probe()
        .then((reachable) => {
          this.dispatch({ type: reachable ? "PROBE_SUCCEEDED" : "PROBE_FAILED" });
          return this.state.isStable;
        })
        .finally(() => {
          this.checking = null;
        });
    }
    return this.checking;
  }

  reportConnectivity(online: boolean): void {
    this.dispatch({
      type: "CONNECTIVITY_CHANGED",
      online,
      at: this.clock.now().getTime(),
    });
  }

  private dispatch(event: NetworkStabilityEvent): void {
    const previous = this.state;
    this.state = networkStabilityReducer(previous, event);
    if (previous.isStable === this.state.isStable) return;
    if (this.state.isStable) {
      console.info("Network is stable");
    } else {
      console.warn("Network became unstable");
    }
    this.listeners.forEach((listener) => listener(this.state.isStable));
  }
}
