import type { WeatherError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import type { Clock } from "../domain/runtime/clock";
import { GATEWAY } from "../utils/constants";
import { Semaphore } from "../utils/semaphore";
import { describeUrl, type HttpResponse, type HttpTransport } from "./httpTransport";

export interface NetworkGatewayOptions {
  transport: HttpTransport;
  clock?: Clock;
  minRequestIntervalMs?: number;
  maxConcurrentRequests?: number;
  purgeIntervalMs?: number;
  sessionRecycleIntervalMs?: number;
}

export type GatewayResult = Result<HttpResponse, WeatherError>;

const systemClock: Clock = { now: () => new Date() };

/**
 * Single entry point for outbound GETs. Repeats of a URL that completed less
 * than `minRequestIntervalMs` ago are rejected, concurrent repeats share one
 * request, and at most `maxConcurrentRequests` distinct URLs are on the wire.
 */
export class NetworkGateway {
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly minRequestIntervalMs: number;
  private readonly purgeIntervalMs: number;
  private readonly sessionRecycleIntervalMs: number;
  private readonly permits: Semaphore;
  private readonly inFlight = new Map<string, Promise<GatewayResult>>();
  private readonly completedAt = new Map<string, number>();
  private timers: NodeJS.Timeout[] = [];

  constructor(options: NetworkGatewayOptions) {
    this.transport = options.transport;
    this.clock = options.clock ?? systemClock;
    this.minRequestIntervalMs =
      options.minRequestIntervalMs ?? GATEWAY.MIN_REQUEST_INTERVAL_MS;
    this.purgeIntervalMs = options.purgeIntervalMs ?? GATEWAY.PURGE_INTERVAL_MS;
    this.sessionRecycleIntervalMs =
      options.sessionRecycleIntervalMs ?? GATEWAY.SESSION_RECYCLE_INTERVAL_MS;
    this.permits = new Semaphore(
      options.maxConcurrentRequests ?? GATEWAY.MAX_CONCURRENT_REQUESTS,
    );
  }

  request(url: string): Promise<GatewayResult> {
    const pending = this.inFlight.get(url);
    if (pending) return pending;

    const last = this.completedAt.get(url);
    if (last !== undefined && this.now() - last < this.minRequestIntervalMs) {
      console.warn("Throttled repeat request:", describeUrl(url));
      const throttled: WeatherError = {
        type: "Throttled",
        message: `Request repeated within ${this.minRequestIntervalMs}ms.`,
      };
      return Promise.resolve(err(throttled));
    }

    const task = this.permits
      .withPermit(() => this.send(url))
      .finally(() => {
        this.inFlight.delete(url);
      });
    this.inFlight.set(url, task);
    return task;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Forget completion times older than the purge interval. */
  purgeExpired(): number {
    const cutoff = this.now() - this.purgeIntervalMs;
    let purged = 0;
    for (const [url, completedAt] of this.completedAt) {
      if (completedAt < cutoff) {
        this.completedAt.delete(url);
        purged += 1;
      }
    }
    return purged;
  }

  recycleSession(): void {
    this.transport.reset();
  }

  start(): void {
    if (this.timers.length > 0) return;
    const purge = setInterval(() => this.purgeExpired(), this.purgeIntervalMs);
    const recycle = setInterval(
      () => this.recycleSession(),
      this.sessionRecycleIntervalMs,
    );
    purge.unref();
    recycle.unref();
    this.timers = [purge, recycle];
  }

  dispose(): void {
    this.timers.forEach((timer) => clearInterval(timer));
    this.timers = [];
    this.transport.close();
  }

  private async send(url: string): Promise<GatewayResult> {
    try {
      const response = await this.transport.get(url);
      this.completedAt.set(url, this.now());
      return ok(response);
    } catch (error) {
      console.warn("Request failed:", describeUrl(url), error);
      return err({
        type: "NetworkError",
        message: error instanceof Error ? error.message : "Request failed.",
      });
    }
  }

  private now(): number {
    return this.clock.now().getTime();
  }
}
