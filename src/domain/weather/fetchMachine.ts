import { assign, setup } from "xstate";
import type { WeatherError } from "../errors";

export type WeatherFetchPhase =
  | "idle"
  | "resolving"
  | "requesting"
  | "merging"
  | "published"
  | "failed";

export interface WeatherFetchContext {
  city: string | null;
  adcode: string | null;
  error: WeatherError | null;
  fromCache: boolean;
}

export type WeatherFetchEvent =
  | { type: "FETCH"; city: string | null }
  | { type: "RESOLVED"; city: string; adcode: string }
  | { type: "CACHE_HIT"; city: string }
  | { type: "RESPONSES_RECEIVED" }
  | { type: "PUBLISHED" }
  | { type: "FAILED"; error: WeatherError }
  | { type: "RESET" };

export const initialWeatherFetchContext: WeatherFetchContext = {
  city: null,
  adcode: null,
  error: null,
  fromCache: false,
};

/**
 * Lifecycle of the single-flight fetch. A FETCH in any state restarts the
 * cycle, which is how a newer request supersedes the running one.
 */
export const weatherFetchMachine = setup({
  types: {
    context: {} as WeatherFetchContext,
    events: {} as WeatherFetchEvent,
  },
}).createMachine({
  id: "weatherFetch",
  initial: "idle",
  context: initialWeatherFetchContext,
  on: {
    FETCH: {
      target: ".resolving",
      actions: assign(({ event }) => ({
        city: event.city,
        adcode: null,
        error: null,
        fromCache: false,
      })),
    },
  },
  states: {
    idle: {},
    resolving: {
      on: {
        CACHE_HIT: {
          target: "published",
          actions: assign(({ event }) => ({
            city: event.city,
            fromCache: true,
          })),
        },
        RESOLVED: {
          target: "requesting",
          actions: assign(({ event }) => ({
            city: event.city,
            adcode: event.adcode,
          })),
        },
        FAILED: {
          target: "failed",
          actions: assign(({ event }) => ({ error: event.error })),
        },
      },
    },
    requesting: {
      on: {
        RESPONSES_RECEIVED: { target: "merging" },
        FAILED: {
          target: "failed",
          actions: assign(({ event }) => ({ error: event.error })),
        },
      },
    },
    merging: {
      on: {
        PUBLISHED: { target: "published" },
        FAILED: {
          target: "failed",
          actions: assign(({ event }) => ({ error: event.error })),
        },
      },
    },
    published: {
      on: {
        RESET: { target: "idle", actions: assign(initialWeatherFetchContext) },
      },
    },
    failed: {
      on: {
        RESET: { target: "idle", actions: assign(initialWeatherFetchContext) },
      },
    },
  },
});

export function isWeatherFetchPhase(value: unknown): value is WeatherFetchPhase {
  return (
    value === "idle" ||
    value === "resolving" ||
    value === "requesting" ||
    value === "merging" ||
    value === "published" ||
    value === "failed"
  );
}
