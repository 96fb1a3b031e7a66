import { createActor } from "xstate";
import { weatherFetchMachine } from "../domain/weather/fetchMachine";

function startActor() {
  const actor = createActor(weatherFetchMachine);
  actor.start();
  return actor;
}

describe("weatherFetchMachine", () => {
  it("walks resolving, requesting and merging to published", () => {
    const actor = startActor();

    actor.send({ type: "FETCH", city: "番禺区" });
    expect(actor.getSnapshot().value).toBe("resolving");

    actor.send({ type: "RESOLVED", city: "番禺区", adcode: "440113" });
    expect(actor.getSnapshot().value).toBe("requesting");

    actor.send({ type: "RESPONSES_RECEIVED" });
    expect(actor.getSnapshot().value).toBe("merging");

    actor.send({ type: "PUBLISHED" });
    expect(actor.getSnapshot().value).toBe("published");
    expect(actor.getSnapshot().context).toEqual({
      city: "番禺区",
      adcode: "440113",
      error: null,
      fromCache: false,
    });
    actor.stop();
  });

  it("publishes straight from resolving on a cache hit", () => {
    const actor = startActor();

    actor.send({ type: "FETCH", city: "番禺区" });
    actor.send({ type: "CACHE_HIT", city: "番禺区" });

    expect(actor.getSnapshot().value).toBe("published");
    expect(actor.getSnapshot().context.fromCache).toBe(true);
    actor.stop();
  });

  it("records the error when a step fails", () => {
    const actor = startActor();
    const error = { type: "CityNotFound" as const, message: "Unknown region: 火星" };

    actor.send({ type: "FETCH", city: "火星" });
    actor.send({ type: "FAILED", error });

    expect(actor.getSnapshot().value).toBe("failed");
    expect(actor.getSnapshot().context.error).toEqual(error);
    actor.stop();
  });

  it("restarts from resolving when a new fetch supersedes the running one", () => {
    const actor = startActor();

    actor.send({ type: "FETCH", city: "番禺区" });
    actor.send({ type: "RESOLVED", city: "番禺区", adcode: "440113" });
    actor.send({ type: "FETCH", city: "北京市" });

    expect(actor.getSnapshot().value).toBe("resolving");
    expect(actor.getSnapshot().context).toEqual({
      city: "北京市",
      adcode: null,
      error: null,
      fromCache: false,
    });
    actor.stop();
  });

  it("ignores events that do not belong to the current state", () => {
    const actor = startActor();

    actor.send({ type: "PUBLISHED" });
    expect(actor.getSnapshot().value).toBe("idle");

    actor.send({ type: "FETCH", city: null });
    actor.send({ type: "RESPONSES_RECEIVED" });
    expect(actor.getSnapshot().value).toBe("resolving");
    actor.stop();
  });

  it("returns to idle on reset after settling", () => {
    const actor = startActor();

    actor.send({ type: "FETCH", city: "番禺区" });
    actor.send({ type: "CACHE_HIT", city: "番禺区" });
    actor.send({ type: "RESET" });

    expect(actor.getSnapshot().value).toBe("idle");
    expect(actor.getSnapshot().context.city).toBeNull();
    actor.stop();
  });
});
