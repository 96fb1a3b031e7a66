import {
  initialNetworkStabilityState,
  networkStabilityReducer,
  type NetworkStabilityEvent,
} from "../domain/network/stability";

function run(events: NetworkStabilityEvent[]) {
  return events.reduce(networkStabilityReducer, initialNetworkStabilityState);
}

describe("networkStabilityReducer", () => {
  it("starts unstable", () => {
    expect(initialNetworkStabilityState.isStable).toBe(false);
  });

  it("needs two consecutive successful probes to become stable", () => {
    expect(run([{ type: "PROBE_SUCCEEDED" }])).toEqual({
      isStable: false,
      consecutiveSuccesses: 1,
      lastConnectivityChangeAt: null,
    });
    expect(run([{ type: "PROBE_SUCCEEDED" }, { type: "PROBE_SUCCEEDED" }])).toEqual({
      isStable: true,
      consecutiveSuccesses: 2,
      lastConnectivityChangeAt: null,
    });
  });

  it("resets the streak on a failed probe", () => {
    const state = run([
      { type: "PROBE_SUCCEEDED" },
      { type: "PROBE_SUCCEEDED" },
      { type: "PROBE_FAILED" },
      { type: "PROBE_SUCCEEDED" },
    ]);

    expect(state.isStable).toBe(false);
    expect(state.consecutiveSuccesses).toBe(1);
  });

  it("returns the same state for a failure while already unstable", () => {
    expect(
      networkStabilityReducer(initialNetworkStabilityState, { type: "PROBE_FAILED" }),
    ).toBe(initialNetworkStabilityState);
  });

  it("drops to unstable when connectivity is lost", () => {
    const state = run([
      { type: "PROBE_SUCCEEDED" },
      { type: "PROBE_SUCCEEDED" },
      { type: "CONNECTIVITY_CHANGED", online: false, at: 10_000 },
    ]);

    expect(state).toEqual({
      isStable: false,
      consecutiveSuccesses: 0,
      lastConnectivityChangeAt: 10_000,
    });
  });

  it("ignores connectivity reports less than a second apart", () => {
    const state = run([
      { type: "CONNECTIVITY_CHANGED", online: true, at: 10_000 },
      { type: "PROBE_SUCCEEDED" },
      { type: "PROBE_SUCCEEDED" },
      { type: "CONNECTIVITY_CHANGED", online: false, at: 10_999 },
    ]);

    expect(state.isStable).toBe(true);
    expect(state.lastConnectivityChangeAt).toBe(10_000);
  });

  it("keeps the streak when connectivity comes back online", () => {
    const state = run([
      { type: "PROBE_SUCCEEDED" },
      { type: "PROBE_SUCCEEDED" },
      { type: "CONNECTIVITY_CHANGED", online: true, at: 5_000 },
    ]);

    expect(state.isStable).toBe(true);
  });
});
