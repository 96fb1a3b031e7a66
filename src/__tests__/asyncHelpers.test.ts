import { sleep } from "../utils/asyncHelpers";

beforeEach(() => {
  jest.useFakeTimers();
});

afterEach(() => {
  jest.useRealTimers();
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    const done = jest.fn();
    const pending = sleep(1000).then(done);

    jest.advanceTimersByTime(999);
    await Promise.resolve();
    expect(done).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
    expect(jest.getTimerCount()).toBe(0);
  });

  it("resolves immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(60000, controller.signal)).resolves.toBeUndefined();
    expect(jest.getTimerCount()).toBe(0);
  });
});
