import { FutureCallback } from "../../src/completion/future-callback";
import { CommandTimeoutError } from "../../src/errors";
import {
  asCommandResultMessage,
  asExceptionalResult,
} from "../../src/messaging/command-results";
import { GenericCommandMessage } from "../../src/messaging/generic-command-message";

describe("FutureCallback", () => {
  const message = new GenericCommandMessage({ type: "Ping" });

  it("resolves with the reported result", async () => {
    const future = new FutureCallback<{ type: string }, string>();

    future.onResult(message, asCommandResultMessage("pong"));

    expect(future.isDone()).toBe(true);
    await expect(future.getResult()).resolves.toEqual({
      exceptional: false,
      payload: "pong",
      metadata: {},
    });
  });

  it("keeps the first result", async () => {
    const future = new FutureCallback<{ type: string }, string>();

    future.onResult(message, asCommandResultMessage("first"));
    future.onResult(message, asCommandResultMessage("second"));

    await expect(future.getResult()).resolves.toMatchObject({ payload: "first" });
  });

  it("notifies listeners when the result arrives", () => {
    const future = new FutureCallback<{ type: string }, string>();
    const listener = vi.fn();
    future.whenComplete(listener);

    const failure = asExceptionalResult(new Error("boom"));
    future.onResult(message, failure);

    expect(listener).toHaveBeenCalledWith(failure);
  });

  it("resolves with a timeout failure when no result arrives in time", async () => {
    const future = new FutureCallback<{ type: string }, string>();

    const result = await future.getResult(10);

    expect(result.exceptional).toBe(true);
    expect(result.exceptional && result.exceptionResult).toBeInstanceOf(
      CommandTimeoutError
    );
    expect(future.isDone()).toBe(false);
  });

  describe("with fake timers", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("prefers a result that arrives before the timeout", async () => {
      const future = new FutureCallback<{ type: string }, string>();
      const pending = future.getResult(1_000);

      vi.advanceTimersByTime(500);
      future.onResult(message, asCommandResultMessage("in time"));
      vi.advanceTimersByTime(1_000);

      await expect(pending).resolves.toMatchObject({ payload: "in time" });
      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
