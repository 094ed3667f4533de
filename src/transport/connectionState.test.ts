import { describe, it, expect } from "@jest/globals";
import { ConnectionState } from "./connectionState.js";

describe("ConnectionState", () => {
  it("should start at the given endpoint", () => {
    const state = new ConnectionState(3, 2, 1_000);
    expect(state.endpointIndex).toBe(2);
    expect(state.startIndex).toBe(2);
    expect(state.retryCount).toBe(0);
    expect(state.attemptStartTime).toBe(1_000);
  });

  it("should wrap a start index past the end", () => {
    const state = new ConnectionState(3, 4);
    expect(state.endpointIndex).toBe(1);
  });

  it("should rotate round-robin from the start index", () => {
    const state = new ConnectionState(3, 1);
    const order: number[] = [];
    for (let i = 0; i < 4; i++) {
      order.push(state.roundRobinIndex());
      state.retryCount += 1;
    }
    expect(order).toEqual([1, 2, 0, 1]);
  });

  it("should measure elapsed time from the first attempt", () => {
    const state = new ConnectionState(1, 0, 5_000);
    expect(state.elapsedMs(5_250)).toBe(250);
  });

  it("should throw without endpoints", () => {
    expect(() => new ConnectionState(0, 0)).toThrow(
      "ConnectionState requires at least one endpoint."
    );
  });
});
