import { describe, expect, it, vi } from "vitest";

import { fail, runStrategyChain, succeed } from "../strategy-chain";
import type { Strategy } from "../strategy-chain";

describe("runStrategyChain", () => {
  it("stops at the first successful strategy", () => {
    const late = vi.fn(() => succeed("late"));
    const strategies: Array<Strategy<string, string>> = [
      { name: "first", attempt: () => fail("nope") },
      { name: "second", attempt: (input) => succeed(input.toUpperCase()) },
      { name: "third", attempt: late }
    ];

    const outcome = runStrategyChain("abc", strategies);

    expect(outcome.winner).toEqual({ name: "second", value: "ABC" });
    expect(outcome.failures).toEqual([{ name: "first", reason: "nope" }]);
    expect(late).not.toHaveBeenCalled();
  });

  it("reports every failure when nothing succeeds", () => {
    const outcome = runStrategyChain(1, [
      { name: "a", attempt: () => fail("too small") },
      { name: "b", attempt: () => fail("too odd") }
    ]);

    expect(outcome.winner).toBeNull();
    expect(outcome.failures.map((failure) => failure.reason)).toEqual(["too small", "too odd"]);
  });
});
