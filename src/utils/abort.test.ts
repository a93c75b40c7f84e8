import { describe, expect, it } from "vitest";
import { createDeadline } from "./abort.js";

describe("createDeadline", () => {
  it("aborts and flags a timeout", async () => {
    const deadline = createDeadline(20);
    await new Promise((resolve) => setTimeout(resolve, 60));

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(true);
    expect(deadline.interrupted()).toBe(false);
    deadline.dispose();
  });

  it("follows the parent signal", () => {
    const parent = new AbortController();
    const deadline = createDeadline(10_000, parent.signal);

    parent.abort();

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.interrupted()).toBe(true);
    expect(deadline.timedOut()).toBe(false);
    deadline.dispose();
  });

  it("starts aborted when the parent already is", () => {
    const parent = new AbortController();
    parent.abort();

    const deadline = createDeadline(10_000, parent.signal);

    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });

  it("does not fire after dispose", async () => {
    const deadline = createDeadline(20);
    deadline.dispose();
    await new Promise((resolve) => setTimeout(resolve, 60));

    expect(deadline.signal.aborted).toBe(false);
  });
});
