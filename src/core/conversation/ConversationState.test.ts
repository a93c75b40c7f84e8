import { describe, expect, it } from "vitest";
import { ConversationState } from "./ConversationState.js";

describe("ConversationState", () => {
  it("starts with the system message only", () => {
    const state = new ConversationState("be brief");
    expect(state.getMessages()).toEqual([{ role: "system", content: "be brief" }]);
  });

  it("exposes the staged user message to the turn but not to the history", () => {
    const state = new ConversationState("be brief");
    const turn = state.begin("hi");

    expect(turn.messages).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "hi" },
    ]);
    expect(state.length).toBe(1);
  });

  it("appends the user/assistant pair on commit", () => {
    const state = new ConversationState("be brief");
    state.begin("hi").commit("hello!");

    expect(state.getMessages()).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello!" },
    ]);
  });

  it("keeps 1 + 2N messages with alternating roles after N turns", () => {
    const state = new ConversationState("sys");
    for (let i = 0; i < 4; i += 1) {
      state.begin(`question ${i}`).commit(`answer ${i}`);
    }

    const roles = state.getMessages().map((m) => m.role);
    expect(roles).toEqual([
      "system",
      "user",
      "assistant",
      "user",
      "assistant",
      "user",
      "assistant",
      "user",
      "assistant",
    ]);
  });

  it("leaves the history untouched when a turn is abandoned", () => {
    const state = new ConversationState("sys");
    state.begin("lost");
    state.begin("kept").commit("ok");

    expect(state.getMessages().map((m) => m.content)).toEqual(["sys", "kept", "ok"]);
  });

  it("rejects a second commit and a stale turn", () => {
    const state = new ConversationState("sys");
    const first = state.begin("a");
    first.commit("b");
    expect(() => first.commit("c")).toThrow("Turn already committed");

    const stale = state.begin("x");
    state.begin("y").commit("z");
    expect(() => stale.commit("w")).toThrow(/Stale turn/);
    expect(state.length).toBe(5);
  });

  it("returns copies so callers cannot edit the history", () => {
    const state = new ConversationState("sys");
    const snapshot = state.getMessages();
    const first = snapshot[0];
    if (first) first.content = "changed";

    expect(state.getMessages()[0]).toEqual({ role: "system", content: "sys" });
  });
});
