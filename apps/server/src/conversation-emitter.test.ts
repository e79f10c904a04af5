import { describe, expect, it } from "vitest";
import type { TurnEvent } from "@surfloop/shared";
import { emit, subscribe, subscriberCount } from "./conversation-emitter.js";

describe("conversation emitter", () => {
  it("delivers stamped events to live subscribers only", () => {
    const seen: TurnEvent[] = [];
    const unsubscribe = subscribe("conv_1", (e) => seen.push(e));

    emit("conv_1", { type: "notice", payload: { text: "hi" }, ts: "2026-01-01T00:00:00.000Z" });
    emit("conv_2", { type: "notice", payload: { text: "elsewhere" } });
    unsubscribe();
    emit("conv_1", { type: "notice", payload: { text: "late" } });

    expect(seen).toEqual([{ type: "notice", payload: { text: "hi" }, ts: "2026-01-01T00:00:00.000Z" }]);
    expect(subscriberCount("conv_1")).toBe(0);
  });

  it("keeps delivering when one subscriber throws", () => {
    const seen: string[] = [];
    const dropBroken = subscribe("conv_3", () => {
      throw new Error("socket closed");
    });
    const dropOk = subscribe("conv_3", (e) => seen.push(e.type));

    emit("conv_3", { type: "turn_started", payload: {} });

    expect(seen).toEqual(["turn_started"]);
    expect(subscriberCount("conv_3")).toBe(2);
    dropBroken();
    dropOk();
  });
});
