import { describe, expect, it } from "vitest";
import { ActionExecutor } from "../computer/executor.js";
import { FakeGateway, computerCallResponse, textResponse } from "../test/fake-gateway.js";
import { FakeSurface } from "../test/fake-surface.js";
import type { LoopSettings } from "./computer-loop.js";
import { ConversationSession, PENDING_NOTICE } from "./conversation.js";

const SETTINGS: LoopSettings = {
  model: "computer-use-preview",
  maxIterations: 8,
  maxConsecutiveWaits: 3,
  imageHaltPolicy: "screenshot",
  safetyPolicy: "auto",
  strict: false,
};

function setup(settings: Partial<LoopSettings> = {}) {
  const surface = new FakeSurface();
  surface.stackAt([]);
  const executor = new ActionExecutor(surface, {
    timings: { settleMs: 0, clickSettleMs: 0, clickDispatchWaitMs: 0, domReadyPollMs: 0, captureBackoffMs: 0 },
    sleep: async () => {},
  });
  const gateway = new FakeGateway();
  const events: string[] = [];
  const session = new ConversationSession({
    gateway,
    executor,
    settings: { ...SETTINGS, ...settings },
    emit: (e) => events.push(e.type),
  });
  return { surface, gateway, events, session };
}

describe("ConversationSession", () => {
  it("answers a plain message and chains the next one from its response", async () => {
    const { gateway, session } = setup();
    gateway.chatQueue.push(textResponse("resp_a", "Hello there."), textResponse("resp_b", "Sure."));

    const first = await session.sendMessage("hi");
    await session.sendMessage("thanks");

    expect(first).toEqual({ status: "completed", text: "Hello there.", halt: undefined });
    expect(gateway.chatRequests).toEqual([
      { model: "computer-use-preview", input: "hi", previousResponseId: undefined },
      { model: "computer-use-preview", input: "thanks", previousResponseId: "resp_a" },
    ]);
    expect(session.state.lastResponseId).toBe("resp_b");
  });

  it("resolves a computer_call from a non-streamed response", async () => {
    const { surface, gateway, session } = setup();
    gateway.chatQueue.push(computerCallResponse("resp_a", { type: "screenshot" }));
    gateway.submitQueue.push(textResponse("resp_b", "The cart is empty."));

    const result = await session.sendMessage("check the page");

    expect(result).toEqual({ status: "completed", text: "The cart is empty.", halt: "complete" });
    expect(gateway.fetched).toEqual(["resp_a", "resp_b"]);
    expect(session.state.lastResponseId).toBe("resp_b");
    expect(session.messages.map((m) => m.role)).toEqual(["user", "assistant"]);
    expect(session.messages[1]?.image).toBe(Buffer.from(surface.defaultCapture).toString("base64"));
  });

  it("streams text and hands a computer_call to the resolver", async () => {
    const { gateway, events, session } = setup();
    gateway.streamQueue.push([
      { type: "created", responseId: "resp_a" },
      { type: "text_delta", delta: "Opening " },
      { type: "text_delta", delta: "the page." },
      { type: "computer_call", itemId: "cu_resp_a" },
      { type: "completed", response: computerCallResponse("resp_a", { type: "wait" }) },
    ]);
    gateway.submitQueue.push(textResponse("resp_b", "Ready."));

    const result = await session.sendMessage("wait for the page", { stream: true });

    expect(result.text).toBe("Opening the page.\n\nReady.");
    expect(gateway.fetched).toEqual(["resp_a", "resp_b"]);
    expect(gateway.submissions[0]?.previousResponseId).toBe("resp_a");
    expect(events[0]).toBe("turn_started");
    expect(events[events.length - 1]).toBe("turn_finished");
  });

  it("fails the turn on a failed stream and drops the pending response", async () => {
    const { gateway, events, session } = setup();
    gateway.streamQueue.push([
      { type: "created", responseId: "resp_a" },
      { type: "failed", message: "rate limited" },
    ]);

    const result = await session.sendMessage("hi", { stream: true });

    expect(result).toEqual({ status: "failed", text: "", error: "rate limited" });
    expect(session.state.lastResponseId).toBeNull();
    expect(events).toContain("turn_failed");
  });

  it("refuses a message while a computer step is pending", async () => {
    const { gateway, session } = setup();
    session.state.isAwaitingOutput = true;

    const result = await session.sendMessage("next");

    expect(result).toEqual({ status: "blocked", text: "" });
    expect(gateway.chatRequests).toEqual([]);
    expect(session.messages).toEqual([{ role: "system", text: PENDING_NOTICE }]);
  });

  it("waits for approval and resumes the chain once approved", async () => {
    const { gateway, session } = setup({ safetyPolicy: "confirm" });
    const checks = [{ id: "sc_1", code: "irrelevant_domain", message: "Unexpected site" }];
    gateway.chatQueue.push(computerCallResponse("resp_a", { type: "wait" }, { checks }));
    gateway.submitQueue.push(textResponse("resp_b", "Done waiting."));

    const parked = await session.sendMessage("wait a bit");
    expect(parked.status).toBe("awaiting_approval");
    expect((await session.sendMessage("hello?")).status).toBe("blocked");

    const approved = await session.approve();

    expect(approved).toEqual({ status: "completed", text: "Done waiting.", halt: "complete" });
    expect(gateway.submissions[0]?.output.acknowledged_safety_checks).toEqual(checks);
    expect(session.state.lastResponseId).toBe("resp_b");
  });

  it("cancel denies a parked approval", async () => {
    const { gateway, session } = setup({ safetyPolicy: "confirm" });
    gateway.chatQueue.push(
      computerCallResponse("resp_a", { type: "wait" }, { checks: [{ id: "sc_2", code: "x", message: "y" }] })
    );
    await session.sendMessage("wait a bit");

    expect(session.cancel()).toBe(true);
    expect(session.state.lastResponseId).toBeNull();
    expect(session.state.pendingApproval).toBeNull();
    expect(gateway.submissions).toEqual([]);
  });
});
