import { describe, expect, it } from "vitest";
import { ActionExecutor, type ExecutorTimings } from "../computer/executor.js";
import { FakeGateway, computerCallResponse, textResponse } from "../test/fake-gateway.js";
import { FakeSurface, byId, place, valueOf } from "../test/fake-surface.js";
import {
  ComputerCallResolver,
  NOTICES,
  createLoopState,
  createTurnContext,
  type LoopSettings,
} from "./computer-loop.js";

const FAST: Partial<ExecutorTimings> = {
  settleMs: 0,
  clickSettleMs: 0,
  clickDispatchWaitMs: 0,
  readyDelayMs: 0,
  domReadyTimeoutMs: 1000,
  domReadyPollMs: 0,
  captureBackoffMs: 0,
  searchSettleMs: 0,
};

const SETTINGS: LoopSettings = {
  model: "computer-use-preview",
  maxIterations: 8,
  maxConsecutiveWaits: 3,
  imageHaltPolicy: "screenshot",
  safetyPolicy: "auto",
  strict: false,
};

const CHECKS = [{ id: "sc_1", code: "malicious_instructions", message: "Page text asks for credentials" }];

function setup(
  options: { surface?: FakeSurface; settings?: Partial<LoopSettings>; onEvent?: (type: string) => void } = {}
) {
  const surface = options.surface ?? new FakeSurface();
  surface.stackAt([]);
  const executor = new ActionExecutor(surface, { timings: FAST, sleep: async () => {}, now: () => 1000 });
  const gateway = new FakeGateway();
  const state = createLoopState();
  const notices: string[] = [];
  const events: { type: string; payload: Record<string, unknown> }[] = [];
  const resolver = new ComputerCallResolver(state, {
    gateway,
    executor,
    settings: { ...SETTINGS, ...options.settings },
    notify: (text) => notices.push(text),
    emit: (event) => {
      events.push(event);
      options.onEvent?.(event.type);
    },
  });
  return { surface, gateway, state, notices, events, resolver };
}

function outputsOf(events: { type: string; payload: Record<string, unknown> }[]): unknown[] {
  return events.filter((e) => e.type === "action_executed").map((e) => e.payload.output);
}

describe("ComputerCallResolver chains", () => {
  it("resolves click then wait in two iterations and keeps the final response id", async () => {
    const { surface, gateway, state, events, resolver } = setup();
    gateway.add(computerCallResponse("resp_0", { type: "click", x: 100, y: 200 }));
    gateway.submitQueue.push(computerCallResponse("resp_1", { type: "wait" }), textResponse("resp_2", "Done."));
    state.lastResponseId = "resp_0";

    const outcome = await resolver.resolve(createTurnContext("click the first product"));

    expect(outcome).toEqual({ resolved: 2, halt: "complete" });
    expect(state.lastResponseId).toBe("resp_2");
    expect(gateway.fetched).toEqual(["resp_0", "resp_1", "resp_2"]);
    expect(gateway.submissions.map((s) => [s.previousResponseId, s.output.call_id])).toEqual([
      ["resp_0", "call_resp_0"],
      ["resp_1", "call_resp_1"],
    ]);
    const image = Buffer.from(surface.defaultCapture).toString("base64");
    expect(gateway.submissions[0]?.output).toEqual({
      type: "computer_call_output",
      call_id: "call_resp_0",
      output: { type: "computer_screenshot", image_url: `data:image/png;base64,${image}` },
      current_url: "https://shop.test/",
    });
    expect(events.map((e) => e.type)).toEqual([
      "action_started",
      "action_executed",
      "output_submitted",
      "action_started",
      "action_executed",
      "output_submitted",
      "chain_halted",
    ]);
    expect(state.isResolving).toBe(false);
    expect(state.isAwaitingOutput).toBe(false);
  });

  it("hands every submission response to onResponse", async () => {
    const surface = new FakeSurface();
    surface.stackAt([]);
    const gateway = new FakeGateway();
    const state = createLoopState();
    const seen: string[] = [];
    const resolver = new ComputerCallResolver(state, {
      gateway,
      executor: new ActionExecutor(surface, { timings: FAST, sleep: async () => {} }),
      settings: SETTINGS,
      onResponse: (r) => seen.push(r.id),
    });
    gateway.add(computerCallResponse("resp_0", { type: "wait" }));
    gateway.submitQueue.push(textResponse("resp_1", "Here is the page."));
    state.lastResponseId = "resp_0";

    await resolver.resolve(createTurnContext("wait a moment"));

    expect(seen).toEqual(["resp_1"]);
  });

  it("halts without submitting when the call has no call_id", async () => {
    const { surface, gateway, state, notices, resolver } = setup();
    gateway.add(computerCallResponse("resp_0", { type: "screenshot" }, { callId: null }));
    state.lastResponseId = "resp_0";

    const outcome = await resolver.resolve(createTurnContext("check the page"));

    expect(outcome).toEqual({ resolved: 0, halt: "missing_call_id" });
    expect(state.lastResponseId).toBeNull();
    expect(gateway.submissions).toEqual([]);
    expect(surface.snapshotCalls).toBe(0);
    expect(notices).toEqual([NOTICES.invalidCall]);
  });

  it("does nothing without a pending response id", async () => {
    const { gateway, resolver } = setup();

    expect(await resolver.resolve(createTurnContext("hello"))).toEqual({ resolved: 0, halt: "complete" });
    expect(gateway.fetched).toEqual([]);
  });
});

describe("ComputerCallResolver wait breaker", () => {
  it("stops after three consecutive waits, once the last output is sent", async () => {
    const { gateway, state, notices, resolver } = setup();
    gateway.add(computerCallResponse("resp_0", { type: "wait" }));
    gateway.submitQueue.push(
      computerCallResponse("resp_1", { type: "wait" }),
      computerCallResponse("resp_2", { type: "wait" }),
      computerCallResponse("resp_3", { type: "wait" })
    );
    state.lastResponseId = "resp_0";

    const outcome = await resolver.resolve(createTurnContext("wait for it"));

    expect(outcome).toEqual({ resolved: 3, halt: "wait_limit" });
    expect(gateway.submissions).toHaveLength(3);
    expect(gateway.fetched).toEqual(["resp_0", "resp_1", "resp_2"]);
    expect(state.lastResponseId).toBeNull();
    expect(state.consecutiveWaitCount).toBe(0);
    expect(notices).toEqual([NOTICES.waitLimit]);
  });

  it("resets the count on any other action", async () => {
    const { gateway, state, notices, resolver } = setup();
    gateway.add(computerCallResponse("resp_0", { type: "wait" }));
    gateway.submitQueue.push(
      computerCallResponse("resp_1", { type: "click", x: 10, y: 300 }),
      computerCallResponse("resp_2", { type: "wait" }),
      computerCallResponse("resp_3", { type: "wait" }),
      textResponse("resp_4", "All set.")
    );
    state.lastResponseId = "resp_0";

    const outcome = await resolver.resolve(createTurnContext("open the deals tab"));

    expect(outcome).toEqual({ resolved: 4, halt: "complete" });
    expect(state.lastResponseId).toBe("resp_4");
    expect(state.consecutiveWaitCount).toBe(0);
    expect(notices).toEqual([]);
  });
});

describe("ComputerCallResolver concurrency and cancellation", () => {
  it("treats a second resolve during a pass as a no-op", async () => {
    const { gateway, state, resolver } = setup();
    gateway.add(computerCallResponse("resp_0", { type: "screenshot" }));
    gateway.submitQueue.push(textResponse("resp_1", "Captured."));
    state.lastResponseId = "resp_0";
    const turn = createTurnContext("check the page");

    const first = resolver.resolve(turn);
    const second = await resolver.resolve(turn);

    expect(second).toEqual({ resolved: 0, halt: "busy" });
    expect(await first).toEqual({ resolved: 1, halt: "complete" });
    expect(gateway.submissions).toHaveLength(1);
  });

  it("halts before the next fetch once cancelled", async () => {
    const controller = new AbortController();
    const { gateway, state, resolver } = setup({
      onEvent: (type) => {
        if (type === "output_submitted") controller.abort();
      },
    });
    gateway.add(computerCallResponse("resp_0", { type: "wait" }));
    gateway.submitQueue.push(computerCallResponse("resp_1", { type: "wait" }));
    state.lastResponseId = "resp_0";

    const outcome = await resolver.resolve(createTurnContext("wait"), controller.signal);

    expect(outcome).toEqual({ resolved: 1, halt: "cancelled" });
    expect(gateway.fetched).toEqual(["resp_0"]);
    expect(state.lastResponseId).toBeNull();
  });

  it("does not submit when cancelled during the action", async () => {
    const { gateway, state, resolver } = setup();
    const controller = new AbortController();
    gateway.add(computerCallResponse("resp_0", { type: "wait" }));
    gateway.beforeFetch = () => controller.abort();
    state.lastResponseId = "resp_0";

    const outcome = await resolver.resolve(createTurnContext("wait"), controller.signal);

    expect(outcome).toEqual({ resolved: 1, halt: "cancelled" });
    expect(gateway.submissions).toEqual([]);
    expect(state.lastResponseId).toBeNull();
  });
});

describe("ComputerCallResolver safety checks", () => {
  it("acknowledges checks on submission under the auto policy", async () => {
    const { gateway, state, resolver } = setup();
    gateway.add(computerCallResponse("resp_0", { type: "wait" }, { checks: CHECKS }));
    gateway.submitQueue.push(textResponse("resp_1", "Done."));
    state.lastResponseId = "resp_0";

    await resolver.resolve(createTurnContext("wait"));

    expect(gateway.submissions[0]?.output.acknowledged_safety_checks).toEqual(CHECKS);
  });

  it("parks the call for approval, then runs it with the checks acknowledged", async () => {
    const { gateway, state, notices, events, resolver } = setup({ settings: { safetyPolicy: "confirm" } });
    gateway.add(computerCallResponse("resp_0", { type: "click", x: 50, y: 400 }, { checks: CHECKS }));
    state.lastResponseId = "resp_0";
    const turn = createTurnContext("press the button");

    const parked = await resolver.resolve(turn);

    expect(parked).toEqual({ resolved: 0, halt: "awaiting_approval" });
    expect(gateway.submissions).toEqual([]);
    expect(state.pendingApproval?.call.callId).toBe("call_resp_0");
    expect(state.isAwaitingOutput).toBe(true);
    expect(state.lastResponseId).toBe("resp_0");
    expect(notices).toEqual([NOTICES.approvalNeeded]);
    expect(events.find((e) => e.type === "safety_checks")?.payload.checks).toEqual(CHECKS);

    gateway.submitQueue.push(textResponse("resp_1", "Clicked."));
    const approved = await resolver.approve(turn);

    expect(approved).toEqual({ resolved: 1, halt: "complete" });
    expect(gateway.submissions[0]?.previousResponseId).toBe("resp_0");
    expect(gateway.submissions[0]?.output.acknowledged_safety_checks).toEqual(CHECKS);
    expect(state.lastResponseId).toBe("resp_1");
    expect(state.pendingApproval).toBeNull();
    expect(state.isAwaitingOutput).toBe(false);
  });

  it("clears the chain when the parked call is denied", async () => {
    const { gateway, state, notices, resolver } = setup({ settings: { safetyPolicy: "confirm" } });
    gateway.add(computerCallResponse("resp_0", { type: "wait" }, { checks: CHECKS }));
    state.lastResponseId = "resp_0";
    await resolver.resolve(createTurnContext("wait"));

    expect(resolver.deny()).toEqual({ resolved: 0, halt: "denied" });
    expect(state.lastResponseId).toBeNull();
    expect(state.pendingApproval).toBeNull();
    expect(state.isAwaitingOutput).toBe(false);
    expect(notices).toEqual([NOTICES.approvalNeeded, NOTICES.denied]);
    expect(gateway.submissions).toEqual([]);
  });
});

describe("ComputerCallResolver halts", () => {
  it("stops a repeated screenshot once the message has a capture", async () => {
    const { surface, gateway, state, resolver } = setup();
    gateway.add(computerCallResponse("resp_0", { type: "screenshot" }));
    state.lastResponseId = "resp_0";
    const turn = createTurnContext("check the page");
    turn.assistantImage = "iVBORw0KGgo=";

    expect(await resolver.resolve(turn)).toEqual({ resolved: 0, halt: "image_present" });
    expect(state.lastResponseId).toBeNull();
    expect(surface.snapshotCalls).toBe(0);
  });

  it("keeps going with the image policy off", async () => {
    const { gateway, state, resolver } = setup({ settings: { imageHaltPolicy: "off" } });
    gateway.add(computerCallResponse("resp_0", { type: "screenshot" }));
    gateway.submitQueue.push(textResponse("resp_1", "Here it is."));
    state.lastResponseId = "resp_0";
    const turn = createTurnContext("check the page");
    turn.assistantImage = "iVBORw0KGgo=";

    expect(await resolver.resolve(turn)).toEqual({ resolved: 1, halt: "complete" });
    expect(turn.assistantImage).not.toBe("iVBORw0KGgo=");
  });

  it("clears the chain when the response cannot be fetched", async () => {
    const { gateway, state, notices, resolver } = setup();
    gateway.fetchError = new Error("503 Service Unavailable");
    state.lastResponseId = "resp_0";

    expect(await resolver.resolve(createTurnContext("wait"))).toEqual({ resolved: 0, halt: "fetch_failed" });
    expect(state.lastResponseId).toBeNull();
    expect(notices).toEqual([NOTICES.fetchFailed]);
  });

  it("clears the chain when the output cannot be submitted", async () => {
    const { gateway, state, notices, resolver } = setup();
    gateway.add(computerCallResponse("resp_0", { type: "wait" }));
    gateway.submitQueue.push(new Error("socket hang up"));
    state.lastResponseId = "resp_0";

    expect(await resolver.resolve(createTurnContext("wait"))).toEqual({ resolved: 1, halt: "submit_failed" });
    expect(state.lastResponseId).toBeNull();
    expect(notices).toEqual([NOTICES.submitFailed]);
  });

  it("clears the chain when the surface is gone", async () => {
    const { surface, gateway, state, notices, resolver } = setup();
    surface.attached = false;
    gateway.add(computerCallResponse("resp_0", { type: "screenshot" }));
    state.lastResponseId = "resp_0";

    expect(await resolver.resolve(createTurnContext("check the page"))).toEqual({
      resolved: 1,
      halt: "executor_failed",
    });
    expect(state.lastResponseId).toBeNull();
    expect(gateway.submissions).toEqual([]);
    expect(notices).toEqual([NOTICES.executorFailed("The browsing surface is not attached")]);
  });

  it("stops at the iteration budget while calls keep coming", async () => {
    const { gateway, state, notices, resolver } = setup({ settings: { maxIterations: 2, imageHaltPolicy: "off" } });
    gateway.add(computerCallResponse("resp_0", { type: "screenshot" }));
    gateway.submitQueue.push(
      computerCallResponse("resp_1", { type: "screenshot" }),
      computerCallResponse("resp_2", { type: "screenshot" })
    );
    state.lastResponseId = "resp_0";

    expect(await resolver.resolve(createTurnContext("check the page"))).toEqual({
      resolved: 2,
      halt: "iteration_limit",
    });
    expect(state.lastResponseId).toBeNull();
    expect(notices).toEqual([NOTICES.iterationLimit]);
  });
});

describe("ComputerCallResolver preconditioning", () => {
  it("runs an explicit search once and suppresses the model's stale click", async () => {
    const surface = new FakeSurface({
      html:
        '<form id="search-form" action="/s"><input id="q" name="q"><button id="go" type="submit">Search</button></form>' +
        '<button id="promo">Deal of the day</button>',
    });
    place(byId(surface, "q"), 10, 100, 300, 40);
    place(byId(surface, "go"), 320, 100, 100, 40);
    const submitted: string[] = [];
    byId(surface, "search-form").addEventListener("submit", (e) => {
      e.preventDefault();
      submitted.push(valueOf(surface, "q"));
    });
    const { gateway, state, events, resolver } = setup({ surface });
    gateway.add(computerCallResponse("resp_0", { type: "click", x: 110, y: 330 }));
    gateway.submitQueue.push(computerCallResponse("resp_1", { type: "wait" }), textResponse("resp_2", "Results."));
    state.lastResponseId = "resp_0";

    await resolver.resolve(createTurnContext("search for usb hub please"));

    expect(submitted).toEqual(["usb hub"]);
    expect(outputsOf(events)).toEqual([
      "Click suppressed: a programmatic interaction just ran on this page.",
      "Waited 1000ms",
    ]);
  });

  it("clicks a quoted target by its visible text", async () => {
    const surface = new FakeSurface({ html: '<div id="row"><button id="signin">Sign in</button></div>' });
    place(byId(surface, "row"), 0, 100, 440, 50);
    place(byId(surface, "signin"), 20, 105, 100, 40);
    const clicks: string[] = [];
    byId(surface, "signin").addEventListener("click", (e) => clicks.push(e.type));
    const { gateway, state, events, resolver } = setup({ surface });
    gateway.add(computerCallResponse("resp_0", { type: "click", x: 300, y: 600 }));
    gateway.submitQueue.push(textResponse("resp_1", "Signed in."));
    state.lastResponseId = "resp_0";

    await resolver.resolve(createTurnContext('click "Sign in"'));

    expect(clicks).toEqual(["click"]);
    expect(outputsOf(events)).toEqual(["Clicked element: BUTTON#signin at (70, 125)"]);
  });

  it("runs the model's click as issued in strict mode", async () => {
    const surface = new FakeSurface({ html: '<div id="row"><button id="signin">Sign in</button></div>' });
    place(byId(surface, "row"), 0, 100, 440, 50);
    place(byId(surface, "signin"), 20, 105, 100, 40);
    const clicks: string[] = [];
    byId(surface, "signin").addEventListener("click", (e) => clicks.push(e.type));
    const { gateway, state, events, resolver } = setup({ surface, settings: { strict: true } });
    gateway.add(computerCallResponse("resp_0", { type: "click", x: 300, y: 600 }));
    gateway.submitQueue.push(textResponse("resp_1", "Nothing there."));
    state.lastResponseId = "resp_0";

    await resolver.resolve(createTurnContext('click "Sign in"'));

    expect(clicks).toEqual([]);
    expect(outputsOf(events)).toEqual(["No element found at point (300, 600)."]);
  });

  it("navigates a blank surface to the requested site before a click", async () => {
    const surface = new FakeSurface({ url: null });
    const { gateway, state, resolver } = setup({ surface });
    gateway.add(computerCallResponse("resp_0", { type: "click", x: 20, y: 300 }));
    gateway.submitQueue.push(textResponse("resp_1", "Opened."));
    state.lastResponseId = "resp_0";

    await resolver.resolve(createTurnContext("go to shop.test and click the first deal"));

    expect(surface.navigations).toEqual(["https://shop.test/"]);
  });

  it("gives a bare screenshot the url the user asked for", async () => {
    const surface = new FakeSurface({ url: null });
    const { gateway, state, resolver } = setup({ surface });
    gateway.add(computerCallResponse("resp_0", { type: "screenshot" }));
    gateway.submitQueue.push(textResponse("resp_1", "Here is example.com."));
    state.lastResponseId = "resp_0";

    await resolver.resolve(createTurnContext("open example.com"));

    expect(surface.navigations).toEqual(["https://example.com/"]);
    expect(gateway.submissions[0]?.output.current_url).toBe("https://example.com/");
  });
});
