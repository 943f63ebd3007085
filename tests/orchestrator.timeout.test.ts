import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { AgentHandleClosedError, TaskTimeoutError } from "../src/orchestrator/errors.js";
import { untilAborted } from "./helpers/async.js";
import { createOrchestrator, ok } from "./helpers/orchestrator.js";

describe("orchestrator task deadlines", () => {
  let clock: sinon.SinonFakeTimers;

  beforeEach(() => {
    clock = sinon.useFakeTimers();
  });

  afterEach(() => {
    clock.restore();
    sinon.restore();
  });

  it("fails a task that exceeds its own deadline and aborts its signal", async () => {
    const { orchestrator } = createOrchestrator();
    const reasons: unknown[] = [];
    orchestrator.register({
      name: "slow",
      timeoutMs: 50,
      task: async ({ signal }) => {
        reasons.push(await untilAborted(signal));
        return ok();
      },
    });
    orchestrator.register({ name: "report", predecessors: ["slow"], task: () => ok() });

    const handle = orchestrator.start();
    await clock.tickAsync(49);
    expect(handle.snapshot().agents.slow.state).to.equal("running");

    await clock.tickAsync(1);
    const result = await handle.result;

    expect(result.failed).to.deep.equal([{ agent: "slow", error: "agent 'slow' timed out after 50ms" }]);
    expect(result.skipped).to.deep.equal([{ agent: "report", reason: "predecessor 'slow' failed" }]);
    await orchestrator.drain();
    expect(reasons).to.have.length(1);
    expect(reasons[0]).to.be.instanceOf(TaskTimeoutError);
  });

  it("applies the configured default deadline", async () => {
    const { orchestrator } = createOrchestrator({ taskTimeoutMs: 30 });
    orchestrator.register({
      name: "slow",
      task: async ({ signal }) => {
        await untilAborted(signal);
        return ok();
      },
    });
    orchestrator.register({ name: "quick", task: () => ok() });

    const handle = orchestrator.start();
    await clock.tickAsync(30);
    const result = await handle.result;

    expect(result.failed).to.deep.equal([{ agent: "slow", error: "agent 'slow' timed out after 30ms" }]);
    expect(result.succeeded).to.deep.equal(["quick"]);
  });

  it("rejects writes and publishes a timed-out task makes afterwards", async () => {
    const { orchestrator } = createOrchestrator();
    const late: unknown[] = [];
    const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
    orchestrator.register({
      name: "clone",
      timeoutMs: 10,
      task: async ({ context, broker }) => {
        await sleep(20);
        try {
          context.set("repo/files", ["a.ts"]);
        } catch (error) {
          late.push(error);
        }
        try {
          broker.publish("progress", { cloned: true });
        } catch (error) {
          late.push(error);
        }
        return ok();
      },
    });
    orchestrator.register({
      name: "keepalive",
      task: async () => {
        await sleep(30);
        return ok();
      },
    });
    orchestrator.register({ name: "scan", readDependencies: ["repo/files"], task: () => ok() });

    const handle = orchestrator.start();
    await clock.tickAsync(40);
    const result = await handle.result;

    expect(result.failed).to.deep.equal([{ agent: "clone", error: "agent 'clone' timed out after 10ms" }]);
    expect(result.succeeded).to.deep.equal(["keepalive"]);
    expect(result.skipped).to.deep.equal([
      { agent: "scan", reason: "context dependency 'repo/files' was never populated" },
    ]);
    expect(result.executionOrder).to.deep.equal(["clone", "keepalive"]);
    expect(orchestrator.sharedContext.get("repo/files")).to.equal(undefined);
    expect(orchestrator.messageBroker.list({ topic: "progress" })).to.deep.equal([]);

    expect(late).to.have.length(2);
    expect(late.every((error) => error instanceof AgentHandleClosedError)).to.equal(true);
    expect(late.map((error) => (error instanceof Error ? error.message : error))).to.deep.equal([
      "agent 'clone' cannot write to the shared context after its task was released",
      "agent 'clone' cannot publish after its task was released",
    ]);
  });

  it("clears the deadline of tasks that finish in time", async () => {
    const { orchestrator } = createOrchestrator({ taskTimeoutMs: 1_000 });
    orchestrator.register({ name: "quick", task: () => ok() });

    const result = await orchestrator.run();

    expect(result.status).to.equal("succeeded");
    expect(clock.countTimers()).to.equal(0);
  });
});
