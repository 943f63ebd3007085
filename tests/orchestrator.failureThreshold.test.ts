import { describe, it } from "mocha";
import { expect } from "chai";

import { createOrchestrator, fail, ok } from "./helpers/orchestrator.js";

describe("orchestrator failure threshold", () => {
  it("skips remaining agents once the threshold is reached", async () => {
    const { orchestrator, entries } = createOrchestrator({ maxConcurrency: 1, maxFailures: 1 });
    orchestrator.register({ name: "security", task: () => fail("model unavailable") });
    orchestrator.register({ name: "review", task: () => ok() });
    orchestrator.register({ name: "report", predecessors: ["review"], task: () => ok() });

    const result = await orchestrator.run();

    expect(result.status).to.equal("failed");
    expect(result.reason).to.equal("failure_threshold");
    expect(result.executionOrder).to.deep.equal(["security"]);
    expect(result.skipped).to.deep.equal([
      { agent: "review", reason: "failure threshold reached" },
      { agent: "report", reason: "failure threshold reached" },
    ]);
    expect(entries.some((entry) => entry.message === "failure_threshold_reached")).to.equal(true);
  });

  it("keeps going while failures stay below the threshold", async () => {
    const { orchestrator } = createOrchestrator({ maxConcurrency: 1, maxFailures: 2 });
    orchestrator.register({ name: "security", task: () => fail("model unavailable") });
    orchestrator.register({ name: "review", task: () => ok() });

    const result = await orchestrator.run();

    expect(result.reason).to.equal("agent_failures");
    expect(result.succeeded).to.deep.equal(["review"]);
  });
});
