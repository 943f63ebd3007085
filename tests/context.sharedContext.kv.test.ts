import { describe, it } from "mocha";
import { expect } from "chai";

import {
  ContextClosedError,
  ContextSnapshotError,
  SharedContextManager,
} from "../src/context/sharedContext.js";

/** Manual clock so `updatedAt` stays deterministic. */
class ManualClock {
  private current = 1_000;

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

describe("shared context key/value operations", () => {
  it("bumps the per-path version on every write and records the writer", () => {
    const clock = new ManualClock();
    const context = new SharedContextManager({ now: () => clock.now() });

    expect(context.set("repo/files", ["a.ts"], "cloner")).to.equal(1);
    clock.advance(5);
    expect(context.set("/repo//files/", ["a.ts", "b.ts"], "cloner")).to.equal(2);

    expect(context.get("repo/files")).to.deep.equal(["a.ts", "b.ts"]);
    expect(context.getEntry("repo/files")).to.deep.equal({
      path: "repo/files",
      segments: ["repo", "files"],
      value: ["a.ts", "b.ts"],
      version: 2,
      revision: 2,
      writer: "cloner",
      updatedAt: 1_005,
    });
  });

  it("returns undefined for absent paths", () => {
    const context = new SharedContextManager();
    expect(context.get("missing")).to.equal(undefined);
    expect(context.getEntry("missing")).to.equal(undefined);
  });

  it("isolates committed values from caller mutations", () => {
    const context = new SharedContextManager();
    const value = { findings: [1] };
    context.set("scan/result", value, "scanner");
    value.findings.push(2);

    const read = context.get("scan/result");
    expect(read).to.deep.equal({ findings: [1] });
    if (read && typeof read === "object" && !Array.isArray(read)) {
      read.extra = true;
    }
    expect(context.get("scan/result")).to.deep.equal({ findings: [1] });
  });

  it("answers subtree queries on segment boundaries", () => {
    const context = new SharedContextManager();
    context.set("repo/files", ["a.ts"], "cloner");
    context.set("repository/name", "other", "cloner");
    context.set("repo", "root", "cloner");

    expect(context.has("repo")).to.equal(true);
    expect(context.has("rep")).to.equal(false);
    expect(context.getSubtree("repo")).to.deep.equal({ "repo/files": ["a.ts"], repo: "root" });
    expect(Object.keys(context.getSubtree(""))).to.deep.equal(["repo/files", "repository/name", "repo"]);
  });

  it("keeps versions monotonic across deletions", () => {
    const context = new SharedContextManager();
    context.set("repo/files", [], "cloner");
    context.set("repo/files", ["a.ts"], "cloner");

    expect(context.delete("repo/files")).to.equal(true);
    expect(context.delete("repo/files")).to.equal(false);
    expect(context.get("repo/files")).to.equal(undefined);
    expect(context.has("repo")).to.equal(false);
    expect(context.set("repo/files", ["b.ts"], "cloner")).to.equal(3);
  });

  it("retains a bounded commit history", () => {
    const context = new SharedContextManager({ historyLimit: 2 });
    context.set("a", 1, "w");
    context.set("b", 2, "w");
    context.set("a", 3, "w");

    expect(context.currentRevision).to.equal(3);
    expect(context.history().map((change) => change.revision)).to.deep.equal([2, 3]);
    expect(context.history(2)).to.deep.equal([{ path: "a", value: 3, version: 2, revision: 3, writer: "w" }]);
  });

  it("rejects writes once closed but keeps reads available", () => {
    const context = new SharedContextManager();
    context.set("report/summary", "done", "reporter");
    context.close();

    expect(context.isClosed).to.equal(true);
    expect(() => context.set("report/summary", "again", "reporter")).to.throw(ContextClosedError);
    expect(() => context.delete("report/summary")).to.throw(ContextClosedError);
    expect(context.get("report/summary")).to.equal("done");
    expect(context.watch("report").isClosed).to.equal(true);
  });

  it("round-trips entries through dump and load", () => {
    const source = new SharedContextManager();
    source.set("repo/files", ["a.ts"], "cloner");
    source.set("scan/score", 7, "scanner");

    expect(JSON.parse(source.dump())).to.deep.equal({
      entries: {
        "repo/files": { value: ["a.ts"], writer: "cloner" },
        "scan/score": { value: 7, writer: "scanner" },
      },
    });

    const target = new SharedContextManager();
    expect(target.load(source.dump())).to.equal(2);
    expect(target.get("repo/files")).to.deep.equal(["a.ts"]);
    expect(target.getEntry("scan/score")?.writer).to.equal("scanner");
  });

  it("rejects malformed snapshots", () => {
    const context = new SharedContextManager();
    expect(() => context.load("{not json")).to.throw(ContextSnapshotError, "not valid JSON");
    expect(() => context.load(JSON.stringify({ entries: { a: { value: 1 } } }))).to.throw(
      ContextSnapshotError,
      "context snapshot is malformed",
    );
    expect(context.currentRevision).to.equal(0);
  });
});
