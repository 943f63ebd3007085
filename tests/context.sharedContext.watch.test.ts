import { describe, it } from "mocha";
import { expect } from "chai";

import { SharedContextManager, type ContextChange } from "../src/context/sharedContext.js";
import { pull } from "./helpers/async.js";

/**
 * Watch streams are pull based: changes queue per path until the consumer asks
 * for them, so the assertions below interleave writes and pulls explicitly.
 */
describe("shared context watch streams", () => {
  it("delivers writes made after the watch was opened", async () => {
    const context = new SharedContextManager();
    const stream = context.watch("repo");

    context.set("repo/files", ["a.ts"], "cloner");

    expect(await pull(stream)).to.deep.equal({
      path: "repo/files",
      value: ["a.ts"],
      version: 1,
      revision: 1,
      writer: "cloner",
    });
  });

  it("resolves a pending pull as soon as a matching write commits", async () => {
    const context = new SharedContextManager();
    const stream = context.watch("repo");
    const next = pull(stream);

    context.set("repository/name", "ignored", "cloner");
    context.set("repo/files", ["a.ts"], "cloner");

    expect((await next).path).to.equal("repo/files");
    expect(stream.backlog).to.equal(0);
  });

  it("coalesces pending writes per path and keeps the latest version", async () => {
    const context = new SharedContextManager();
    const stream = context.watch("");

    context.set("a", 1, "w");
    context.set("a", 2, "w");
    context.set("b", 1, "w");
    context.set("a", 3, "w");
    expect(stream.backlog).to.equal(2);

    const first = await pull(stream);
    const second = await pull(stream);
    expect([first.path, first.version]).to.deep.equal(["b", 1]);
    expect([second.path, second.value, second.version]).to.deep.equal(["a", 3, 3]);
  });

  it("replays the latest value of existing paths in commit order", async () => {
    const context = new SharedContextManager();
    context.set("repo/a", "old", "w");
    context.set("repo/b", "only", "w");
    context.set("repo/a", "new", "w");
    context.set("other/c", "skip", "w");

    const stream = context.watch("repo");
    const replayed: ContextChange[] = [await pull(stream), await pull(stream)];

    expect(replayed.map((change) => [change.path, change.value, change.version])).to.deep.equal([
      ["repo/b", "only", 1],
      ["repo/a", "new", 2],
    ]);
    expect(stream.backlog).to.equal(0);
  });

  it("gives every watch an independent subscription", async () => {
    const context = new SharedContextManager();
    const first = context.watch("repo");
    const second = context.watch("repo/files");

    context.set("repo/files", ["a.ts"], "cloner");

    expect((await pull(first)).path).to.equal("repo/files");
    expect((await pull(second)).path).to.equal("repo/files");
    expect(context.watcherCount).to.equal(2);
  });

  it("stops yielding once closed and settles a pending pull", async () => {
    const context = new SharedContextManager();
    const stream = context.watch("repo");
    const pending = stream.next();

    stream.close();
    context.set("repo/files", ["late"], "cloner");

    expect((await pending).done).to.equal(true);
    expect((await stream.next()).done).to.equal(true);
    expect(context.watcherCount).to.equal(0);
  });

  it("unsubscribes when a for-await loop exits early", async () => {
    const context = new SharedContextManager();
    context.set("repo/a", 1, "w");
    context.set("repo/b", 2, "w");
    const stream = context.watch("repo");

    const seen: string[] = [];
    for await (const change of stream) {
      seen.push(change.path);
      break;
    }

    expect(seen).to.deep.equal(["repo/a"]);
    expect(stream.isClosed).to.equal(true);
    expect(context.watcherCount).to.equal(0);
  });

  it("ends every stream when the store closes", async () => {
    const context = new SharedContextManager();
    const stream = context.watch("repo");
    const pending = stream.next();

    context.close();

    expect((await pending).done).to.equal(true);
    expect(context.watcherCount).to.equal(0);
  });
});
