import { describe, it } from "mocha";
import { expect } from "chai";

import {
  BrokerShutdownError,
  MessageBroker,
  TopicError,
  topicMatches,
} from "../src/broker/messageBroker.js";
import { createCapturingLogger } from "./helpers/logger.js";
import { pull } from "./helpers/async.js";

function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `msg-${next}`;
  };
}

describe("message broker", () => {
  it("broadcasts to every subscriber of the topic", async () => {
    const broker = new MessageBroker({ now: () => 42, idFactory: sequentialIds() });
    const first = broker.subscribe({ topics: ["scan/findings"] });
    const second = broker.subscribe({ topics: ["scan/findings"] });

    broker.publish("scan/findings", { count: 3 }, "security_analyst");

    const expected = {
      id: "msg-1",
      seq: 1,
      topic: "scan/findings",
      sender: "security_analyst",
      recipient: null,
      replyTo: null,
      payload: { count: 3 },
      timestamp: 42,
    };
    expect(await pull(first)).to.deep.equal(expected);
    expect(await pull(second)).to.deep.equal(expected);
    expect(broker.stats()).to.deep.equal({ published: 1, delivered: 2, dropped: 0, subscribers: 2 });
  });

  it("preserves the publish order of a sender", async () => {
    const broker = new MessageBroker();
    const stream = broker.subscribe({ topics: ["progress"] });

    broker.publish("progress", 1, "cloner");
    broker.publish("progress", 2, "cloner");
    broker.publish("progress", 3, "cloner");

    const payloads = [await pull(stream), await pull(stream), await pull(stream)].map((m) => m.payload);
    expect(payloads).to.deep.equal([1, 2, 3]);
  });

  it("delivers point-to-point messages only to the named recipient", async () => {
    const broker = new MessageBroker();
    const reporter = broker.subscribe({ recipient: "reporter" });
    const bystander = broker.subscribe({ topics: ["findings"] });

    const sent = broker.publish("findings", { severity: "high" }, "security_analyst", "reporter");

    const received = await pull(reporter);
    expect(received.id).to.equal(sent.id);
    expect(received.recipient).to.equal("reporter");
    expect(broker.stats().delivered).to.equal(1);

    broker.publish("findings", "broadcast", "security_analyst");
    expect((await pull(bystander)).payload).to.equal("broadcast");
  });

  it("drops point-to-point messages nobody is registered for", () => {
    const { logger, entries } = createCapturingLogger();
    const broker = new MessageBroker({ logger });

    const message = broker.publish("findings", {}, "security_analyst", "nobody");

    expect(message.recipient).to.equal("nobody");
    expect(broker.stats().dropped).to.equal(1);
    expect(entries.map((entry) => entry.message)).to.deep.equal(["broker_message_dropped"]);
  });

  it("registers a plain string subscription as topic and recipient", async () => {
    const broker = new MessageBroker();
    const stream = broker.subscribe("reporter");

    broker.publish("reporter", "topic broadcast", "orchestrator");
    broker.publish("elsewhere", "direct", "code_reviewer", "reporter");

    expect((await pull(stream)).payload).to.equal("topic broadcast");
    expect((await pull(stream)).payload).to.equal("direct");
  });

  it("links replies to the request they answer", async () => {
    const broker = new MessageBroker({ idFactory: sequentialIds() });
    const requester = broker.subscribe({ recipient: "reporter" });
    const responder = broker.subscribe({ recipient: "code_reviewer" });

    broker.publish("review/request", { file: "a.ts" }, "reporter", "code_reviewer");
    const request = await pull(responder);
    broker.reply(request, { issues: 0 }, "code_reviewer");

    const reply = await pull(requester);
    expect(reply).to.include({ topic: "review/request", sender: "code_reviewer", recipient: "reporter", replyTo: "msg-1" });
    expect(reply.payload).to.deep.equal({ issues: 0 });
  });

  it("matches single-segment and trailing wildcards", async () => {
    expect(topicMatches(["agent", "*", "status"], ["agent", "scan", "status"])).to.equal(true);
    expect(topicMatches(["agent", "*", "status"], ["agent", "scan", "x", "status"])).to.equal(false);
    expect(topicMatches(["agent", "**"], ["agent"])).to.equal(true);
    expect(topicMatches(["agent", "**"], ["agent", "scan", "status"])).to.equal(true);
    expect(topicMatches(["agent"], ["agent", "scan"])).to.equal(false);

    const broker = new MessageBroker();
    const stream = broker.subscribe({ topics: ["agent/*/status"] });
    broker.publish("agent/scan/progress", 1, "orchestrator");
    broker.publish("agent/scan/status", 2, "orchestrator");
    expect((await pull(stream)).topic).to.equal("agent/scan/status");
  });

  it("rejects wildcards on publish and malformed subscriptions", () => {
    const broker = new MessageBroker();
    expect(() => broker.publish("agent/*", {}, "x")).to.throw(TopicError, "only allowed in subscriptions");
    expect(() => broker.subscribe({ topics: ["**/status"] })).to.throw(TopicError, "must be the last segment");
    expect(() => broker.subscribe({})).to.throw(TopicError, "at least one topic or a recipient");
  });

  it("evicts the oldest buffered message when a subscriber falls behind", async () => {
    const broker = new MessageBroker({ streamBufferSize: 2 });
    const stream = broker.subscribe({ topics: ["progress"] });

    broker.publish("progress", 1, "cloner");
    broker.publish("progress", 2, "cloner");
    broker.publish("progress", 3, "cloner");

    expect(stream.dropped).to.equal(1);
    expect(broker.stats().dropped).to.equal(1);
    expect([(await pull(stream)).payload, (await pull(stream)).payload]).to.deep.equal([2, 3]);
  });

  it("filters retained history", () => {
    const broker = new MessageBroker({ historyLimit: 3 });
    broker.publish("a", 1, "cloner");
    broker.publish("b", 2, "cloner");
    broker.publish("a", 3, "reviewer");
    broker.publish("a", 4, "cloner", "reporter");

    expect(broker.list().map((m) => m.seq)).to.deep.equal([2, 3, 4]);
    expect(broker.list({ topic: "a" }).map((m) => m.payload)).to.deep.equal([3, 4]);
    expect(broker.list({ sender: "cloner" }).map((m) => m.payload)).to.deep.equal([2, 4]);
    expect(broker.list({ recipient: "reporter" }).map((m) => m.seq)).to.deep.equal([4]);
    expect(broker.list({ afterSeq: 3 }).map((m) => m.seq)).to.deep.equal([4]);
    expect(broker.list({ limit: 1 }).map((m) => m.seq)).to.deep.equal([4]);
  });

  it("closes subscriptions and rejects publishes after shutdown", async () => {
    const broker = new MessageBroker();
    const stream = broker.subscribe({ topics: ["progress"] });
    const pending = stream.next();

    broker.shutdown();

    expect((await pending).done).to.equal(true);
    expect(broker.isShutDown).to.equal(true);
    expect(() => broker.publish("progress", 1, "cloner")).to.throw(BrokerShutdownError);
    expect(broker.subscribe({ topics: ["progress"] }).isClosed).to.equal(true);
    expect(broker.stats().subscribers).to.equal(0);
  });
});
