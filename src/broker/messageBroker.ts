import { randomUUID } from "node:crypto";

import type { StructuredLogger } from "../logger.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Envelope delivered to subscribers. */
export interface Message<TPayload = unknown> {
  id: string;
  /** Broker-wide publish sequence. */
  seq: number;
  topic: string;
  sender: string;
  /** Addressee of a point-to-point message, `null` for topic broadcasts. */
  recipient: string | null;
  /** Identifier of the message this one answers, if any. */
  replyTo: string | null;
  payload: TPayload;
  timestamp: number;
}

/** Options accepted by {@link MessageBroker.subscribe}. */
export interface SubscriptionOptions {
  /** Topic patterns; `*` matches one segment, a trailing `**` any remainder. */
  topics?: readonly string[] | undefined;
  /** Name under which point-to-point messages are received. */
  recipient?: string | null | undefined;
}

export interface PublishOptions {
  replyTo?: string | null | undefined;
}

/** Filters accepted by {@link MessageBroker.list}. */
export interface MessageFilter {
  topic?: string;
  sender?: string;
  recipient?: string;
  afterSeq?: number;
  limit?: number;
}

export interface MessageBrokerOptions {
  historyLimit?: number;
  streamBufferSize?: number;
  now?: () => number;
  logger?: StructuredLogger;
  idFactory?: () => string;
}

export interface BrokerStats {
  published: number;
  delivered: number;
  /** Point-to-point messages without a subscriber plus stream overflow evictions. */
  dropped: number;
  subscribers: number;
}

/** Raised by {@link MessageBroker.publish} once the broker has been shut down. */
export class BrokerShutdownError extends Error {
  public readonly code = "E-BROKER-SHUTDOWN";
  public readonly details: { topic: string; sender: string };

  constructor(topic: string, sender: string) {
    super(`message broker is shut down; "${sender}" cannot publish on "${topic}"`);
    this.name = "BrokerShutdownError";
    this.details = { topic, sender };
  }
}

/** Raised when a topic or subscription target is malformed. */
export class TopicError extends Error {
  public readonly code = "E-BROKER-TOPIC";
  public readonly details: { topic: string };

  constructor(topic: string, message: string) {
    super(message);
    this.name = "TopicError";
    this.details = { topic };
  }
}

const DEFAULT_HISTORY_LIMIT = 1_000;
const DEFAULT_STREAM_BUFFER = 256;

const DONE: IteratorReturnResult<void> = Object.freeze({ value: undefined, done: true as const });

function splitTopic(topic: string): string[] {
  return topic
    .split("/")
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

function normaliseTopic(topic: string): string {
  const segments = splitTopic(topic);
  if (segments.length === 0) {
    throw new TopicError(topic, "topic must contain at least one segment");
  }
  if (segments.some((segment) => segment === "*" || segment === "**")) {
    throw new TopicError(topic, `wildcards are only allowed in subscriptions: "${topic}"`);
  }
  return segments.join("/");
}

function compilePattern(pattern: string): string[] {
  const segments = splitTopic(pattern);
  if (segments.length === 0) {
    throw new TopicError(pattern, "topic pattern must contain at least one segment");
  }
  const globstar = segments.indexOf("**");
  if (globstar >= 0 && globstar !== segments.length - 1) {
    throw new TopicError(pattern, `"**" must be the last segment of "${pattern}"`);
  }
  return segments;
}

/** Matches a published topic against a compiled subscription pattern. */
export function topicMatches(pattern: readonly string[], topic: readonly string[]): boolean {
  for (let index = 0; index < pattern.length; index += 1) {
    const segment = pattern[index];
    if (segment === "**") {
      return true;
    }
    if (index >= topic.length) {
      return false;
    }
    if (segment !== "*" && segment !== topic[index]) {
      return false;
    }
  }
  return pattern.length === topic.length;
}

/**
 * Subscription returned by {@link MessageBroker.subscribe}. Messages are
 * buffered in arrival order until pulled; when the buffer is full the oldest
 * undelivered message is evicted.
 */
export class MessageStream
  implements AsyncIterable<Message>, AsyncIterator<Message, void, void>
{
  private readonly buffer: Message[] = [];
  private resolve: ((result: IteratorResult<Message, void>) => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly patterns: ReadonlyArray<readonly string[]>,
    readonly recipient: string | null,
    private readonly maxBuffer: number,
    private readonly detach: (stream: MessageStream) => void,
  ) {}

  [Symbol.asyncIterator](): AsyncIterator<Message, void, void> {
    return this;
  }

  async next(): Promise<IteratorResult<Message, void>> {
    const head = this.buffer.shift();
    if (head) {
      return { value: head, done: false };
    }
    if (this.closed) {
      return DONE;
    }
    return new Promise((resolve) => {
      this.resolve = resolve;
    });
  }

  async return(): Promise<IteratorResult<Message, void>> {
    this.close();
    return DONE;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.buffer.length = 0;
    this.detach(this);
    const resolve = this.resolve;
    this.resolve = null;
    resolve?.(DONE);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Messages evicted from this stream because its buffer was full. */
  get dropped(): number {
    return this.droppedCount;
  }

  /** @internal */
  accepts(message: Message, topicSegments: readonly string[]): boolean {
    if (message.recipient !== null) {
      return this.recipient === message.recipient;
    }
    return this.patterns.some((pattern) => topicMatches(pattern, topicSegments));
  }

  /**
   * @internal Queues the message; returns `false` when the buffer overflowed
   * and the oldest pending message was evicted.
   */
  deliver(message: Message): boolean {
    if (this.closed) {
      return true;
    }
    const resolve = this.resolve;
    if (resolve) {
      this.resolve = null;
      resolve({ value: message, done: false });
      return true;
    }
    this.buffer.push(message);
    if (this.buffer.length > this.maxBuffer) {
      this.buffer.shift();
      this.droppedCount += 1;
      return false;
    }
    return true;
  }
}

/**
 * In-process publish/subscribe bus. Fan-out happens synchronously inside
 * {@link publish}, so every subscriber sees the messages of a sender in
 * publish order. Delivery is best-effort: nothing is persisted for
 * subscribers that register later.
 */
export class MessageBroker {
  private readonly streams = new Set<MessageStream>();
  private readonly history: Message[] = [];
  private readonly historyLimit: number;
  private readonly streamBufferSize: number;
  private readonly now: () => number;
  private readonly logger: StructuredLogger | null;
  private readonly idFactory: () => string;
  private seq = 0;
  private shutDown = false;
  private readonly counters = { published: 0, delivered: 0, dropped: 0 };

  constructor(options: MessageBrokerOptions = {}) {
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.streamBufferSize = Math.max(1, options.streamBufferSize ?? DEFAULT_STREAM_BUFFER);
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? null;
    this.idFactory = options.idFactory ?? (() => randomUUID());
  }

  /**
   * Publishes a broadcast on `topic`, or a point-to-point message when
   * `recipient` is given. A point-to-point message nobody is registered for
   * is dropped without error.
   */
  publish<TPayload>(
    topic: string,
    payload: TPayload,
    sender: string,
    recipient?: string | null,
    options: PublishOptions = {},
  ): Message<TPayload> {
    if (this.shutDown) {
      throw new BrokerShutdownError(topic, sender);
    }
    const canonical = normaliseTopic(topic);
    const message: Message<TPayload> = {
      id: this.idFactory(),
      seq: ++this.seq,
      topic: canonical,
      sender,
      recipient: recipient ?? null,
      replyTo: options.replyTo ?? null,
      payload,
      timestamp: this.now(),
    };

    this.history.push(message);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
    this.counters.published += 1;

    const topicSegments = canonical.split("/");
    let deliveries = 0;
    for (const stream of [...this.streams]) {
      if (!stream.accepts(message, topicSegments)) {
        continue;
      }
      deliveries += 1;
      if (!stream.deliver(message)) {
        this.counters.dropped += 1;
        this.logger?.warn("broker_stream_overflow", { topic: canonical, recipient: stream.recipient });
      }
    }
    this.counters.delivered += deliveries;

    if (message.recipient !== null && deliveries === 0) {
      this.counters.dropped += 1;
      this.logger?.debug("broker_message_dropped", {
        topic: canonical,
        sender,
        recipient: message.recipient,
      });
    }
    return message;
  }

  /** Answers `message` point-to-point on the same topic, linking `replyTo`. */
  reply<TPayload>(message: Message, payload: TPayload, sender: string): Message<TPayload> {
    return this.publish(message.topic, payload, sender, message.sender, { replyTo: message.id });
  }

  /**
   * Opens a subscription. A plain string subscribes to that topic and also
   * registers the subscriber under that name for point-to-point messages.
   */
  subscribe(target: string | SubscriptionOptions): MessageStream {
    const options: SubscriptionOptions =
      typeof target === "string" ? { topics: [target], recipient: target.trim() } : target;
    const patterns = (options.topics ?? []).map(compilePattern);
    const recipient = options.recipient?.trim() || null;
    if (patterns.length === 0 && recipient === null) {
      throw new TopicError("", "a subscription needs at least one topic or a recipient name");
    }

    const stream = new MessageStream(patterns, recipient, this.streamBufferSize, (closed) => {
      this.streams.delete(closed);
    });
    if (this.shutDown) {
      stream.close();
      return stream;
    }
    this.streams.add(stream);
    return stream;
  }

  /** Retained messages matching `filter`, oldest first. */
  list(filter: MessageFilter = {}): Message[] {
    const topic = filter.topic !== undefined ? normaliseTopic(filter.topic) : undefined;
    const matches = this.history.filter((message) => {
      if (topic !== undefined && message.topic !== topic) {
        return false;
      }
      if (filter.sender !== undefined && message.sender !== filter.sender) {
        return false;
      }
      if (filter.recipient !== undefined && message.recipient !== filter.recipient) {
        return false;
      }
      if (filter.afterSeq !== undefined && message.seq <= filter.afterSeq) {
        return false;
      }
      return true;
    });
    return filter.limit !== undefined && filter.limit > 0 ? matches.slice(-filter.limit) : matches;
  }

  stats(): BrokerStats {
    return { ...this.counters, subscribers: this.streams.size };
  }

  get isShutDown(): boolean {
    return this.shutDown;
  }

  /** Closes every subscription; later publishes throw {@link BrokerShutdownError}. */
  shutdown(): void {
    if (this.shutDown) {
      return;
    }
    this.shutDown = true;
    for (const stream of [...this.streams]) {
      stream.close();
    }
    this.streams.clear();
  }
}
