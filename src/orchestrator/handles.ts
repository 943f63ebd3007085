import type { Message, MessageBroker, MessageStream } from "../broker/messageBroker.js";
import type { ContextValue, ContextWatchStream, SharedContextManager } from "../context/sharedContext.js";
import { AgentHandleClosedError } from "./errors.js";

/** Shared context as seen by one agent; writes carry the agent's name. */
export interface AgentContextHandle {
  get(path: string): ContextValue | undefined;
  has(prefix: string): boolean;
  getSubtree(prefix: string): Record<string, ContextValue>;
  set(path: string, value: ContextValue): number;
  watch(prefix: string): ContextWatchStream;
}

/** Broker as seen by one agent; messages carry the agent's name as sender. */
export interface AgentBrokerHandle {
  publish<TPayload>(topic: string, payload: TPayload, recipient?: string | null): Message<TPayload>;
  reply<TPayload>(message: Message, payload: TPayload): Message<TPayload>;
  /**
   * Subscribes to the given topic patterns. The stream also receives every
   * point-to-point message addressed to the agent.
   */
  subscribe(topics?: string | readonly string[]): MessageStream;
}

/**
 * Binds the shared services of a run to one agent and tracks the streams it
 * opens, so they can all be released when the agent finishes. Once closed,
 * writes and publishes throw {@link AgentHandleClosedError}; reads still work.
 */
export class AgentHandles {
  readonly context: AgentContextHandle;
  readonly broker: AgentBrokerHandle;
  private readonly streams = new Set<{ close(): void }>();
  private closed = false;

  constructor(
    readonly agentName: string,
    context: SharedContextManager,
    broker: MessageBroker,
  ) {
    this.context = {
      get: (path) => context.get(path),
      has: (prefix) => context.has(prefix),
      getSubtree: (prefix) => context.getSubtree(prefix),
      set: (path, value) => {
        this.ensureOpen("write to the shared context");
        return context.set(path, value, agentName);
      },
      watch: (prefix) => this.track(context.watch(prefix)),
    };
    this.broker = {
      publish: (topic, payload, recipient) => {
        this.ensureOpen("publish");
        return broker.publish(topic, payload, agentName, recipient);
      },
      reply: (message, payload) => {
        this.ensureOpen("reply");
        return broker.reply(message, payload, agentName);
      },
      subscribe: (topics) =>
        this.track(
          broker.subscribe({
            topics: typeof topics === "string" ? [topics] : topics ?? [],
            recipient: agentName,
          }),
        ),
    };
  }

  /** Number of streams the agent still holds open. */
  get openStreams(): number {
    return this.streams.size;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const stream of this.streams) {
      stream.close();
    }
    this.streams.clear();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private ensureOpen(operation: string): void {
    if (this.closed) {
      throw new AgentHandleClosedError(this.agentName, operation);
    }
  }

  private track<TStream extends { close(): void }>(stream: TStream): TStream {
    if (this.closed) {
      stream.close();
      return stream;
    }
    this.streams.add(stream);
    return stream;
  }
}
