import { z } from "zod";

import {
  isWithinPrefix,
  normaliseContextPath,
  normaliseContextPrefix,
} from "./paths.js";

/** JSON-compatible payload stored in the shared context. */
export type ContextValue =
  | null
  | boolean
  | number
  | string
  | ContextValue[]
  | { [key: string]: ContextValue };

export const ContextValueSchema: z.ZodType<ContextValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(ContextValueSchema),
    z.record(ContextValueSchema),
  ]),
);

/** Snapshot of a committed entry. */
export interface ContextEntry {
  path: string;
  segments: string[];
  value: ContextValue;
  /** Per-path counter, bumped on every write to the path. */
  version: number;
  /** Store-wide commit sequence. */
  revision: number;
  writer: string;
  updatedAt: number;
}

/** Item yielded by {@link ContextWatchStream}. */
export interface ContextChange {
  path: string;
  value: ContextValue;
  version: number;
  revision: number;
  writer: string;
}

export interface SharedContextOptions {
  /** Clock used for `updatedAt`. Defaults to {@link Date.now}. */
  now?: (() => number) | undefined;
  /** Number of commits retained by {@link SharedContextManager.history}. */
  historyLimit?: number | undefined;
}

/** Raised when writing to a store that was closed at the end of its run. */
export class ContextClosedError extends Error {
  public readonly code = "E-CONTEXT-CLOSED";
  public readonly details: { path: string };

  constructor(path: string) {
    super(`shared context is closed; write to "${path}" rejected`);
    this.name = "ContextClosedError";
    this.details = { path };
  }
}

/** Raised when {@link SharedContextManager.load} receives a malformed snapshot. */
export class ContextSnapshotError extends Error {
  public readonly code = "E-CONTEXT-SNAPSHOT";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ContextSnapshotError";
  }
}

const SnapshotSchema = z.object({
  entries: z.record(z.object({ value: ContextValueSchema, writer: z.string().min(1) })),
});

const DONE: IteratorReturnResult<void> = Object.freeze({ value: undefined, done: true as const });

/**
 * Pull-based subscription over every write under a prefix. Undelivered
 * changes are kept per path: when the consumer lags, a newer write to the
 * same path replaces the pending one, so the consumer always receives the
 * latest value and versions never go backwards for a path.
 */
export class ContextWatchStream
  implements AsyncIterable<ContextChange>, AsyncIterator<ContextChange, void, void>
{
  private readonly pending = new Map<string, ContextChange>();
  private resolve: ((result: IteratorResult<ContextChange, void>) => void) | null = null;
  private closed = false;

  constructor(
    readonly prefix: string,
    private readonly detach: (stream: ContextWatchStream) => void,
  ) {}

  [Symbol.asyncIterator](): AsyncIterator<ContextChange, void, void> {
    return this;
  }

  async next(): Promise<IteratorResult<ContextChange, void>> {
    const first = this.pending.entries().next();
    if (!first.done) {
      const [path, change] = first.value;
      this.pending.delete(path);
      return { value: change, done: false };
    }
    if (this.closed) {
      return DONE;
    }
    return new Promise((resolve) => {
      this.resolve = resolve;
    });
  }

  async return(): Promise<IteratorResult<ContextChange, void>> {
    this.close();
    return DONE;
  }

  /** Stops the subscription. No change is yielded once this returns. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pending.clear();
    this.detach(this);
    const resolve = this.resolve;
    this.resolve = null;
    resolve?.(DONE);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of coalesced changes waiting to be pulled. */
  get backlog(): number {
    return this.pending.size;
  }

  /** @internal Called by the store for every matching commit. */
  offer(change: ContextChange): void {
    if (this.closed) {
      return;
    }
    const resolve = this.resolve;
    if (resolve) {
      this.resolve = null;
      resolve({ value: change, done: false });
      return;
    }
    // Re-inserting moves the path behind newer commits of other paths.
    this.pending.delete(change.path);
    this.pending.set(change.path, change);
  }
}

interface StoredEntry {
  path: string;
  segments: string[];
  value: ContextValue;
  version: number;
  revision: number;
  writer: string;
  updatedAt: number;
}

/**
 * Hierarchical key/value store shared by the agents of a run. Paths are
 * slash-delimited; subtree reads and watches operate on segment prefixes.
 * Mutations are synchronous critical sections: a write is fully committed
 * (value, version, watch fan-out) before any other code observes the store.
 */
export class SharedContextManager {
  private readonly entries = new Map<string, StoredEntry>();
  /** Last version per path, kept across deletions so versions stay monotonic. */
  private readonly versions = new Map<string, number>();
  private readonly watchers = new Set<ContextWatchStream>();
  private readonly commits: ContextChange[] = [];
  private readonly now: () => number;
  private readonly historyLimit: number;
  private revision = 0;
  private closed = false;

  constructor(options: SharedContextOptions = {}) {
    this.now = options.now ?? (() => Date.now());
    this.historyLimit = Math.max(1, options.historyLimit ?? 1_000);
  }

  /** Commits `value` at `path` (last writer wins) and returns the new per-path version. */
  set(path: string, value: ContextValue, writer: string): number {
    const key = normaliseContextPath(path);
    if (this.closed) {
      throw new ContextClosedError(key);
    }
    const version = (this.versions.get(key) ?? 0) + 1;
    const revision = ++this.revision;
    const entry: StoredEntry = {
      path: key,
      segments: key.split("/"),
      value: structuredClone(value),
      version,
      revision,
      writer,
      updatedAt: this.now(),
    };
    this.entries.set(key, entry);
    this.versions.set(key, version);

    this.commits.push(this.toChange(entry));
    if (this.commits.length > this.historyLimit) {
      this.commits.splice(0, this.commits.length - this.historyLimit);
    }
    for (const watcher of this.watchers) {
      if (isWithinPrefix(key, watcher.prefix)) {
        watcher.offer(this.toChange(entry));
      }
    }
    return version;
  }

  /** Latest committed value, or `undefined` when the path holds no entry. */
  get(path: string): ContextValue | undefined {
    const entry = this.entries.get(normaliseContextPath(path));
    return entry ? structuredClone(entry.value) : undefined;
  }

  getEntry(path: string): ContextEntry | undefined {
    const entry = this.entries.get(normaliseContextPath(path));
    if (!entry) {
      return undefined;
    }
    return { ...entry, segments: [...entry.segments], value: structuredClone(entry.value) };
  }

  /** Whether at least one entry exists at or below `prefix`. */
  has(prefix: string): boolean {
    const key = normaliseContextPrefix(prefix);
    if (this.entries.has(key)) {
      return true;
    }
    for (const path of this.entries.keys()) {
      if (isWithinPrefix(path, key)) {
        return true;
      }
    }
    return false;
  }

  /** Every entry at or below `prefix`, keyed by canonical path. */
  getSubtree(prefix: string): Record<string, ContextValue> {
    const key = normaliseContextPrefix(prefix);
    const subtree: Record<string, ContextValue> = {};
    for (const entry of this.sortedEntries()) {
      if (isWithinPrefix(entry.path, key)) {
        subtree[entry.path] = structuredClone(entry.value);
      }
    }
    return subtree;
  }

  /**
   * Opens an independent subscription on `prefix`. The latest value of every
   * existing path under the prefix is replayed first, in commit order.
   */
  watch(prefix: string): ContextWatchStream {
    const key = normaliseContextPrefix(prefix);
    const stream = new ContextWatchStream(key, (closed) => {
      this.watchers.delete(closed);
    });
    if (this.closed) {
      stream.close();
      return stream;
    }
    for (const entry of this.sortedEntries()) {
      if (isWithinPrefix(entry.path, key)) {
        stream.offer(this.toChange(entry));
      }
    }
    this.watchers.add(stream);
    return stream;
  }

  /** Removes an entry. Watchers are not notified of deletions. */
  delete(path: string): boolean {
    const key = normaliseContextPath(path);
    if (this.closed) {
      throw new ContextClosedError(key);
    }
    return this.entries.delete(key);
  }

  /** Retained commits with a revision strictly greater than `sinceRevision`. */
  history(sinceRevision = 0): ContextChange[] {
    return this.commits
      .filter((change) => change.revision > sinceRevision)
      .map((change) => ({ ...change, value: structuredClone(change.value) }));
  }

  get currentRevision(): number {
    return this.revision;
  }

  get watcherCount(): number {
    return this.watchers.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Serialises every entry as `{ entries: { [path]: { value, writer } } }`. */
  dump(): string {
    const entries: Record<string, { value: ContextValue; writer: string }> = {};
    for (const entry of this.sortedEntries()) {
      entries[entry.path] = { value: entry.value, writer: entry.writer };
    }
    return JSON.stringify({ entries }, null, 2);
  }

  /**
   * Re-commits every entry of a {@link dump} snapshot, in snapshot order, so
   * watchers observe them like regular writes. Returns the number of entries.
   */
  load(json: string): number {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw new ContextSnapshotError("context snapshot is not valid JSON", error);
    }
    const parsed = SnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ContextSnapshotError(`context snapshot is malformed: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
    }
    let count = 0;
    for (const [path, { value, writer }] of Object.entries(parsed.data.entries)) {
      this.set(path, value, writer);
      count += 1;
    }
    return count;
  }

  /**
   * Ends the store's run: closes every watch stream and rejects further
   * writes. Reads keep working so partial results stay queryable.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const watcher of [...this.watchers]) {
      watcher.close();
    }
    this.watchers.clear();
  }

  private sortedEntries(): StoredEntry[] {
    return [...this.entries.values()].sort((a, b) => a.revision - b.revision);
  }

  private toChange(entry: StoredEntry): ContextChange {
    return {
      path: entry.path,
      value: structuredClone(entry.value),
      version: entry.version,
      revision: entry.revision,
      writer: entry.writer,
    };
  }
}
