import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import type { AgentDescriptorInput } from "../orchestrator/types.js";
import type { AgentRegistry } from "./registry.js";

/**
 * Error raised when a pipeline document cannot be parsed or validated. The
 * `details` payload carries the zod issues or the offending agent.
 */
export class PipelineSpecificationError extends Error {
  public readonly code = "E-PIPELINE-SPEC";
  public readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "PipelineSpecificationError";
    this.details = details;
  }
}

/** Location of the audit pipeline shipped with the package. */
export const DEFAULT_PIPELINE_PATH = fileURLToPath(new URL("../../config/audit-pipeline.yaml", import.meta.url));

/** Token replaced by the run identifier inside `reads` prefixes. */
export const RUN_ID_PLACEHOLDER = "{runId}";

const NameSchema = z.string().trim().min(1);

const PipelineAgentSchema = z
  .object({
    name: NameSchema,
    /** Implementation looked up in the registry; defaults to `name`. */
    uses: NameSchema.optional(),
    after: z.array(NameSchema).default([]),
    /** Subset of `after` whose failure does not prevent this agent from running. */
    tolerate: z.array(NameSchema).default([]),
    reads: z.array(NameSchema).default([]),
    optional: z.boolean().default(false),
    timeout_ms: z.number().int().min(0).optional(),
  })
  .strict();

const PipelineDocumentSchema = z
  .object({
    name: NameSchema,
    description: z.string().optional(),
    agents: z.array(PipelineAgentSchema).min(1),
  })
  .strict();

export type PipelineAgent = z.output<typeof PipelineAgentSchema>;
export type PipelineDocument = z.output<typeof PipelineDocumentSchema>;

/** Attempt to parse a textual document as JSON first, then YAML. */
function parseStringDocument(source: string): unknown {
  try {
    return JSON.parse(source);
  } catch {
    try {
      return parseYaml(source);
    } catch (error) {
      throw new PipelineSpecificationError("unable to parse pipeline document", {
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/** Parse unknown input (JSON or YAML text, or an object) into a validated {@link PipelineDocument}. */
export function parsePipelineDocument(source: unknown): PipelineDocument {
  let payload: unknown;
  if (typeof source === "string") {
    const trimmed = source.trim();
    if (trimmed.length === 0) {
      throw new PipelineSpecificationError("pipeline document is empty");
    }
    payload = parseStringDocument(trimmed);
  } else if (source && typeof source === "object") {
    payload = source;
  } else {
    throw new PipelineSpecificationError("pipeline document must be an object or string");
  }

  const parsed = PipelineDocumentSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PipelineSpecificationError("pipeline document is invalid", parsed.error.flatten());
  }

  const document = parsed.data;
  const names = new Set<string>();
  for (const agent of document.agents) {
    if (names.has(agent.name)) {
      throw new PipelineSpecificationError(`duplicate agent ${agent.name}`, { agent: agent.name });
    }
    names.add(agent.name);
  }
  for (const agent of document.agents) {
    const stray = agent.tolerate.filter((name) => !agent.after.includes(name));
    if (stray.length > 0) {
      throw new PipelineSpecificationError(`agent ${agent.name} tolerates agents it does not run after`, {
        agent: agent.name,
        tolerate: stray,
      });
    }
  }
  return document;
}

export async function loadPipelineDocument(path: string = DEFAULT_PIPELINE_PATH): Promise<PipelineDocument> {
  let source: string;
  try {
    source = await readFile(path, "utf8");
  } catch (error) {
    throw new PipelineSpecificationError(`unable to read pipeline document ${path}`, {
      message: error instanceof Error ? error.message : String(error),
    });
  }
  return parsePipelineDocument(source);
}

/**
 * Binds every pipeline agent to its registered implementation and produces
 * orchestrator descriptors. `{runId}` inside `reads` is replaced by the run
 * identifier so prefixes address the run's own namespace.
 */
export function resolvePipeline(
  document: PipelineDocument,
  registry: AgentRegistry,
  scope: { runId: string },
): AgentDescriptorInput[] {
  return document.agents.map((agent) => ({
    name: agent.name,
    task: registry.resolve(agent.uses ?? agent.name),
    predecessors: agent.after.map((name) => ({ agent: name, tolerateFailure: agent.tolerate.includes(name) })),
    readDependencies: agent.reads.map((prefix) => prefix.split(RUN_ID_PLACEHOLDER).join(scope.runId)),
    optional: agent.optional,
    timeoutMs: agent.timeout_ms ?? null,
  }));
}
