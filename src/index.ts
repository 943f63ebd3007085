export {
  ContextClosedError,
  ContextSnapshotError,
  ContextValueSchema,
  ContextWatchStream,
  SharedContextManager,
  type ContextChange,
  type ContextEntry,
  type ContextValue,
  type SharedContextOptions,
} from "./context/sharedContext.js";
export {
  ContextPathError,
  isWithinPrefix,
  joinContextPath,
  normaliseContextPath,
  normaliseContextPrefix,
  splitContextPath,
} from "./context/paths.js";
export {
  BrokerShutdownError,
  MessageBroker,
  MessageStream,
  TopicError,
  type BrokerStats,
  type Message,
  type MessageBrokerOptions,
  type MessageFilter,
  type PublishOptions,
  type SubscriptionOptions,
} from "./broker/messageBroker.js";
export {
  AgentOrchestrator,
  type AgentOrchestratorOptions,
  type RunHandle,
  type StartOptions,
} from "./orchestrator/orchestrator.js";
export {
  AgentHandleClosedError,
  RunCancelledError,
  SetupError,
  TaskError,
  TaskTimeoutError,
  type SetupErrorCode,
} from "./orchestrator/errors.js";
export { buildDependencyGraph, detectCycles, type DependencyGraph } from "./orchestrator/graph.js";
export { AgentHandles, type AgentBrokerHandle, type AgentContextHandle } from "./orchestrator/handles.js";
export { withRetries, type RetryOptions } from "./orchestrator/retry.js";
export {
  ORCHESTRATOR_IDENTITY,
  RUN_STATUS_TOPIC,
  agentStatusTopic,
  analysisStatusPath,
  isTerminalState,
  type AgentDescriptor,
  type AgentDescriptorInput,
  type AgentInvocation,
  type AgentRunRecord,
  type AgentRunState,
  type AgentStatusBroadcast,
  type AgentTask,
  type AgentTaskResult,
  type ExternalAgentStatus,
  type PredecessorSpec,
  type RunFailureReason,
  type RunResult,
  type RunSnapshot,
  type RunStatus,
  type RunStatusBroadcast,
} from "./orchestrator/types.js";
export { AgentRegistry, UnknownAgentImplementationError } from "./audit/registry.js";
export {
  DEFAULT_PIPELINE_PATH,
  PipelineSpecificationError,
  loadPipelineDocument,
  parsePipelineDocument,
  resolvePipeline,
  type PipelineAgent,
  type PipelineDocument,
} from "./audit/pipeline.js";
export {
  AnalysisService,
  InvalidAnalysisRequestError,
  UnknownRunError,
  type AnalysisOptions,
  type AnalysisServiceOptions,
  type AnalysisState,
  type AnalysisStatus,
} from "./audit/analysisService.js";
export { ConfigurationError, loadOrchestratorConfig, type OrchestratorConfig } from "./config/orchestratorConfig.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions, type LogSink } from "./logger.js";
export { getRunContext, runWithRunContext, type RunContextSnapshot } from "./infra/runContext.js";
