// Pod Harness - Main Entry Point
// Exports all public APIs

// Wiring
export { Harness } from './src/harness';
export type { HarnessOptions, PodLoopOptions } from './src/harness';

// Documents
export * from './src/domain/types/types';
export * from './src/domain/types/errors';
export { instructionsSchema, resultSchema, passFeedbackSchema, failFeedbackSchema } from './src/domain/schemas/documents';
export { validate, validateInstructions, validateResult, validateFeedback } from './src/application/services/schemaValidator';

// Storage
export { AtomicFileStore, serializeDocument } from './src/infrastructure/adapters/storage/atomicFileStore';
export { DirectoryNamer, PROJECT_ROOT_MARKERS } from './src/infrastructure/adapters/storage/directoryNamer';
export { SystemClock, parseTimestamp, toDirectoryTimestamp } from './src/infrastructure/adapters/clock/systemClock';
export type { FileStorePort } from './src/domain/ports/fileStore';
export type { ClockPort } from './src/domain/ports/clock';
export type { LoggerPort } from './src/domain/ports/logger';

// Evaluation
export { GapExtractor } from './src/domain/evaluation/gapExtractor';
export { RequirementComparator } from './src/domain/evaluation/requirementComparator';
export { SupervisorEvaluation } from './src/application/services/supervisorEvaluation';
export type { ResultEvaluator } from './src/application/services/supervisorEvaluation';

// Exchange and loops
export { FeedbackExchange } from './src/application/services/feedbackExchange';
export { FeedbackLoop } from './src/application/services/feedbackLoop';
export type { FeedbackLoopOptions, FeedbackLoopDeps } from './src/application/services/feedbackLoop';
export { RetryOrchestrator } from './src/application/services/workflow/retryOrchestrator';
export type { RetryOrchestratorOptions } from './src/application/services/workflow/retryOrchestrator';
export type { WorkflowStep, WorkflowContext, WorkflowResult, WorkflowState, StepOutput } from './src/application/services/workflow/types';
export { workflowFileSchema, workflowStepSchema } from './src/domain/schemas/workflowSteps';
export { WorkflowDependencyGraph } from './src/application/services/workflow/dependencyGraph';
export type { WorkflowNodeStatus } from './src/application/services/workflow/dependencyGraph';
export { CircuitBreaker } from './src/domain/policies/retry/circuitBreaker';
export { RateLimitBackoff } from './src/domain/policies/retry/rateLimitBackoff';
export { PodStateManager } from './src/application/services/podStateManager';
export { PodMessageQueue } from './src/application/services/podMessageQueue';
export type { PodMessage } from './src/application/services/podMessageQueue';
export { PerformanceTracker } from './src/application/services/performanceTracker';
export type { OperationTiming } from './src/application/services/performanceTracker';
export { SessionCoordinator } from './src/application/services/sessionCoordinator';
export type { PodSpec, PodRunResult, SessionCoordinatorOptions } from './src/application/services/sessionCoordinator';

// Worker and LLM
export { WorkerExecution } from './src/application/services/workerExecution';
export type { WorkerExecutionOptions } from './src/application/services/workerExecution';
export type { WorkerPort } from './src/domain/ports/worker';
export type { LlmClientPort } from './src/domain/ports/llmProvider';
export { OllamaLlmClient } from './src/infrastructure/connectors/llm/ollamaLlmClient';
export { StubLlmClient } from './src/infrastructure/connectors/llm/stubLlmClient';
export { createLlmClient } from './src/infrastructure/connectors/llm/llmClientFactory';
export { LlmProvider } from './src/domain/agents/enums/provider';
export { buildFeedbackPrompt } from './src/domain/agents/promptBuilder';

// Configuration
export { ConfigLoader } from './src/infrastructure/config/configLoader';
export { setLogLevel } from './src/infrastructure/adapters/logging/logger';
export { loadHarnessConfig } from './src/config/harnessConfig';
export type { HarnessConfig } from './src/config/harnessConfig';
export { llmConfigSchema, resolveLlmConfig } from './src/config/llmConfig';
export type { LlmConfig } from './src/config/llmConfig';
