// flowline - demand-driven pipelines on message-driven workers
// Main entry point

// Materializer
export { WorkerFlowMaterializer } from "./runtime/materializer";
export { MaterializedFlow } from "./runtime/materialized-flow";
export {
  FlowNameCounter,
  createFlowName,
} from "./runtime/flow-namer";
export { activate, workerName } from "./runtime/activator";
export type { Activate, ActivationContext } from "./runtime/activator";
export { buildChain } from "./runtime/chain";
export type { BuildChainOptions } from "./runtime/chain";
export {
  attachSource,
  attachSink,
  createSource,
  createSink,
  isActiveSource,
  isActiveSink,
} from "./runtime/endpoint-dispatch";

// Flow builder
export { Flow } from "./flow";

// Stage model
export { transform, mergeNode, StageKinds } from "./types/ast";
export type {
  Transformer,
  TransformerFactory,
  TransformStage,
  MergeNode,
  StageDescriptor,
  StageKind,
} from "./types/ast";
export {
  identityStage,
  identityTransformer,
  mapTransformer,
  filterTransformer,
  mapConcatTransformer,
  takeTransformer,
  dropTransformer,
  groupedTransformer,
  scanTransformer,
} from "./stream/transformers";

// Endpoints
export { EndpointKinds } from "./types/endpoints";
export type {
  Awaitable,
  EndpointKind,
  FlowMaterializer,
  SimpleSource,
  SourceWithKey,
  SimpleSink,
  SinkWithKey,
  Source,
  Sink,
} from "./types/endpoints";
export {
  IterableSource,
  PromiseSource,
  PublisherSource,
  SubscriberSource,
} from "./stream/sources";
export {
  SubscriberSink,
  BlackholeSink,
  ForeachSink,
  FoldSink,
  PublisherSink,
} from "./stream/sinks";

// Streaming protocol
export { CancelledSubscription } from "./types/reactive";
export type {
  Subscription,
  Subscriber,
  Publisher,
  Processor,
} from "./types/reactive";
export { WorkerProcessor, workerSubscription } from "./stream/processor";
export type { ProcessorMessage } from "./stream/processor";
export { transformProcessorSpec } from "./stream/transform-processor";
export { IterablePublisher, PromisePublisher } from "./stream/publishers";
export {
  ForeachSubscriber,
  FoldSubscriber,
  BlackholeSubscriber,
} from "./stream/subscribers";

// Worker runtime
export { WorkerSystem } from "./runtime/system";
export type { WorkerSystemOptions } from "./runtime/system";
export { WorkerCell, LocalWorkerRef } from "./runtime/worker";
export { StateMachine, WorkerStates } from "./runtime/state-machine";
export type { WorkerState } from "./runtime/state-machine";
export { ask } from "./runtime/ask";
export { createWorker } from "./runtime/creation";
export type { CreateWorkerOptions } from "./runtime/creation";
export { streamSupervisorSpec, isSupervisorReply } from "./runtime/supervisor";
export type {
  MaterializeRequest,
  SupervisorMessage,
  SupervisorReply,
} from "./runtime/supervisor";
export type {
  Dispatch,
  Recipient,
  RemoteWorkerRef,
  WorkerRef,
  WorkerContext,
  WorkerBehavior,
  WorkerSpec,
} from "./types/worker";

// Settings
export {
  DEFAULT_DISPATCHER,
  IMMEDIATE_DISPATCHER,
  WORKER_SYSTEM_DEFAULTS,
  MATERIALIZER_DEFAULTS,
} from "./types/settings";
export type {
  WorkerSystemSettings,
  MaterializerSettings,
} from "./types/settings";
export {
  WorkerSystemSettingsSchema,
  MaterializerSettingsSchema,
  resolveWorkerSystemSettings,
  resolveMaterializerSettings,
} from "./zod/settings";

// Errors
export {
  FlowError,
  FlowErrorCodes,
  ErrorCategory,
  getErrorCategory,
  isFlowError,
} from "./utils/errors";
export type { FlowErrorCode, FlowErrorContext } from "./utils/errors";

// Observability
export { EventDispatcher } from "./runtime/event-dispatcher";
export {
  combineEvents,
  filterEvents,
  excludeEvents,
  createLoggingHandler,
} from "./runtime/event-handlers";
export type { EventHandler, FlowLogger } from "./runtime/event-handlers";
export {
  EventType,
  MaterializeEvents,
  WorkerEvents,
} from "./types/observability";
export type {
  FlowEvent,
  FlowEventBase,
  FlowEventHandler,
  FlowEventInput,
} from "./types/observability";
