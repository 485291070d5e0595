export { MessageBus } from './message-bus'
export { BrainWebSocketServer } from './transport-server'
export { BrainWebSocketClient, PERMANENT_FAILURE_CODE } from './transport-client'
export { BrainCerebellumBridge } from './bridge'
export { CommandBroadcaster } from './command-broadcaster'
export { CommandQueue, PRIORITY_RANK } from './command-queue'
export { CommandLifecycleTable, canTransition, evaluateCompletion, isTerminal } from './command-lifecycle'
export { CommandTranslator, createCommandTranslator } from './command-translator'
export { MockCerebellum } from './mock-cerebellum'
export { MessageRouter, effectivePriority, parseBinding, ruleMatches, ruleSpecificity } from './routing'
export { OutboundQueue } from './outbound-queue'
export { AsyncMutex } from './mutex'
export { parseHeartbeatTimestamp, evaluateHeartbeat } from './heartbeat'
export { MESSAGE_TYPES, createMessage, decodeMessage, encodeMessage, matchesPattern } from './protocol'
export { BrainPipelineError, isBrainPipelineError } from './errors'
export type { BrainErrorCode } from './errors'
export type { MessageBusOptions, RequestOptions, AwaitOptions, BusStats } from './message-bus'
export type { BrainServerOptions, BrainServerStats, HeartbeatCheckResult } from './transport-server'
export type { BrainClientOptions, ClientStatus } from './transport-client'
export type { BridgeOptions, BridgeStats, SendCommandOptions } from './bridge'
export type { BroadcasterOptions, BroadcasterStats, ConsumerInfo, ConsumerRole } from './command-broadcaster'
export type { CommandRecord, TransitionResult } from './command-lifecycle'
export type { ActionDraft, CommandTranslation } from './command-translator'
export type { MockCerebellumOptions } from './mock-cerebellum'
export type { Binding, BindingInput, MatchRule, MessageRouterOptions, RouteReason, RouterInfo, RoutingContext, RoutingResult } from './routing'
export type {
  ActionStatus,
  AgentConnection,
  BrainCommand,
  BridgeState,
  BusMessage,
  CerebellumAction,
  CommandDispatcher,
  CommandFeedback,
  CommandInput,
  CommandLifecycleState,
  CommandPriority,
  ConsumerFeedback,
  DispatchFrame,
  JsonObject,
  MessageHandler,
  TransportSocket,
} from './types'
