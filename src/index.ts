export {LLM, type LLMOptions} from './core/llm.js'
export {
  CompletionBuilder,
  PlainBuilder,
  StructuredBuilder,
  ToolBuilder,
  type CompleteOptions,
  type MessageInput,
  type SessionContext,
  type StructuredFormat,
  type ToolInput
} from './core/builders.js'
export {
  MessageCollection,
  assistantMessage,
  messageFromJson,
  messageFromRecord,
  messageFromResponse,
  messageToJson,
  messageToRecord,
  systemMessage,
  toolMessage,
  userMessage,
  type AssistantMessage,
  type Message,
  type MessageRecord,
  type Role,
  type SystemMessage,
  type ToolMessage,
  type UserMessage
} from './core/message.js'
export {ToolCall, ToolDefinition, type ToolCallRecord, type ToolParameters, type ToolRecord} from './core/tool.js'
export {
  Response,
  StructuredResponse,
  ToolResponse,
  type ResponseRecord,
  type StructuredResponseRecord,
  type ToolResponseRecord
} from './core/response.js'
export {Usage, type UsageRecord} from './core/usage.js'
export {mergeRequestConfig, validateRequestConfig, type RequestConfig} from './core/request-config.js'
export {formatModelId, parseModelId, type ModelId} from './core/model-id.js'
export {assertToolTurns} from './core/tool-turns.js'
export {
  ConnectionError,
  StructuredOutputError,
  ToolCallError,
  TooltalkError,
  ValidationError,
  type ErrorCode
} from './core/errors.js'
export type {JsonObject, JsonPrimitive, JsonValue} from './core/json.js'
export {InMemoryEventBus, type EventBus, type EventHandler} from './core/event-bus.js'
export type {ClientEvent, ClientEventType, CompletionKind} from './core/events.js'
export {ExchangeLogSubscriber} from './core/subscribers/exchange-log-subscriber.js'
export {UsageSubscriber, type ModelUsageSummary} from './core/subscribers/usage-subscriber.js'
export {openRuntime, type Runtime} from './core/runtime.js'
export {createProvider, SUPPORTED_PROVIDERS, type ProviderOverrides} from './providers/factory.js'
export {MockProvider} from './providers/mock-provider.js'
export {OpenAIProvider} from './providers/openai-provider.js'
export type {
  LLMProvider,
  ProviderReply,
  ProviderRequest,
  ProviderToolCall,
  ProviderUsage,
  ResponseFormat
} from './providers/types.js'
export {loadConfig} from './config/load-config.js'
export {appConfigSchema, DEFAULT_MODEL, type AppConfig} from './config/schema.js'
export {runToolRounds, type RoundTripEvent, type RoundTripResult, type ToolExecutor} from './tools/round-trip.js'
