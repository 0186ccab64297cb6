export type {
  ModelCapability,
  ModelInfo,
  ModelDefinition,
  ChatRole,
  ChatMessage,
  GenerationRequest,
  GenerationResponse,
} from './model.js';

export { MODEL_CAPABILITIES } from './model.js';

export type {
  Conversation,
  ConversationSummary,
  SaveConversationInput,
  ModelPreference,
} from './message.js';

export type {
  UsageStatus,
  UsageGroupBy,
  UsageRecord,
  NewUsageRecord,
  UsageFilters,
  UsageStats,
  UsageLedger,
} from './usage.js';

export type {
  ProviderType,
  ProviderConfig,
  CloudProviderConfig,
  OllamaConfig,
  OpenAIConfig,
  AnthropicConfig,
  GoogleConfig,
  MistralConfig,
} from './provider.js';

export { PROVIDER_TYPES } from './provider.js';

export type {
  LogLevel,
  RetrySettings,
  AppConfig,
} from './data.js';
