/**
 * Cadence public API.
 *
 * @module cadence
 */

export const CADENCE_VERSION = '0.1.0';

// Pipeline
export { GenerationPipeline, createGenerationPipeline } from './inference/pipeline.js';
export type { GenerateOptions, GenerationResult, PromptOptions } from './inference/pipeline.js';
export type { EngineRequest, GenerationEngine } from './inference/engine.js';

// Building blocks
export { StopSequenceFilter, codePointLength, findEarliestStop, partialStopSuffixLength } from './inference/stop-filter.js';
export type { FilterStep, StopFilterOptions, StopReason } from './inference/stop-filter.js';
export { SessionStore } from './inference/session-store.js';
export { AccessSerializer } from './inference/access-serializer.js';
export type { Release } from './inference/access-serializer.js';

// Templates
export {
  TEMPLATE_FAMILIES,
  TEMPLATE_TABLE,
  buildPrompt,
  detectTemplateFamily,
  getTemplateDefinition,
  getTemplateStopSequence,
  isTemplateFamily,
  listTemplateFamilies,
  resolveTemplateFamily,
} from './inference/templates/index.js';
export type { PromptSpec, TemplateDefinition, TemplateFamily, TokenWrapper, Turn } from './inference/templates/index.js';

// Chat client
export { createChatProvider, toPromptSpec } from './client/chat-provider.js';
export type { ChatMessage, ChatProvider, ChatProviderOptions, ChatResponse } from './client/chat-provider.js';

// Config
export {
  describePipelineConfig,
  detectConstrainedEnvironment,
  deriveThreadCount,
  resolvePipelineConfig,
} from './config/pipeline-config.js';
export type {
  ConfigSource,
  PipelineConfig,
  PipelineConfigField,
  PipelineConfigOverrides,
} from './config/pipeline-config.js';
export { getRuntimeConfig, resetRuntimeConfig, setRuntimeConfig } from './config/runtime.js';
export {
  BUSY_POLICIES,
  CONSTRAINED_ENV_VAR,
  DEFAULT_DEBUG_CONFIG,
  DEFAULT_GENERATION_DEFAULTS,
  DEFAULT_PLATFORM_CONFIG,
  DEFAULT_RUNTIME_CONFIG,
  createRuntimeConfig,
} from './config/schema/index.js';
export type {
  BusyPolicy,
  DebugConfigSchema,
  GenerationDefaultsSchema,
  PlatformSchema,
  RuntimeConfigOverrides,
  RuntimeConfigSchema,
} from './config/schema/index.js';

// Errors
export {
  CadenceError,
  ERROR_CODES,
  configurationError,
  createCadenceError,
  decodeError,
  describeError,
  genericError,
  isCadenceError,
} from './errors/cadence-error.js';
export type { CadenceErrorOptions, ErrorCode } from './errors/cadence-error.js';

// Debug
export * from './debug/index.js';
