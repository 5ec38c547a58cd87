/**
 * @lumora/platform-gateway
 *
 * Adapters for AI chat and search platforms, the platform registry and the
 * never-throwing gateway the executor queries through.
 */

// Types
export type {
  AuthRequirement,
  PlatformMetadata,
  PlatformQueryRequest,
  PlatformQueryResponse,
  PlatformCompletion,
  ResponseTiming,
  TokenUsage,
  PlatformError,
  PlatformErrorCode,
  ApiConfig,
  HealthCheckResult,
  AdapterStats,
  PlatformAdapter,
  PlatformResult,
} from './types.js';

// Base adapter
export {
  BasePlatformAdapter,
  DEFAULT_BASE_CONFIG,
  type BaseAdapterConfig,
  type ErrorClassification,
} from './base/base-adapter.js';
export { postJson, parseResponse, extractErrorMessage, estimateCost } from './base/http.js';

// API platform adapters
export {
  OpenAIAdapter,
  createOpenAIAdapter,
  OPENAI_METADATA,
  type OpenAIAdapterConfig,
} from './api-platforms/openai-adapter.js';
export {
  GeminiAdapter,
  createGeminiAdapter,
  GEMINI_METADATA,
  type GeminiAdapterConfig,
} from './api-platforms/gemini-adapter.js';
export {
  PerplexityAdapter,
  createPerplexityAdapter,
  PERPLEXITY_METADATA,
  PERPLEXITY_SYSTEM_PROMPT,
  type PerplexityAdapterConfig,
} from './api-platforms/perplexity-adapter.js';
export {
  AnthropicAdapter,
  createAnthropicAdapter,
  ANTHROPIC_METADATA,
  type AnthropicAdapterConfig,
} from './api-platforms/anthropic-adapter.js';

// Mock adapter
export {
  MockAdapter,
  createMockAdapter,
  MOCK_METADATA,
  type MockAdapterConfig,
  type MockResponder,
} from './mock/mock-adapter.js';

// Registry and credentials
export { PlatformRegistry, createDefaultRegistry, API_ADAPTER_FACTORIES } from './registry.js';
export {
  resolvePlatformCredentials,
  isApiPlatformId,
  API_PLATFORM_IDS,
  CREDENTIAL_ENV_KEYS,
  type ApiPlatformId,
  type PlatformCredentials,
} from './credentials.js';

// Gateway
export {
  PlatformGateway,
  createPlatformGateway,
  toResponseText,
  isErrorResponse,
  DEFAULT_REQUEST,
  type RequestDefaults,
  type PlatformGatewayOptions,
} from './gateway.js';
