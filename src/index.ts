/**
 * Plugin Relay
 *
 * Intercepts qualified plugin commands, tells the agent which MCP tool to
 * delegate them to, and turns generated responses into structured results.
 */

export * from './core/types.js';
export * from './core/errors.js';
export * from './core/constants.js';
export {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  getDefaultConfig,
  loadEnvironment,
  manifestPath,
  mergeConfig,
  validateConfig
} from './core/config.js';
export type { RelayConfig } from './core/config.js';
export { createLogger } from './core/logging.js';
export type { Logger } from './core/logging.js';

export * from './interception/index.js';

export { extractStructuredResponse } from './extraction/ResponseExtractor.js';

export { ExecutePluginCommandInputSchema, parseInvocation } from './execution/invocation.js';
export type { ExecutePluginCommandInput } from './execution/invocation.js';
export { PromptBuilder, PROMPT_TEMPLATE, fillTemplate } from './execution/PromptBuilder.js';
export { PluginExecutor } from './execution/PluginExecutor.js';
export type { ExecuteOptions, PluginExecutorConfig } from './execution/PluginExecutor.js';
export { createDefaultSourceReaders, readTextFile } from './execution/sourceReaders.js';
export { serializePluginResult } from './execution/result.js';

export { runHook } from './hook/hook.js';
export type { HookOutput, SkillResolver } from './hook/hook.js';
export { getStatus, isHookInstalled, listBindings } from './status/status.js';
export type { BindingStatus, RelayStatus, StatusOptions } from './status/status.js';
