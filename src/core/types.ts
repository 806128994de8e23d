/**
 * Plugin Relay Core Types
 *
 * Central type definitions shared by interception, extraction and execution.
 */

// ==========================================
// INTERCEPTION TYPES
// ==========================================

export interface QualifiedName {
  pluginName: string;
  commandName: string;
}

/**
 * A server that claims a command through its `intercepts` list.
 */
export interface InterceptBinding {
  serverName: string;
  intercepts: string[];
}

export interface ResolvedPaths {
  commandMdPath: string;
  skillMdPaths: string[];
}

/**
 * Everything needed to tell the invoking agent which tool to delegate to.
 * Built once per lookup and frozen.
 */
export interface InterceptMatch {
  readonly pluginName: string;       // e.g. "legal"
  readonly commandName: string;      // e.g. "review-contract"
  readonly serverName: string;       // e.g. "generate-redlined"
  readonly toolName: string;         // mcp__generate-redlined__execute_plugin_command
  readonly pluginDir: string;
  readonly commandMdPath: string;
  readonly skillMdPaths: readonly string[];
  readonly serverConfigured: boolean;
}

export type NoMatchReason = 'unqualified' | 'plugin-not-found' | 'not-intercepted';

export type ResolutionOutcome =
  | { status: 'matched'; match: InterceptMatch }
  | { status: 'no-match'; reason: NoMatchReason }
  | { status: 'instruction-missing'; error: Error };

export interface LocatorOptions {
  /** Root of the plugin tree, normally ~/.claude/plugins */
  pluginsRoot: string;
  /** Manifest of installed plugins; defaults to <pluginsRoot>/installed_plugins.json */
  installedPluginsPath?: string;
}

// ==========================================
// EXTRACTION TYPES
// ==========================================

export type JsonObject = { [key: string]: unknown };

export interface ExtractionResult {
  /** Prose surrounding the payload, or the whole input when none was found */
  markdown: string;
  structuredData: JsonObject | null;
}

// ==========================================
// EXECUTION TYPES
// ==========================================

/**
 * Payload for running an intercepted command out of band.
 */
export interface PluginInvocation {
  commandName: string;
  commandMdPath: string;
  skillMdPaths: string[];
  configPaths: string[];
  sourcePaths: string[];
  sourceTexts: string[];
  supplemental?: JsonObject;
  model?: string;
  maxTokens?: number;
  outputPath?: string;
  pluginName?: string;
}

export interface ExecutionMetadata {
  model?: string;
  inputTokens?: number;
  outputTokens?: number;
  elapsedSeconds: number;
  commandName?: string;
  [key: string]: unknown;
}

export interface PluginResult {
  markdown: string;
  structuredData: JsonObject | null;
  /** Files written by post-processing (DOCX, PDF, ...) */
  outputPaths: string[];
  metadata: ExecutionMetadata;
  success: boolean;
  errorMessage?: string;
}

export interface GenerationRequest {
  model: string;
  maxTokens: number;
  prompt: string;
  systemPrompt?: string;
}

export interface GenerationResponse {
  text: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * Makes the text-generation call. Implementations own transport and
 * authentication and throw GenerationAuthError on rejected credentials.
 */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<GenerationResponse>;
}

export type PostProcessor = (
  result: PluginResult,
  invocation: PluginInvocation
) => PluginResult | Promise<PluginResult>;

/** Turns a source file into prompt-insertable text */
export type SourceReader = (path: string) => string;
