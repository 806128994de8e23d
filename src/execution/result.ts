import type { ExecutionMetadata, JsonObject, PluginResult } from '../core/types.js';

const METADATA_WIRE_KEYS: Record<string, string> = {
  inputTokens: 'input_tokens',
  outputTokens: 'output_tokens',
  elapsedSeconds: 'elapsed_seconds',
  commandName: 'command_name'
};

function toWireMetadata(metadata: ExecutionMetadata): JsonObject {
  const wire: JsonObject = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (value !== undefined) {
      wire[METADATA_WIRE_KEYS[key] ?? key] = value;
    }
  }
  return wire;
}

/**
 * Render a result as the tool response the agent reads. A result carrying
 * an error message is reported as unsuccessful.
 */
export function serializePluginResult(result: PluginResult): string {
  return JSON.stringify({
    success: result.success && !result.errorMessage,
    markdown: result.markdown,
    output_paths: result.outputPaths,
    structured_data: result.structuredData,
    metadata: toWireMetadata(result.metadata),
    error_message: result.errorMessage ?? null
  }, null, 2);
}
