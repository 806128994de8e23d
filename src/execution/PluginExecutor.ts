/**
 * PluginExecutor - Runs an intercepted command out of band.
 *
 * 1. Builds the prompt from the invocation
 * 2. Calls the injected TextGenerator
 * 3. Splits the response into markdown and structured data
 * 4. Runs the post-processor mapped to the command, if any
 *
 * Failures become unsuccessful results with a user-facing message; the
 * agent relays that message instead of the call aborting.
 */

import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL } from '../core/config.js';
import { GenerationAuthError, errorMessage } from '../core/errors.js';
import { createLogger } from '../core/logging.js';
import type {
  GenerationResponse,
  PluginInvocation,
  PluginResult,
  PostProcessor,
  TextGenerator
} from '../core/types.js';
import { extractStructuredResponse } from '../extraction/ResponseExtractor.js';
import { PromptBuilder } from './PromptBuilder.js';

const log = createLogger('PluginExecutor');

export interface PluginExecutorConfig {
  generator: TextGenerator;
  promptBuilder?: PromptBuilder;
  /** Command name → post-processor */
  postProcessors?: ReadonlyMap<string, PostProcessor>;
  defaultModel?: string;
  defaultMaxTokens?: number;
  /** Milliseconds clock used for elapsed time */
  now?: () => number;
}

export interface ExecuteOptions {
  systemPrompt?: string;
  promptTemplate?: string;
}

export class PluginExecutor {
  private readonly generator: TextGenerator;
  private readonly promptBuilder: PromptBuilder;
  private readonly postProcessors: ReadonlyMap<string, PostProcessor>;
  private readonly defaultModel: string;
  private readonly defaultMaxTokens: number;
  private readonly now: () => number;

  constructor(config: PluginExecutorConfig) {
    this.generator = config.generator;
    this.promptBuilder = config.promptBuilder ?? new PromptBuilder();
    this.postProcessors = config.postProcessors ?? new Map();
    this.defaultModel = config.defaultModel ?? DEFAULT_MODEL;
    this.defaultMaxTokens = config.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
    this.now = config.now ?? Date.now;
  }

  async execute(
    invocation: PluginInvocation,
    outputRequirements: string,
    options: ExecuteOptions = {}
  ): Promise<PluginResult> {
    const startedAt = this.now();
    const elapsedSeconds = (): number => (this.now() - startedAt) / 1000;
    const failure = (message: string): PluginResult => ({
      markdown: '',
      structuredData: null,
      outputPaths: [],
      metadata: { elapsedSeconds: elapsedSeconds() },
      success: false,
      errorMessage: message
    });

    let prompt: string;
    try {
      prompt = this.promptBuilder.build(invocation, outputRequirements, options.promptTemplate);
    } catch (error) {
      log.error('Failed to build prompt', error);
      return failure(`Prompt building failed: ${errorMessage(error)}`);
    }

    const model = invocation.model || this.defaultModel;
    const maxTokens = invocation.maxTokens || this.defaultMaxTokens;

    let response: GenerationResponse;
    try {
      log.info(`Making generation call for command '${invocation.commandName}' with model '${model}'`);
      response = await this.generator.generate({
        model,
        maxTokens,
        prompt,
        systemPrompt: options.systemPrompt
      });
    } catch (error) {
      if (error instanceof GenerationAuthError) {
        return failure(`Authentication failed: ${error.message}. Check your API key.`);
      }
      log.error('Generation call failed', error);
      return failure(`Generation call failed: ${errorMessage(error)}`);
    }

    const { markdown, structuredData } = extractStructuredResponse(response.text);
    let result: PluginResult = {
      markdown,
      structuredData,
      outputPaths: [],
      metadata: {
        model,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        elapsedSeconds: elapsedSeconds(),
        commandName: invocation.commandName
      },
      success: true
    };

    const postProcessor = this.postProcessors.get(invocation.commandName);
    if (postProcessor) {
      log.info(`Running post-processor for command '${invocation.commandName}'`);
      try {
        result = await postProcessor(result, invocation);
      } catch (error) {
        // The generation succeeded, so the result stays successful
        log.error(`Post-processor failed for ${invocation.commandName}`, error);
        result = { ...result, errorMessage: `Post-processing error: ${errorMessage(error)}` };
      }
    }

    return { ...result, metadata: { ...result.metadata, elapsedSeconds: elapsedSeconds() } };
  }
}
