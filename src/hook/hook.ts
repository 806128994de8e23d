/**
 * PostToolUse hook for plugin command interception.
 *
 * The host pipes the hook payload on stdin. When the payload is a Skill
 * call for an intercepted command, the hook answers with
 * {"systemMessage": "..."}; every other payload gets no output at all.
 * Non-intercepted calls must return quickly.
 */

import { z } from 'zod';
import { QUALIFIED_NAME_SEPARATOR, SKILL_TOOL_NAME } from '../core/constants.js';
import { createLogger } from '../core/logging.js';
import type { ResolutionOutcome } from '../core/types.js';
import { buildSystemMessage } from '../interception/systemMessage.js';

const log = createLogger('Hook');

const HookInputSchema = z.object({
  tool_name: z.string(),
  tool_input: z.object({
    skill: z.unknown().optional()
  }).passthrough().optional()
}).passthrough();

export interface HookOutput {
  systemMessage: string;
}

export interface SkillResolver {
  resolve(skillName: string): ResolutionOutcome;
}

function parseHookInput(raw: string): z.infer<typeof HookInputSchema> | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = HookInputSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

/**
 * Process one hook payload.
 *
 * @returns the JSON line to print, or null to stay silent
 */
export function runHook(rawInput: string, resolver: SkillResolver): string | null {
  const input = parseHookInput(rawInput);
  if (!input || input.tool_name !== SKILL_TOOL_NAME) {
    return null;
  }

  const skill = input.tool_input?.skill;
  if (typeof skill !== 'string' || !skill.includes(QUALIFIED_NAME_SEPARATOR)) {
    return null;
  }

  const outcome = resolver.resolve(skill);
  switch (outcome.status) {
    case 'matched': {
      const output: HookOutput = { systemMessage: buildSystemMessage(outcome.match) };
      return JSON.stringify(output);
    }
    case 'instruction-missing':
      log.warn(`'${skill}' is intercepted but cannot be delegated: ${outcome.error.message}`);
      return null;
    case 'no-match':
      log.debug(`'${skill}' not intercepted (${outcome.reason})`);
      return null;
  }
}
