import type { InterceptMatch } from '../core/types.js';

/**
 * Render the systemMessage that tells the agent to gather context itself
 * and hand the analysis to the intercepting server's tool.
 *
 * Deterministic: the same match always renders the same text.
 * `serverConfigured` is informational and does not change the output.
 */
export function buildSystemMessage(match: InterceptMatch): string {
  const skillMdPathsJson = JSON.stringify(match.skillMdPaths);

  return `IMPORTANT: Command Interception Active for /${match.commandName}

This command has an MCP interception binding. Follow this protocol:

## What You Do:
Follow the command's context-gathering workflow yourself: accept input, gather user
context, load configuration/playbook files. Do this conversationally across as many
turns as needed.

## What You Delegate:
When context gathering is complete and you are ready to begin analysis/execution,
call the MCP tool instead of performing the work yourself:

  Tool: ${match.toolName}
  Parameters:
    command_name: "${match.commandName}"
    command_md_path: "${match.commandMdPath}"
    skill_md_paths: '${skillMdPathsJson}'
    source_paths: <JSON array of source file paths from the user>
    config_paths: <JSON array of playbook/config files you found>
    supplemental: <JSON object with all context gathered from the user>

## Rules:
1. Do NOT perform the analysis/execution yourself; the MCP tool handles it
2. Do NOT skip context gathering; the MCP tool needs the full context
3. After receiving the MCP tool result, present the markdown to the user and
   mention any files in output_paths
4. If the tool returns an API key error, ask the user for their Anthropic API key`;
}
