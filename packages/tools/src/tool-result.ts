import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ToolCallError } from '@toolrelay/shared';
import type { ToolArtifact, ToolResultParts } from './simple-tool.js';

/**
 * Split an MCP call result into text and artifacts. One text part becomes a string,
 * several become a list, none becomes "". Results flagged isError throw ToolCallError.
 */
export function convertCallToolResult(toolName: string, result: CallToolResult): ToolResultParts {
  const texts: string[] = [];
  const artifacts: ToolArtifact[] = [];

  for (const block of result.content) {
    if (block.type === 'text') {
      texts.push(block.text);
    } else {
      artifacts.push({ ...block });
    }
  }

  if (result.isError) {
    throw new ToolCallError(toolName, texts.join('\n') || `tool '${toolName}' reported an error`);
  }

  const content = texts.length === 0 ? '' : texts.length === 1 ? texts[0] : texts;
  return artifacts.length > 0 ? { content, artifacts } : { content };
}
