import { z } from 'zod';
import { SimpleTool } from '@toolrelay/tools';

export const CODE_ASSISTANT_TOOL_NAME = 'code_assistant_tool';

export const CODE_ASSISTANT_SYSTEM_PROMPT =
  "You are a helpful AI code assistant. When appropriate, use the 'code_assistant_tool' to help with code " +
  'generation, completion, or explanation. Provide answers primarily in code blocks if generating code.';

export const CodeAssistantInput = z.object({
  code_description: z.string().describe('A natural language description of the code to be generated or completed.'),
  current_code_context: z
    .string()
    .default('')
    .describe('Optional. The existing code snippet or context to be worked on.'),
});

export interface CodeAssistantOutput {
  generated_code_snippet: string;
  explanation: string;
}

export function prepareCodeRequest(input: z.infer<typeof CodeAssistantInput>): CodeAssistantOutput {
  const context = input.current_code_context.trim()
    ? `Building upon existing context:\n${input.current_code_context}`
    : 'No existing context provided.';

  const lines = [
    'Code Request Analysis:',
    `- Description: ${input.code_description}`,
    `- Context: ${context}`,
    '- Task: Generate appropriate code based on the description',
    '',
    'Please provide:',
    '1. Clean, well-commented code',
    '2. Brief explanation of approach',
    '3. Any relevant best practices or considerations',
  ];

  return {
    generated_code_snippet: lines.join('\n'),
    explanation:
      'Structured request prepared for code generation. The model will use this context to generate appropriate code.',
  };
}

/** Prepares structured context for code generation; it writes no code itself */
export function createCodeAssistantTool(): SimpleTool {
  return SimpleTool.fromZod(
    CODE_ASSISTANT_TOOL_NAME,
    'Assists with code generation, completion, or explanation. Provides structured context to guide code ' +
      'generation based on natural language description and optional existing code context.',
    CodeAssistantInput,
    (input) => JSON.stringify(prepareCodeRequest(input)),
  );
}
