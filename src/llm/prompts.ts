/**
 * Prompt templates for the reasoning oracle
 */

import {
  FINISH_ACTION,
  type AgentStep,
  type ParameterSchema,
  type ToolCatalogEntry,
} from '../types/index.js';

function formatParameters(schema: ParameterSchema): string {
  const entries = Object.entries(schema);
  if (entries.length === 0) {
    return '    (no parameters)';
  }
  return entries
    .map(([field, spec]) => {
      const required = spec.required === false ? 'optional' : 'required';
      const description = spec.description ? ` - ${spec.description}` : '';
      return `    - ${field} (${spec.type}, ${required})${description}`;
    })
    .join('\n');
}

/**
 * Render the tool catalog as a readable list
 */
export function formatCatalog(catalog: ToolCatalogEntry[]): string {
  if (catalog.length === 0) {
    return 'No tools are available. Finish with the best answer you can give.';
  }
  return catalog
    .map(
      (tool) =>
        `- ${tool.name}: ${tool.description || '(no description)'}\n${formatParameters(tool.parameterSchema)}`
    )
    .join('\n');
}

/**
 * System prompt listing the tools and the response format
 */
export function buildSystemPrompt(catalog: ToolCatalogEntry[]): string {
  return `You are a task-solving agent. You work in steps: think about what to do next, choose one action, then read the observation it produces.

## Tools Available
${formatCatalog(catalog)}

## Response Format
Respond ONLY with a single JSON object, no extra text:
{
  "thought": "your reasoning about the next step",
  "action": "the tool name, or \\"${FINISH_ACTION}\\"",
  "actionInput": { "param": "value" }
}

## Important Instructions

1. **One action per response**: the observation for it will be sent back to you.
2. **Use the declared parameters**: unknown parameters are rejected.
3. **Recover from errors**: if an observation starts with "Error:", adjust the tool or its parameters.
4. **Finish explicitly**: when you have the answer, respond with action "${FINISH_ACTION}" and put the answer in actionInput.output, e.g. { "output": 42 }.
`;
}

/**
 * Build the initial user message for a task
 */
export function buildTaskMessage(
  task: string,
  context: Record<string, unknown>
): string {
  const contextSection =
    Object.keys(context).length > 0
      ? `\n\n## Context\n${JSON.stringify(context, null, 2)}`
      : '';

  return `Please complete the following task:

${task}${contextSection}`;
}

/**
 * Render one step as the assistant turn that proposed it
 */
export function formatStepProposal(step: AgentStep): string {
  return JSON.stringify({
    thought: step.thought,
    action: step.action,
    actionInput: step.actionInput,
  });
}

/**
 * Render one step's observation as the user turn that answers it
 */
export function formatObservation(step: AgentStep, index: number): string {
  return `Observation ${index + 1}: ${step.observation}`;
}
