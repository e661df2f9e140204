import Anthropic from '@anthropic-ai/sdk';
import type { CogwheelConfig } from '../types/config.js';
import type { Oracle, OracleRequest, OracleResponse } from '../types/index.js';
import { OracleError, errorMessage } from '../core/errors.js';
import {
  buildSystemPrompt,
  buildTaskMessage,
  formatObservation,
  formatStepProposal,
} from './prompts.js';

export interface ClaudeOracleOptions {
  model: CogwheelConfig['model'];
  /** Injected for tests; a default client reads ANTHROPIC_API_KEY */
  client?: Anthropic;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * Oracle backed by the Anthropic Messages API.
 *
 * The task opens the conversation; every prior step is replayed as an
 * assistant turn (the proposal) followed by a user turn (the observation).
 */
export class ClaudeOracle implements Oracle {
  private client: Anthropic;
  private model: CogwheelConfig['model'];
  private usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

  constructor(options: ClaudeOracleOptions) {
    this.client = options.client ?? new Anthropic();
    this.model = options.model;
  }

  async propose(
    request: OracleRequest,
    signal: AbortSignal
  ): Promise<OracleResponse> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.model.name,
          max_tokens: this.model.maxTokens,
          temperature: this.model.temperature,
          system: buildSystemPrompt(request.catalog),
          messages: this.buildMessages(request),
        },
        { signal }
      );
    } catch (error) {
      throw new OracleError(
        `Claude request failed: ${errorMessage(error)}`,
        error
      );
    }

    this.usage.inputTokens += response.usage.input_tokens;
    this.usage.outputTokens += response.usage.output_tokens;

    return response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n');
  }

  /**
   * Tokens used across every call made by this oracle
   */
  getUsage(): TokenUsage {
    return { ...this.usage };
  }

  estimateCost(): number {
    // Input: $3 per million tokens, Output: $15 per million tokens
    const inputCost = (this.usage.inputTokens / 1_000_000) * 3;
    const outputCost = (this.usage.outputTokens / 1_000_000) * 15;
    return inputCost + outputCost;
  }

  private buildMessages(request: OracleRequest): Anthropic.MessageParam[] {
    const messages: Anthropic.MessageParam[] = [
      { role: 'user', content: buildTaskMessage(request.task, request.context) },
    ];

    request.steps.forEach((step, index) => {
      messages.push({ role: 'assistant', content: formatStepProposal(step) });
      messages.push({ role: 'user', content: formatObservation(step, index) });
    });

    return messages;
  }
}
