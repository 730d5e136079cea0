import Anthropic from '@anthropic-ai/sdk';
import { ExternalServiceError, type DecisionRequest, type DecisionService } from '@stratamem/core';

const MAX_DECISION_TOKENS = 2000;

export interface AnthropicDecisionServiceOptions {
  apiKey: string;
  model: string;
  /** Injected in tests; built from `apiKey` otherwise. */
  client?: Anthropic;
}

/**
 * Sleep-cycle decision service backed by the Anthropic Messages API.
 * Returns the model's text verbatim; the caller parses it strictly.
 */
export class AnthropicDecisionService implements DecisionService {
  readonly modelName: string;
  private readonly client: Anthropic;

  constructor(options: AnthropicDecisionServiceOptions) {
    if (!options.client && !options.apiKey) {
      throw new Error('ANTHROPIC_API_KEY not configured');
    }
    this.modelName = options.model;
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
  }

  async decide(request: DecisionRequest): Promise<string> {
    let message: Anthropic.Message;
    try {
      message = await this.client.messages.create({
        model: this.modelName,
        max_tokens: MAX_DECISION_TOKENS,
        messages: [{ role: 'user', content: request.prompt }],
      });
    } catch (err) {
      const status = err instanceof Anthropic.APIError ? err.status : undefined;
      throw new ExternalServiceError(
        'decision',
        `Decision request failed${status === undefined ? '' : ` with HTTP ${status}`}`,
        err,
      );
    }

    return message.content.flatMap(block => (block.type === 'text' ? [block.text] : [])).join('');
  }
}
