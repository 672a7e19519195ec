import Anthropic, { APIConnectionTimeoutError, APIError, APIUserAbortError } from '@anthropic-ai/sdk';
import type {
  IReasoningService,
  ReasoningRequest,
  ServiceCallOptions,
  ServiceResult,
  StructuredValue,
} from '@domain/ports/reasoning-service.js';
import type { SecretEnv } from '@domain/ports/service-resolver.js';
import { DEFAULT_REASONING_MODEL, type BuildBriefConfig } from '@domain/types/config.js';
import { ENV_KEYS } from '@shared/constants/paths.js';
import { ServiceConfigError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { err } from '@shared/lib/result.js';
import { renderShapeInstructions, toStructured } from './structured-output.js';

export interface MessageBody {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface MessageRequestOptions {
  signal: AbortSignal;
  timeout: number;
  maxRetries: number;
}

/** The slice of the Anthropic Messages API this service uses. */
export interface MessagesApi {
  create(
    body: MessageBody,
    options: MessageRequestOptions,
  ): PromiseLike<{ content: ReadonlyArray<{ type: string; text?: string }> }>;
}

export interface AnthropicReasoningOptions {
  model: string;
  maxTokens: number;
}

/**
 * Reasoning service backed by the Anthropic Messages API.
 *
 * The SDK's own retries are off: the orchestrator owns the retry policy.
 */
export class AnthropicReasoningService implements IReasoningService {
  readonly name = 'anthropic';

  constructor(
    private readonly messages: MessagesApi,
    private readonly options: AnthropicReasoningOptions,
  ) {}

  get model(): string {
    return this.options.model;
  }

  /**
   * Build from project config and the environment.
   *
   * @throws ServiceConfigError when ANTHROPIC_API_KEY is unset
   */
  static fromConfig(config: BuildBriefConfig, env: SecretEnv = process.env): AnthropicReasoningService {
    const apiKey = env[ENV_KEYS.anthropic];
    if (!apiKey) throw new ServiceConfigError('anthropic', ENV_KEYS.anthropic);
    const client = new Anthropic({ apiKey });
    return new AnthropicReasoningService(
      { create: (body, options) => client.messages.create(body, options) },
      { model: config.reasoning.model ?? DEFAULT_REASONING_MODEL, maxTokens: config.reasoning.maxTokens },
    );
  }

  async call(request: ReasoningRequest, options: ServiceCallOptions): Promise<ServiceResult<StructuredValue>> {
    const body: MessageBody = {
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      system: `${request.prompt.system}\n\n${renderShapeInstructions(request.shape)}`,
      messages: [{ role: 'user', content: request.prompt.user }],
    };

    let text: string;
    try {
      const response = await this.messages.create(body, {
        signal: options.signal,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
      text = response.content
        .flatMap((block) => (block.type === 'text' && block.text !== undefined ? [block.text] : []))
        .join('\n');
    } catch (error) {
      return err(this.mapError(error, options.timeoutMs));
    }

    if (text.trim() === '' && request.shape.format === 'json') {
      return err({ kind: 'malformed', message: 'response has no text content' });
    }
    return toStructured(text, request.shape);
  }

  private mapError(error: unknown, timeoutMs: number): { kind: 'timeout' | 'unavailable'; message: string } {
    if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
      return { kind: 'timeout', message: `Anthropic API did not answer within ${timeoutMs}ms` };
    }
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof APIError) {
      logger.warn('Anthropic API error', { status: error.status, error: message });
      return { kind: 'unavailable', message: `Anthropic API error: ${message}` };
    }
    return { kind: 'unavailable', message: `Anthropic API request failed: ${message}` };
  }
}
