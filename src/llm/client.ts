/**
 * OpenAI client with structured outputs and retry logic
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL, DEFAULT_TEMPERATURE } from '../config/defaults.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('llm-client');

export interface LLMCallOptions {
  model?: string;
  temperature?: number;
  max_tokens?: number;
  max_retries?: number;
}

export interface LLMCallResult<T> {
  data: T;
  tokens_used?: number;
}

/**
 * The one method the rest of the engine needs; tests substitute a fake.
 */
export interface StructuredCaller {
  callWithSchema<T>(
    schema_name: string,
    json_schema: Record<string, unknown>,
    zod_schema: z.ZodType<T>,
    system_prompt: string,
    user_prompt: string,
    options?: LLMCallOptions
  ): Promise<LLMCallResult<T>>;
}

export interface LLMClientConfig {
  api_key?: string;
  /** Request timeout in ms */
  timeout?: number;
  default_model?: string;
}

export class LLMClient implements StructuredCaller {
  private client: OpenAI;
  private default_model: string;

  constructor(config: LLMClientConfig = {}) {
    this.client = new OpenAI({
      apiKey: config.api_key || process.env.OPENAI_API_KEY,
      maxRetries: 3,
      timeout: config.timeout ?? 120000, // 2 minutes
    });
    this.default_model = config.default_model ?? DEFAULT_MODEL;
  }

  /**
   * Make a structured LLM call with JSON schema validation
   */
  async callWithSchema<T>(
    schema_name: string,
    json_schema: Record<string, unknown>,
    zod_schema: z.ZodType<T>,
    system_prompt: string,
    user_prompt: string,
    options: LLMCallOptions = {}
  ): Promise<LLMCallResult<T>> {
    const model = options.model || this.default_model;
    const max_retries = options.max_retries ?? 2;

    logger.info({ schema_name, model }, 'Making LLM API call');

    let last_error: unknown = null;
    for (let attempt = 0; attempt <= max_retries; attempt++) {
      try {
        if (attempt > 0) {
          logger.warn({ attempt, schema_name }, 'Retrying LLM call');
          await this.sleep(1000 * Math.pow(2, attempt)); // Exponential backoff
        }

        return await this.callSimple(
          model,
          schema_name,
          json_schema,
          zod_schema,
          system_prompt,
          user_prompt,
          options
        );
      } catch (error) {
        last_error = error;
        logger.error({ error, attempt, schema_name }, 'LLM call failed');

        // Don't retry on certain errors
        if (
          error instanceof OpenAI.AuthenticationError ||
          error instanceof OpenAI.BadRequestError
        ) {
          throw error;
        }
      }
    }

    throw last_error instanceof Error ? last_error : new Error('LLM call failed after retries');
  }

  private async callSimple<T>(
    model: string,
    schema_name: string,
    json_schema: Record<string, unknown>,
    zod_schema: z.ZodType<T>,
    system_prompt: string,
    user_prompt: string,
    options: LLMCallOptions
  ): Promise<LLMCallResult<T>> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: system_prompt },
      { role: 'user', content: user_prompt },
    ];

    const completion = await this.client.chat.completions.create({
      model,
      messages,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: options.max_tokens ?? DEFAULT_MAX_TOKENS,
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: schema_name,
          strict: true,
          schema: json_schema,
        },
      },
    });

    const message = completion.choices[0]?.message;

    if (!message?.content) {
      throw new Error('No content in LLM response');
    }

    const validated_data = zod_schema.parse(JSON.parse(message.content));

    logger.info({ schema_name, tokens: completion.usage?.total_tokens }, 'LLM call completed');

    return {
      data: validated_data,
      tokens_used: completion.usage?.total_tokens,
    };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
