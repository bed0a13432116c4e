/**
 * Completion Service - Text completion against an OpenAI-compatible endpoint
 * Single-shot calls are bounded by the configured timeout; streams are read until the server ends them
 */

import OpenAI from 'openai';
import type { CompletionConfig } from '../schemas/config.schema.js';
import { ServiceUnavailableError, describeError } from './service-errors.js';

/**
 * Stateless text completion capability
 */
export interface CompletionService {
  /** Complete a prompt and return the full text */
  complete(prompt: string): Promise<string>;
  /** Complete a prompt and yield text fragments in order */
  completeStream(prompt: string): AsyncIterable<string>;
}

/**
 * Completion service backed by Ollama's /v1/completions endpoint
 */
export class OllamaCompletionService implements CompletionService {
  private client: OpenAI;
  private config: CompletionConfig;

  constructor(config: CompletionConfig, client?: OpenAI) {
    this.config = config;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: `${config.baseUrl.replace(/\/+$/, '')}/v1`,
        maxRetries: 0,
      });
  }

  async complete(prompt: string): Promise<string> {
    try {
      const response = await this.client.completions.create(
        {
          model: this.config.model,
          prompt,
          max_tokens: this.config.maxTokens,
          temperature: this.config.temperature,
        },
        { timeout: this.config.timeoutMs }
      );
      return response.choices[0]?.text ?? '';
    } catch (error) {
      throw new ServiceUnavailableError(
        `Completion request to ${this.config.baseUrl} failed: ${describeError(error)}`,
        'completion',
        { cause: error }
      );
    }
  }

  async *completeStream(prompt: string): AsyncGenerator<string> {
    let stream: AsyncIterable<OpenAI.Completions.Completion>;
    try {
      stream = await this.client.completions.create({
        model: this.config.model,
        prompt,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        stream: true,
      });
    } catch (error) {
      throw new ServiceUnavailableError(
        `Streaming completion request to ${this.config.baseUrl} failed: ${describeError(error)}`,
        'completion',
        { cause: error }
      );
    }

    try {
      for await (const chunk of stream) {
        const text = chunk.choices[0]?.text;
        if (text) {
          yield text;
        }
      }
    } catch (error) {
      throw new ServiceUnavailableError(
        `Completion stream from ${this.config.baseUrl} broke: ${describeError(error)}`,
        'completion',
        { cause: error }
      );
    }
  }
}
