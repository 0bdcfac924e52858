import Groq from 'groq-sdk';
import OpenAI from 'openai';
import type { TokenUsage } from '@knowledge-assistant/shared';
import type { AppConfig } from '../config';
import { logger } from './logger';

/**
 * LLMClient Interface
 *
 * Vendor-agnostic abstraction for chat completions.
 * Allows swapping implementations without touching pipeline logic.
 *
 * Implementations: OpenAIChatClient (default), GroqClient.
 */

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
}

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface LLMCompletion {
  content: string;
  usage: TokenUsage;
}

export interface LLMClient {
  readonly model: string;
  complete(messages: ChatMessage[], options?: LLMOptions): Promise<LLMCompletion>;
}

interface CompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

function toTokenUsage(usage: CompletionUsage | null | undefined): TokenUsage {
  return {
    prompt: usage?.prompt_tokens ?? 0,
    completion: usage?.completion_tokens ?? 0,
    total: usage?.total_tokens ?? 0,
  };
}

export class OpenAIChatClient implements LLMClient {
  constructor(
    private readonly client: OpenAI,
    readonly model: string
  ) {}

  async complete(messages: ChatMessage[], options: LLMOptions = {}): Promise<LLMCompletion> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: options.temperature ?? 0,
        max_tokens: options.maxTokens ?? 500,
        ...(options.jsonMode && { response_format: { type: 'json_object' as const } }),
      });

      const content = response.choices[0]?.message?.content?.trim() || '';
      logger.info({ latency: Date.now() - startTime, model: this.model }, 'LLM generation completed');

      return { content, usage: toTokenUsage(response.usage) };
    } catch (error) {
      logger.error({ error }, 'LLM generation failed');
      throw error;
    }
  }
}

/**
 * GroqClient Implementation
 *
 * Uses Groq inference API (fast, cheap/free-tier).
 * Same JSON mode contract as the OpenAI client.
 */
export class GroqClient implements LLMClient {
  constructor(
    private readonly client: Groq,
    readonly model: string
  ) {}

  async complete(messages: ChatMessage[], options: LLMOptions = {}): Promise<LLMCompletion> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: options.temperature ?? 0,
        max_tokens: options.maxTokens ?? 500,
        ...(options.jsonMode && { response_format: { type: 'json_object' as const } }),
      });

      const content = response.choices[0]?.message?.content?.trim() || '';
      logger.info({ latency: Date.now() - startTime, model: this.model }, 'LLM generation completed');

      return { content, usage: toTokenUsage(response.usage) };
    } catch (error) {
      logger.error({ error }, 'LLM generation failed');
      throw error;
    }
  }
}

export function createOpenAI(config: AppConfig): OpenAI {
  return new OpenAI({ apiKey: config.openai.apiKey });
}

/**
 * Pick the completion client for the configured provider.
 */
export function createLLMClient(config: AppConfig, openai: OpenAI): LLMClient {
  if (config.llmProvider === 'groq') {
    logger.info({ model: config.groq.model }, 'Using Groq for completions');
    return new GroqClient(new Groq({ apiKey: config.groq.apiKey }), config.groq.model);
  }

  logger.info({ model: config.openai.completionModel }, 'Using OpenAI for completions');
  return new OpenAIChatClient(openai, config.openai.completionModel);
}
