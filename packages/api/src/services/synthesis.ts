import { z } from 'zod';
import type { SourceReference, TokenUsage } from '@knowledge-assistant/shared';
import type { LLMClient } from '../utils/llm';
import { logger } from '../utils/logger';

/**
 * Answer Synthesis Service
 *
 * Purpose: Generate grounded answers from retrieved fragments.
 *
 * STRICT GROUNDING POLICY:
 * - Answer ONLY from provided context
 * - Flag insufficient context instead of guessing
 * - Cite source documents with a supporting excerpt
 * - Report a confidence score for cache admission
 */

export interface ContextChunk {
  documentName: string;
  chunkIndex: number;
  chunkText: string;
}

export interface SynthesisResult {
  answer: string | null;
  sources: SourceReference[];
  confidence: number;
  insufficientContext: boolean;
  tokenUsage: TokenUsage;
}

export interface Synthesizer {
  synthesize(question: string, context: ContextChunk[], tenantName: string): Promise<SynthesisResult>;
}

const ModelAnswerSchema = z.object({
  answer: z.string().nullable().default(null),
  sources: z
    .array(
      z.object({
        document_name: z.string(),
        relevant_excerpt: z.string().default(''),
      })
    )
    .default([]),
  confidence: z.number().default(0),
  insufficient_context: z.boolean().default(false),
});

export class SynthesisParseError extends Error {
  constructor(
    message: string,
    readonly raw: string
  ) {
    super(message);
    this.name = 'SynthesisParseError';
  }
}

export class LLMSynthesizer implements Synthesizer {
  constructor(private readonly llm: LLMClient) {}

  async synthesize(question: string, context: ContextChunk[], tenantName: string): Promise<SynthesisResult> {
    const startTime = Date.now();

    const completion = await this.llm.complete(
      [
        { role: 'system', content: buildSystemPrompt(tenantName) },
        { role: 'user', content: buildUserPrompt(question, context) },
      ],
      {
        temperature: 0.3,
        maxTokens: 1000,
        jsonMode: true,
      }
    );

    const result = parseModelAnswer(completion.content, completion.usage);

    logger.info(
      {
        latency: Date.now() - startTime,
        chunksUsed: context.length,
        confidence: result.confidence,
        insufficientContext: result.insufficientContext,
        tokens: result.tokenUsage.total,
      },
      'Answer synthesis completed'
    );

    return result;
  }
}

/**
 * Parse the model's JSON reply. Confidence is clamped to [0, 1].
 */
export function parseModelAnswer(content: string, tokenUsage: TokenUsage): SynthesisResult {
  let decoded: unknown;
  try {
    decoded = JSON.parse(content);
  } catch {
    throw new SynthesisParseError('Model reply is not valid JSON', content);
  }

  const parsed = ModelAnswerSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new SynthesisParseError(`Model reply has unexpected shape: ${parsed.error.message}`, content);
  }

  const reply = parsed.data;
  return {
    answer: reply.answer,
    sources: reply.sources.map((source) => ({
      documentName: source.document_name,
      relevantExcerpt: source.relevant_excerpt,
    })),
    confidence: Math.max(0, Math.min(1, reply.confidence)),
    insufficientContext: reply.insufficient_context,
    tokenUsage,
  };
}

/**
 * Render fragments in retrieval order, one delimited block each.
 * Chunk numbers are 1-based for the model.
 */
export function buildContext(context: ContextChunk[]): string {
  return context
    .map(
      (chunk) =>
        `--- Document: ${chunk.documentName} (Chunk ${chunk.chunkIndex + 1}) ---\n${chunk.chunkText}\n---`
    )
    .join('\n\n');
}

function buildSystemPrompt(tenantName: string): string {
  return `You are an internal knowledge assistant for ${tenantName}. Your role is to answer employee questions based ONLY on the provided internal documents.

CRITICAL RULES:
1. Only use information from the provided context documents
2. Always cite your sources by referencing document names
3. If the context does not contain enough information to answer the question, you MUST respond with insufficient_context: true
4. Never make assumptions or use external knowledge
5. Be concise but complete in your answers
6. Use professional business language

Your response must be in JSON format following this exact structure.`;
}

function buildUserPrompt(question: string, context: ContextChunk[]): string {
  return `CONTEXT DOCUMENTS:
${buildContext(context)}

QUESTION:
${question}

Provide your answer in the following JSON format:
{
  "answer": "Your detailed answer here, or null if insufficient context",
  "sources": [
    {
      "document_name": "Name of source document",
      "relevant_excerpt": "Brief quote supporting your answer"
    }
  ],
  "confidence": 0.85,
  "insufficient_context": false
}

Confidence should be a number between 0 and 1 indicating how well the context supports the answer.
Set insufficient_context to true if you cannot answer the question from the provided context.`;
}
