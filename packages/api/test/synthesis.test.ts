import { describe, expect, it } from 'vitest';
import { LLMSynthesizer, SynthesisParseError, buildContext, parseModelAnswer } from '../src/services/synthesis';
import type { ChatMessage, LLMClient, LLMCompletion, LLMOptions } from '../src/utils/llm';

const USAGE = { prompt: 200, completion: 40, total: 240 };

class FakeLLM implements LLMClient {
  readonly model = 'fake-model';
  readonly requests: { messages: ChatMessage[]; options?: LLMOptions }[] = [];

  constructor(private readonly content: string) {}

  async complete(messages: ChatMessage[], options?: LLMOptions): Promise<LLMCompletion> {
    this.requests.push({ messages, options });
    return { content: this.content, usage: USAGE };
  }
}

describe('parseModelAnswer', () => {
  it('maps the model reply onto the result shape', () => {
    const reply = JSON.stringify({
      answer: 'Twenty days.',
      sources: [{ document_name: 'Handbook', relevant_excerpt: '20 vacation days' }],
      confidence: 0.85,
      insufficient_context: false,
    });

    expect(parseModelAnswer(reply, USAGE)).toEqual({
      answer: 'Twenty days.',
      sources: [{ documentName: 'Handbook', relevantExcerpt: '20 vacation days' }],
      confidence: 0.85,
      insufficientContext: false,
      tokenUsage: USAGE,
    });
  });

  it('fills in missing fields', () => {
    expect(parseModelAnswer('{"insufficient_context": true}', USAGE)).toEqual({
      answer: null,
      sources: [],
      confidence: 0,
      insufficientContext: true,
      tokenUsage: USAGE,
    });
  });

  it('clamps confidence into [0, 1]', () => {
    expect(parseModelAnswer('{"answer": "x", "confidence": 1.4}', USAGE).confidence).toBe(1);
    expect(parseModelAnswer('{"answer": "x", "confidence": -0.2}', USAGE).confidence).toBe(0);
  });

  it('rejects a reply that is not JSON', () => {
    expect(() => parseModelAnswer('Sure! Here is the answer.', USAGE)).toThrow(
      new SynthesisParseError('Model reply is not valid JSON', 'Sure! Here is the answer.')
    );
  });

  it('rejects a reply with the wrong field types', () => {
    expect(() => parseModelAnswer('{"confidence": "high"}', USAGE)).toThrow(SynthesisParseError);
  });
});

describe('buildContext', () => {
  it('renders each fragment as a numbered block', () => {
    const context = buildContext([
      { documentName: 'Handbook', chunkIndex: 0, chunkText: 'Vacation is 20 days.' },
      { documentName: 'Travel', chunkIndex: 2, chunkText: 'Book economy.' },
    ]);

    expect(context).toBe(
      '--- Document: Handbook (Chunk 1) ---\nVacation is 20 days.\n---\n\n' +
        '--- Document: Travel (Chunk 3) ---\nBook economy.\n---'
    );
  });
});

describe('LLMSynthesizer', () => {
  it('asks for a JSON answer grounded in the given context', async () => {
    const llm = new FakeLLM('{"answer": "Twenty days.", "confidence": 0.9}');
    const synthesizer = new LLMSynthesizer(llm);

    const result = await synthesizer.synthesize(
      'How many vacation days?',
      [{ documentName: 'Handbook', chunkIndex: 0, chunkText: 'Vacation is 20 days.' }],
      'Acme Corp'
    );

    expect(result.answer).toBe('Twenty days.');
    expect(result.tokenUsage).toEqual(USAGE);

    const [request] = llm.requests;
    expect(request.options).toEqual({ temperature: 0.3, maxTokens: 1000, jsonMode: true });
    expect(request.messages.map((message) => message.role)).toEqual(['system', 'user']);
    expect(request.messages[0].content).toContain('internal knowledge assistant for Acme Corp');
    expect(request.messages[1].content).toContain(
      '--- Document: Handbook (Chunk 1) ---\nVacation is 20 days.\n---'
    );
    expect(request.messages[1].content).toContain('QUESTION:\nHow many vacation days?');
  });
});
