import { encodingForModel } from 'js-tiktoken';
import { CHUNKING_CONFIG, type Chunk } from '@knowledge-assistant/shared';

/**
 * Chunking Service
 *
 * Splits document text into overlapping, token-bounded chunks for embedding.
 *
 * Algorithm:
 * 1. Tokenize the whole text once
 * 2. Slide a `chunkSize` window forward by `chunkSize - chunkOverlap` tokens
 * 3. For every window except the last, cut the decoded text back to the last
 *    '.' when its character offset is at or after 70% of `chunkSize`
 *
 * The window's token span is never altered by the sentence trim, so
 * `tokenCount` is always the untrimmed window size and consecutive spans
 * overlap by exactly `chunkOverlap` tokens.
 */

export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
  tokenizer?: Tokenizer;
}

/**
 * cl100k_base, the encoding of the embedding and completion models in use.
 */
export function createTiktokenTokenizer(): Tokenizer {
  const encoding = encodingForModel('gpt-4');
  return {
    encode: (text) => encoding.encode(text),
    decode: (tokens) => encoding.decode(tokens),
  };
}

export class Chunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly tokenizer: Tokenizer;

  constructor(options: ChunkerOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0) {
      throw new RangeError(`chunkOverlap must be a non-negative integer, got ${options.chunkOverlap}`);
    }
    if (options.chunkOverlap >= options.chunkSize) {
      throw new RangeError(
        `chunkOverlap (${options.chunkOverlap}) must be smaller than chunkSize (${options.chunkSize})`
      );
    }

    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.tokenizer = options.tokenizer ?? createTiktokenTokenizer();
  }

  chunk(text: string): Chunk[] {
    const tokens = this.tokenizer.encode(text);
    const chunks: Chunk[] = [];
    const step = this.chunkSize - this.chunkOverlap;

    for (let start = 0; start < tokens.length; start += step) {
      const end = start + this.chunkSize;
      const windowTokens = tokens.slice(start, end);
      const isFinal = end >= tokens.length;

      let chunkText = this.tokenizer.decode(windowTokens);
      if (!isFinal) {
        chunkText = trimToSentenceBoundary(chunkText, this.chunkSize);
      }

      chunks.push({
        text: chunkText,
        index: chunks.length,
        tokenCount: windowTokens.length,
      });

      if (isFinal) {
        break;
      }
    }

    return chunks;
  }
}

/**
 * Cut text after its last '.', but only when that period's character offset
 * reaches `minRatio` of the window size.
 */
export function trimToSentenceBoundary(
  text: string,
  windowSize: number,
  minRatio: number = CHUNKING_CONFIG.SENTENCE_BOUNDARY_RATIO
): string {
  const lastPeriod = text.lastIndexOf('.');
  if (lastPeriod >= 0 && lastPeriod >= windowSize * minRatio) {
    return text.slice(0, lastPeriod + 1);
  }
  return text;
}
