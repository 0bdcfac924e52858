import { createHash } from 'node:crypto';
import { z } from 'zod';
import { CACHE_POLICY, type CachedAnswer } from '@knowledge-assistant/shared';
import type { KeyValueStore } from '../utils/redis';
import { logger } from '../utils/logger';

/**
 * Answer Cache
 *
 * Maps a fingerprint of (tenant, question, contributing document ids) to a
 * previously synthesized answer.
 *
 * Admission policy, `put` silently skips:
 * - confidence below 0.7
 * - insufficient-context answers
 * - time-sensitive questions ("today", "latest", ...), which go stale at once
 * - personal questions ("my", "me ", ...), which must not be served to another
 *   asker in the same tenant
 *
 * Entries are never invalidated on document changes; they age out by TTL.
 */

export type Fingerprint = string;

export type AdmissionDecision =
  | { admitted: true }
  | { admitted: false; reason: 'low_confidence' | 'insufficient_context' | 'time_sensitive' | 'personal' };

const SourceSchema = z.object({
  documentName: z.string(),
  relevantExcerpt: z.string(),
});

const CachedAnswerSchema = z.object({
  answer: z.string().nullable(),
  sources: z.array(SourceSchema),
  confidence: z.number(),
  insufficientContext: z.boolean(),
});

/**
 * Derive the cache key. Ids are sorted first so the key does not depend on the
 * order search returned them in.
 */
export function cacheKey(tenantId: string, question: string, ids: readonly string[]): Fingerprint {
  const sortedIds = [...ids].sort();
  const content = [tenantId, question, sortedIds.join(CACHE_POLICY.KEY_DELIMITER)].join(
    CACHE_POLICY.KEY_DELIMITER
  );
  const hash = createHash('sha256').update(content, 'utf8').digest('hex');
  return `${CACHE_POLICY.KEY_PREFIX}${hash}`;
}

export function checkAdmission(question: string, answer: CachedAnswer): AdmissionDecision {
  if (answer.confidence < CACHE_POLICY.MIN_CONFIDENCE) {
    return { admitted: false, reason: 'low_confidence' };
  }

  if (answer.insufficientContext) {
    return { admitted: false, reason: 'insufficient_context' };
  }

  const lowered = question.toLowerCase();

  if (CACHE_POLICY.TIME_SENSITIVE_MARKERS.some((marker) => lowered.includes(marker))) {
    return { admitted: false, reason: 'time_sensitive' };
  }

  if (CACHE_POLICY.PERSONAL_MARKERS.some((marker) => lowered.includes(marker))) {
    return { admitted: false, reason: 'personal' };
  }

  return { admitted: true };
}

export interface AnswerCacheOptions {
  store: KeyValueStore;
  defaultTtlSeconds?: number;
}

export class AnswerCache {
  private readonly store: KeyValueStore;
  private readonly defaultTtlSeconds: number;

  constructor(options: AnswerCacheOptions) {
    this.store = options.store;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? CACHE_POLICY.DEFAULT_TTL;
  }

  key(tenantId: string, question: string, ids: readonly string[]): Fingerprint {
    return cacheKey(tenantId, question, ids);
  }

  /**
   * Look up a cached answer. A missing or unreadable entry, or a store read
   * failure, is a miss.
   */
  async get(key: Fingerprint): Promise<CachedAnswer | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      logger.warn({ error, key }, 'Cache read failed, treating as miss');
      return null;
    }

    if (raw === null) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      logger.warn({ error, key }, 'Cached answer is not valid JSON, treating as miss');
      return null;
    }

    const parsed = CachedAnswerSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.warn({ key, issues: parsed.error.issues }, 'Cached answer has unexpected shape, treating as miss');
      return null;
    }

    return parsed.data;
  }

  /**
   * Store an answer if the admission policy allows it.
   * Returns whether it was stored.
   */
  async put(
    tenantId: string,
    question: string,
    ids: readonly string[],
    answer: CachedAnswer,
    ttlSeconds?: number
  ): Promise<boolean> {
    const decision = checkAdmission(question, answer);
    if (!decision.admitted) {
      logger.debug({ tenantId, reason: decision.reason }, 'Answer not admitted to cache');
      return false;
    }

    const value: CachedAnswer = {
      answer: answer.answer,
      sources: answer.sources,
      confidence: answer.confidence,
      insufficientContext: answer.insufficientContext,
    };

    await this.store.setWithExpiry(
      this.key(tenantId, question, ids),
      JSON.stringify(value),
      ttlSeconds ?? this.defaultTtlSeconds
    );
    return true;
  }
}
