import {
  LATENCY_BUDGETS,
  checkLatencyBudget,
  type CachedAnswer,
  type Fragment,
  type QueryResult,
  type TenantContext,
} from '@knowledge-assistant/shared';
import { SecurityViolationError, ThrottledError, UpstreamError, isSecurityViolation } from '../errors';
import type { AuditLogRepository, QueryLogRepository } from '../repositories/logs';
import type { Embedder } from '../utils/embeddings';
import { logger } from '../utils/logger';
import type { AnswerCache } from './cache';
import type { RateLimiter } from './rate-limit';
import type { TenantRetriever } from './retrieval';
import type { SynthesisResult, Synthesizer } from './synthesis';

/**
 * Query Orchestrator
 *
 * Pipeline per question:
 * 1. Rate check (fails closed)
 * 2. Embed question
 * 3. Tenant-isolated retrieval
 * 4. Cache lookup on (tenant, question, contributing documents)
 * 5. Synthesis on a miss
 * 6. Cache admission
 * 7. Query + audit log (best effort, never awaited by the response)
 *
 * No stage is retried. A security violation during retrieval is written to
 * the audit trail and rethrown as is.
 */

export interface QueryOrchestratorOptions {
  rateLimiter: RateLimiter;
  embedder: Embedder;
  retriever: TenantRetriever;
  cache: AnswerCache;
  synthesizer: Synthesizer;
  queryLog: QueryLogRepository;
  auditLog: AuditLogRepository;
  retrieval: { topK: number; scoreThreshold: number };
  now?: () => number;
}

function insufficientContext(): CachedAnswer {
  return { answer: null, sources: [], confidence: 0, insufficientContext: true };
}

export class QueryOrchestrator {
  private readonly now: () => number;

  constructor(private readonly deps: QueryOrchestratorOptions) {
    this.now = deps.now ?? Date.now;
  }

  async query(tenant: TenantContext, question: string, requestId: string): Promise<QueryResult> {
    const startTime = this.now();
    const { tenantId } = tenant;

    // ===== STAGE 1: RATE CHECK =====
    const decision = await this.deps.rateLimiter.check(tenantId, 'query');
    if (!decision.allowed) {
      throw new ThrottledError(tenantId, 'query', decision.rule.limit, decision.rule.windowSeconds);
    }

    // ===== STAGE 2: EMBEDDING =====
    const embeddingStart = this.now();
    let questionEmbedding: number[];
    try {
      questionEmbedding = await this.deps.embedder.embed(question);
    } catch (error) {
      throw new UpstreamError('embedding', error);
    }
    this.checkBudget(requestId, 'embedding', this.now() - embeddingStart, LATENCY_BUDGETS.EMBEDDING);

    // ===== STAGE 3: RETRIEVAL =====
    const retrievalStart = this.now();
    let fragments: Fragment[];
    try {
      fragments = await this.deps.retriever.search(tenantId, questionEmbedding, {
        topK: this.deps.retrieval.topK,
        scoreThreshold: this.deps.retrieval.scoreThreshold,
      });
    } catch (error) {
      if (isSecurityViolation(error)) {
        await this.reportSecurityViolation(tenant, question, requestId, error);
      }
      throw error;
    }
    this.checkBudget(requestId, 'retrieval', this.now() - retrievalStart, LATENCY_BUDGETS.RETRIEVAL);

    // Nothing relevant: never call the model with an empty context
    if (fragments.length === 0) {
      return this.respond(tenant, question, requestId, startTime, {
        answer: insufficientContext(),
        cached: false,
        fragments,
        tokensUsed: 0,
      });
    }

    // ===== STAGE 4: CACHE CHECK =====
    const documentIds = fragments.map((fragment) => fragment.documentId);
    const key = this.deps.cache.key(tenantId, question, documentIds);
    const cachedAnswer = await this.deps.cache.get(key);

    if (cachedAnswer) {
      logger.info({ requestId, tenantId }, 'Serving answer from cache');
      return this.respond(tenant, question, requestId, startTime, {
        answer: cachedAnswer,
        cached: true,
        fragments,
        tokensUsed: 0,
      });
    }

    // ===== STAGE 5: SYNTHESIS =====
    const synthesisStart = this.now();
    let synthesis: SynthesisResult;
    try {
      synthesis = await this.deps.synthesizer.synthesize(
        question,
        fragments.map((fragment) => ({
          documentName: fragment.documentName,
          chunkIndex: fragment.chunkIndex,
          chunkText: fragment.chunkText,
        })),
        tenant.tenantName
      );
    } catch (error) {
      throw new UpstreamError('synthesis', error);
    }
    this.checkBudget(requestId, 'synthesis', this.now() - synthesisStart, LATENCY_BUDGETS.SYNTHESIS);

    const answer: CachedAnswer = {
      answer: synthesis.answer,
      sources: synthesis.sources,
      confidence: synthesis.confidence,
      insufficientContext: synthesis.insufficientContext,
    };

    // ===== STAGE 6: CACHE ADMISSION =====
    try {
      await this.deps.cache.put(tenantId, question, documentIds, answer);
    } catch (error) {
      logger.warn({ requestId, tenantId, error }, 'Failed to cache answer');
    }

    return this.respond(tenant, question, requestId, startTime, {
      answer,
      cached: false,
      fragments,
      tokensUsed: synthesis.tokenUsage.total,
    });
  }

  private respond(
    tenant: TenantContext,
    question: string,
    requestId: string,
    startTime: number,
    outcome: { answer: CachedAnswer; cached: boolean; fragments: Fragment[]; tokensUsed: number }
  ): QueryResult {
    const processingTimeMs = this.now() - startTime;
    this.checkBudget(requestId, 'total', processingTimeMs, LATENCY_BUDGETS.TOTAL);

    const result: QueryResult = {
      ...outcome.answer,
      cached: outcome.cached,
      processingTimeMs,
    };

    // ===== STAGE 7: LOG =====
    void this.deps.queryLog
      .record({
        tenantId: tenant.tenantId,
        requestId,
        question,
        answer: result.answer,
        sources: result.sources,
        confidence: result.confidence,
        insufficientContext: result.insufficientContext,
        cached: result.cached,
        retrievedChunksCount: outcome.fragments.length,
        llmTokensUsed: outcome.tokensUsed,
        processingTimeMs,
      })
      .catch((error: unknown) => {
        logger.error({ requestId, error }, 'Failed to store query log');
      });

    void this.deps.auditLog
      .record({
        tenantId: tenant.tenantId,
        action: 'query_execute',
        resourceType: 'query',
        metadata: {
          requestId,
          question,
          chunksRetrieved: outcome.fragments.length,
          insufficientContext: result.insufficientContext,
          cached: result.cached,
        },
      })
      .catch((error: unknown) => {
        logger.error({ requestId, error }, 'Failed to store audit log');
      });

    logger.info(
      {
        requestId,
        tenantId: tenant.tenantId,
        processingTimeMs,
        chunksRetrieved: outcome.fragments.length,
        cached: result.cached,
        insufficientContext: result.insufficientContext,
      },
      'Query processed successfully'
    );

    return result;
  }

  /**
   * Write the violation to the audit trail and raise an alert-level log.
   * The violation itself is rethrown by the caller whatever happens here.
   */
  private async reportSecurityViolation(
    tenant: TenantContext,
    question: string,
    requestId: string,
    violation: SecurityViolationError
  ): Promise<void> {
    logger.fatal(
      { alert: true, requestId, ...violation.details },
      'SECURITY: cross-tenant record returned by vector search'
    );

    try {
      await this.deps.auditLog.record({
        tenantId: tenant.tenantId,
        action: 'security_violation',
        resourceType: 'query',
        metadata: {
          requestId,
          error: violation.message,
          question,
          partition: violation.details.partition,
          pointId: violation.details.pointId,
          observedTenantId: violation.details.observedTenantId,
        },
      });
    } catch (error) {
      logger.error({ alert: true, requestId, error }, 'Failed to write security violation to audit log');
    }
  }

  private checkBudget(requestId: string, stage: string, latency: number, budget: number): void {
    const check = checkLatencyBudget(latency, budget, stage);
    if (check.exceeded) {
      logger.warn({ requestId, latency, budget }, check.violation);
    }
  }
}
