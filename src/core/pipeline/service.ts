/**
 * Pipeline orchestrator - runs one question through the Chain-of-Knowledge stages
 *
 * START -> RATIONALE_GENERATION -> CONSENSUS_CHECK -> EARLY_STOP -> DONE
 *                                                  -> RETRIEVAL_LOOP -> CONSOLIDATION -> DONE
 *
 * Claims skip the consensus check and always take the retrieval loop.
 */

import { z } from 'zod';
import { config } from '../../config/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { ChainOfKnowledgeError, errorMessage, isFatalGatewayError } from '../../utils/errors.js';
import { getModelGateway, type LLMGateway } from '../llm/index.js';
import { ReasoningService, isClaimStyle } from '../reasoning/index.js';
import { RetrievalService } from '../retrieval/index.js';
import { RationaleCorrector, buildPriorContext } from '../correction/index.js';
import { AnswerConsolidator } from '../consolidation/index.js';
import { getKnowledgeSourceRegistry } from '../knowledge/index.js';
import type {
  BatchPrediction,
  Domain,
  ModelsUsed,
  PipelineResult,
  PipelineState,
  Rationale,
} from '../../types/index.js';

const log = createChildLogger('pipeline');

/** Evidence at or below this length is not worth a correction call */
const MIN_EVIDENCE_LENGTH = 10;

export const EARLY_STOP_MODEL = 'none (early stop)';

export const questionSchema = z.string().trim().min(1, 'Question must not be empty');

export interface PipelineOptions {
  earlyStopping: boolean;
  earlyStopThreshold: number;
  /** Questions run at once by runBatch */
  batchConcurrency: number;
}

export interface PipelineStages {
  gateway: LLMGateway;
  reasoning: ReasoningService;
  retrieval: RetrievalService;
  corrector: RationaleCorrector;
  consolidator: AnswerConsolidator;
}

export class PipelineService {
  private readonly stages: PipelineStages;
  private readonly options: PipelineOptions;

  constructor(stages: PipelineStages, options: Partial<PipelineOptions> = {}) {
    this.stages = stages;
    this.options = {
      earlyStopping: config.pipeline.earlyStopping,
      earlyStopThreshold: config.pipeline.earlyStopThreshold,
      batchConcurrency: config.pipeline.maxParallelCalls,
      ...options,
    };
  }

  /**
   * Answer one question. Fatal gateway errors reject; everything else degrades.
   */
  async run(question: string, datasetHint?: string): Promise<PipelineResult> {
    const parsed = questionSchema.safeParse(question);
    if (!parsed.success) {
      throw new ChainOfKnowledgeError(parsed.error.errors[0].message, 'INVALID_INPUT');
    }
    const text = parsed.data;

    const started = Date.now();
    const trace: PipelineState[] = ['START'];
    const { reasoning } = this.stages;

    trace.push('RATIONALE_GENERATION');
    const [rationales, domains] = await Promise.all([
      reasoning.generateRationales(text, datasetHint),
      reasoning.identifyDomains(text),
    ]);
    const extractedAnswers = reasoning.extractAnswers(rationales);
    const agreement = reasoning.measureAgreement(extractedAnswers);

    if (!isClaimStyle(text, datasetHint)) {
      trace.push('CONSENSUS_CHECK');
      if (await this.shouldStopEarly(text, extractedAnswers, agreement.answer)) {
        trace.push('EARLY_STOP', 'DONE');
        log.info({ answer: agreement.answer, share: agreement.share }, 'Consensus validated, stopping early');
        return {
          question: text,
          answer: agreement.answer,
          stage: 'consensus_validated',
          confidence: 'high',
          domains,
          rationales,
          extractedAnswers,
          agreement: agreement.share,
          correctedRationales: [],
          modelsUsed: this.modelsUsed(true),
          trace,
          durationMs: Date.now() - started,
        };
      }
    }

    trace.push('RETRIEVAL_LOOP');
    const correctedRationales = await this.correctAll(rationales, domains);

    trace.push('CONSOLIDATION');
    const answer = await this.stages.consolidator.consolidate(text, correctedRationales, datasetHint);

    trace.push('DONE');
    const durationMs = Date.now() - started;
    log.info({ durationMs, domains }, 'Pipeline complete');
    return {
      question: text,
      answer,
      stage: 'full_pipeline',
      confidence: 'medium',
      domains,
      rationales,
      extractedAnswers,
      agreement: agreement.share,
      correctedRationales,
      modelsUsed: this.modelsUsed(false),
      trace,
      durationMs,
    };
  }

  /**
   * Run many questions with bounded concurrency. A failed question yields an
   * empty prediction and its error message; results keep input order.
   */
  async runBatch(questions: readonly string[], datasetHint?: string): Promise<BatchPrediction[]> {
    const size = Math.max(1, this.options.batchConcurrency);
    const predictions: BatchPrediction[] = [];

    for (let start = 0; start < questions.length; start += size) {
      const chunk = questions.slice(start, start + size);
      const settled = await Promise.allSettled(chunk.map(question => this.run(question, datasetHint)));
      settled.forEach((outcome, i) => {
        const question = chunk[i];
        if (outcome.status === 'fulfilled') {
          predictions.push({ question, prediction: outcome.value.answer, result: outcome.value });
        } else {
          const message = errorMessage(outcome.reason);
          log.error({ index: start + i }, `Question failed: ${message}`);
          predictions.push({ question, prediction: '', error: message });
        }
      });
    }

    return predictions;
  }

  private async shouldStopEarly(question: string, answers: readonly string[], modal: string): Promise<boolean> {
    if (!this.options.earlyStopping) return false;
    if (!this.stages.reasoning.hasConsensus(answers, this.options.earlyStopThreshold)) return false;
    return this.stages.reasoning.validateConsensusAnswer(question, modal);
  }

  private async correctAll(rationales: readonly Rationale[], domains: readonly Domain[]): Promise<string[]> {
    const corrected: string[] = [];
    for (const rationale of rationales) {
      corrected.push(await this.correctOne(rationale, domains, corrected));
    }
    return corrected;
  }

  /**
   * Try each domain in order; the first with usable evidence and a non-empty
   * correction wins, otherwise the original text is kept.
   */
  private async correctOne(rationale: Rationale, domains: readonly Domain[], previous: readonly string[]): Promise<string> {
    for (const domain of domains) {
      try {
        const outcome = await this.stages.retrieval.retrieve(rationale.text, domain);
        if (outcome.status !== 'success') {
          log.debug({ index: rationale.index, domain, status: outcome.status }, 'No evidence for rationale');
          continue;
        }
        if (outcome.evidence.trim().length <= MIN_EVIDENCE_LENGTH) continue;

        const corrected = await this.stages.corrector.correct(
          rationale.text,
          outcome.evidence,
          buildPriorContext(previous)
        );
        if (corrected) {
          log.debug({ index: rationale.index, domain }, 'Rationale corrected');
          return corrected;
        }
      } catch (error) {
        if (isFatalGatewayError(error)) throw error;
        log.warn({ index: rationale.index, domain }, `Correction attempt failed: ${errorMessage(error)}`);
      }
    }
    return rationale.text;
  }

  private modelsUsed(earlyStop: boolean): ModelsUsed {
    const model = this.stages.gateway.model;
    return {
      reasoning: model,
      queryGeneration: earlyStop ? EARLY_STOP_MODEL : model,
      consolidation: earlyStop ? EARLY_STOP_MODEL : model,
    };
  }
}

/**
 * Pipeline over the shared gateway and knowledge sources
 */
export function getPipelineService(options: Partial<PipelineOptions> = {}): PipelineService {
  const gateway = getModelGateway();
  return new PipelineService(
    {
      gateway,
      reasoning: new ReasoningService(gateway),
      retrieval: new RetrievalService(gateway, getKnowledgeSourceRegistry()),
      corrector: new RationaleCorrector(gateway),
      consolidator: new AnswerConsolidator(gateway),
    },
    options
  );
}
