/**
 * Reasoning stage - rationale sampling, domain identification, consensus
 */

import { config } from '../../config/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { getModelGateway, type LLMGateway } from '../llm/index.js';
import { consensusValidationPrompt, domainPrompt, reasoningPrompt } from '../prompts.js';
import { DOMAINS, type Agreement, type Domain, type Rationale } from '../../types/index.js';
import {
  extractAnswer,
  hasConsensus,
  measureAgreement,
  stripMarkdown,
} from './answer-extraction.js';
import { isClaimStyle, selectTemperature } from './complexity.js';

const log = createChildLogger('reasoning');

export interface ReasoningOptions {
  numRationales: number;
  numRationalesClaim: number;
  consensusThreshold: number;
  maxParallelCalls: number;
}

const DOMAIN_KEYWORDS: Record<Domain, readonly string[]> = {
  factual: ['factual', 'wikipedia', 'historical', 'geographic', 'political', 'general knowledge'],
  medical: ['medical', 'health', 'disease', 'treatment', 'medicine', 'patient', 'clinical', 'diagnosis'],
  physics: ['physics', 'force', 'energy', 'motion', 'quantum', 'relativity', 'mechanics', 'electromagnetic'],
  biology: ['biology', 'organism', 'cell', 'genetics', 'evolution', 'species', 'molecular', 'biochemical'],
};

/**
 * Domains whose keyword family appears in a classifier reply, in declaration order
 */
export function parseDomains(reply: string): Domain[] {
  const text = reply.toLowerCase();
  const found: Domain[] = [];
  for (const domain of DOMAINS) {
    if (DOMAIN_KEYWORDS[domain].some(keyword => text.includes(keyword))) {
      found.push(domain);
    }
  }
  return found.length > 0 ? found : ['factual'];
}

export class ReasoningService {
  private readonly gateway: LLMGateway;
  private readonly options: ReasoningOptions;

  constructor(gateway: LLMGateway, options: Partial<ReasoningOptions> = {}) {
    this.gateway = gateway;
    this.options = { ...config.pipeline, ...options };
  }

  /**
   * Number of rationales sampled for a question; fewer for claims
   */
  rationaleCount(question: string, datasetHint?: string): number {
    return isClaimStyle(question, datasetHint)
      ? this.options.numRationalesClaim
      : this.options.numRationales;
  }

  /**
   * Sample k independent rationales in bounded parallel batches, in index order
   */
  async generateRationales(question: string, datasetHint?: string): Promise<Rationale[]> {
    const k = this.rationaleCount(question, datasetHint);
    const temperature = selectTemperature(question, datasetHint);
    const maxParallel = Math.max(1, this.options.maxParallelCalls);
    log.info({ k, temperature }, 'Generating rationales');

    const rationales: Rationale[] = [];
    for (let start = 1; start <= k; start += maxParallel) {
      const indices: number[] = [];
      for (let index = start; index < start + maxParallel && index <= k; index++) {
        indices.push(index);
      }
      const batch = await Promise.all(
        indices.map(async (index): Promise<Rationale> => {
          const text = await this.gateway.call(
            reasoningPrompt(question, index, k, datasetHint),
            temperature
          );
          return { index, text: text.trim(), temperature };
        })
      );
      rationales.push(...batch);
    }

    return rationales;
  }

  extractAnswers(rationales: readonly Rationale[]): string[] {
    return rationales.map(rationale => extractAnswer(rationale.text));
  }

  async identifyDomains(question: string): Promise<Domain[]> {
    const reply = await this.gateway.call(domainPrompt(question), 0);
    const domains = parseDomains(reply);
    log.info({ domains }, 'Identified domains');
    return domains;
  }

  hasConsensus(answers: readonly string[], threshold = this.options.consensusThreshold): boolean {
    const agreement = measureAgreement(answers);
    const consensus = hasConsensus(answers, threshold);
    log.info({ share: agreement.share, threshold, consensus }, 'Consensus check');
    return consensus;
  }

  measureAgreement(answers: readonly string[]): Agreement {
    return measureAgreement(answers);
  }

  /**
   * Ask the model whether the consensus answer actually answers the question
   */
  async validateConsensusAnswer(question: string, answer: string): Promise<boolean> {
    const reply = await this.gateway.call(consensusValidationPrompt(question, answer), 0);
    const verdict = stripMarkdown(reply).replace(/^["'\s]+/, '').toLowerCase();
    return verdict.startsWith('yes');
  }
}

export function getReasoningService(): ReasoningService {
  return new ReasoningService(getModelGateway());
}
