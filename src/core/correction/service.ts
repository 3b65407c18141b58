/**
 * Rationale correction from retrieved evidence
 */

import { createChildLogger } from '../../utils/logger.js';
import { getModelGateway, type LLMGateway } from '../llm/index.js';
import { correctionPrompt } from '../prompts.js';
import { NO_RESULTS } from '../retrieval/index.js';

const log = createChildLogger('corrector');

/**
 * Numbered transcript of the rationales corrected so far; empty when there are none
 */
export function buildPriorContext(corrected: readonly string[]): string {
  if (corrected.length === 0) return '';
  const steps = corrected.map((text, i) => `${i + 1}. ${text}`).join('\n');
  return `Previous corrected reasoning steps:\n${steps}\n`;
}

export class RationaleCorrector {
  private readonly gateway: LLMGateway;

  constructor(gateway: LLMGateway) {
    this.gateway = gateway;
  }

  /**
   * Rewrite a rationale against evidence. Without evidence the original is
   * returned unchanged and no call is made.
   */
  async correct(original: string, evidence: string, priorContext = ''): Promise<string> {
    if (!evidence.trim() || evidence === NO_RESULTS) {
      log.debug('No supporting knowledge, keeping original rationale');
      return original;
    }

    const corrected = await this.gateway.call(correctionPrompt(original, evidence, priorContext), 0);
    log.debug({ length: corrected.length }, 'Rationale corrected');
    return corrected.trim();
  }
}

export function getRationaleCorrector(): RationaleCorrector {
  return new RationaleCorrector(getModelGateway());
}
