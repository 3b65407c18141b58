/**
 * MCP answer_question tool - full Chain-of-Knowledge pipeline for one question
 */

import { z } from 'zod';
import { getPipelineService } from '../../core/pipeline/index.js';
import { sanitizeError } from '../../utils/errors.js';
import type {
  Confidence,
  Domain,
  ModelsUsed,
  PipelineStage,
  PipelineState,
  ToolResult,
} from '../../types/index.js';

// Tool schema
export const answerQuestionSchema = z.object({
  question: z.string().trim().min(1).max(4000).describe('The question to answer'),
  datasetHint: z
    .string()
    .optional()
    .describe('Question style hint: fever, hotpotqa, medmcqa or mmlu_* (default: general question)'),
  includeRationales: z
    .boolean()
    .optional()
    .describe('Include the sampled and corrected reasoning chains in the result (default: false)'),
});

export interface AnswerResultData {
  question: string;
  answer: string;
  stage: PipelineStage;
  confidence: Confidence;
  domains: Domain[];
  agreement: number;
  modelsUsed: ModelsUsed;
  trace: PipelineState[];
  durationMs: number;
  rationales?: string[];
  correctedRationales?: string[];
}

// Tool implementation
export async function answerQuestion(
  params: z.infer<typeof answerQuestionSchema>
): Promise<ToolResult<AnswerResultData>> {
  try {
    const result = await getPipelineService().run(params.question, params.datasetHint);

    const data: AnswerResultData = {
      question: result.question,
      answer: result.answer,
      stage: result.stage,
      confidence: result.confidence,
      domains: result.domains,
      agreement: Math.round(result.agreement * 1000) / 1000,
      modelsUsed: result.modelsUsed,
      trace: result.trace,
      durationMs: result.durationMs,
    };
    if (params.includeRationales) {
      data.rationales = result.rationales.map(r => r.text);
      data.correctedRationales = result.correctedRationales;
    }

    return { success: true, data };
  } catch (error) {
    return { success: false, error: sanitizeError(error) };
  }
}
