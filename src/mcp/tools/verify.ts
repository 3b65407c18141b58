/**
 * MCP verify_claim tool
 */

import { z } from 'zod';
import { getPipelineService } from '../../core/pipeline/index.js';
import { CLAIM_MARKER } from '../../core/reasoning/index.js';
import { VERIFICATION_LABELS, type VerificationLabel } from '../../core/consolidation/index.js';
import { sanitizeError } from '../../utils/errors.js';
import type { Domain, ToolResult } from '../../types/index.js';

export const verifyClaimSchema = z.object({
  claim: z.string().trim().min(1).max(4000).describe('The factual claim to verify'),
});

export interface VerifyResultData {
  claim: string;
  label: VerificationLabel;
  domains: Domain[];
  correctedRationales: string[];
  durationMs: number;
}

export function toClaimQuestion(claim: string): string {
  return claim.startsWith(CLAIM_MARKER) ? claim : `${CLAIM_MARKER} ${claim}`;
}

export async function verifyClaim(
  params: z.infer<typeof verifyClaimSchema>
): Promise<ToolResult<VerifyResultData>> {
  try {
    const result = await getPipelineService().run(toClaimQuestion(params.claim));
    const label = VERIFICATION_LABELS.find(l => l === result.answer) ?? 'NOT ENOUGH INFO';

    return {
      success: true,
      data: {
        claim: params.claim,
        label,
        domains: result.domains,
        correctedRationales: result.correctedRationales,
        durationMs: result.durationMs,
      },
    };
  } catch (error) {
    return { success: false, error: sanitizeError(error) };
  }
}
