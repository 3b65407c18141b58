/**
 * MCP search_knowledge tool
 */

import { z } from 'zod';
import { getRetrievalService } from '../../core/retrieval/index.js';
import { sanitizeError } from '../../utils/errors.js';
import { DOMAINS, QUERY_TYPES, type Domain, type QueryType, type ToolResult } from '../../types/index.js';

// Tool schema
export const searchKnowledgeSchema = z.object({
  query: z.string().trim().min(1).max(2000).describe('Search query text, or a SPARQL query when queryType is sparql'),
  domain: z.enum(DOMAINS).optional().describe('Knowledge domain used to rank sources (default: factual)'),
  queryType: z
    .enum(QUERY_TYPES)
    .optional()
    .describe('How the query is written: sparql, medical or natural_language (default: natural_language)'),
});

export interface SearchResultData {
  query: string;
  domain: Domain;
  queryType: QueryType;
  snippets: string[];
  total: number;
}

// Tool implementation
export async function searchKnowledge(
  params: z.infer<typeof searchKnowledgeSchema>
): Promise<ToolResult<SearchResultData>> {
  const domain = params.domain ?? 'factual';
  const queryType = params.queryType ?? 'natural_language';

  try {
    const snippets = await getRetrievalService().searchEvidence(params.query, queryType, domain);

    return {
      success: true,
      data: {
        query: params.query,
        domain,
        queryType,
        snippets,
        total: snippets.length,
      },
    };
  } catch (error) {
    return { success: false, error: sanitizeError(error) };
  }
}
