/**
 * Tests for MCP search_knowledge tool - Zod validation, tool execution, error handling
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock the retrieval service before importing
const mockSearchEvidence = vi.fn<(query: string, queryType: string, domain: string) => Promise<string[]>>();
vi.mock('../../core/retrieval/index.js', () => ({
  getRetrievalService: () => ({
    searchEvidence: mockSearchEvidence,
  }),
}));

// Import after mock
import { searchKnowledge, searchKnowledgeSchema } from './search.js';

describe('search_knowledge tool', () => {
  beforeEach(() => {
    mockSearchEvidence.mockReset();
    mockSearchEvidence.mockResolvedValue(['Paris is the capital of France.', 'Paris has about two million residents.']);
  });

  describe('Zod Schema Validation', () => {
    it('should accept a query on its own', () => {
      expect(searchKnowledgeSchema.safeParse({ query: 'capital of France' }).success).toBe(true);
    });

    it('should accept a domain and query type', () => {
      const result = searchKnowledgeSchema.safeParse({
        query: 'aspirin',
        domain: 'medical',
        queryType: 'medical',
      });
      expect(result.success).toBe(true);
    });

    it('should reject an unknown domain', () => {
      expect(searchKnowledgeSchema.safeParse({ query: 'x', domain: 'astrology' }).success).toBe(false);
    });

    it('should reject a blank query', () => {
      expect(searchKnowledgeSchema.safeParse({ query: '   ' }).success).toBe(false);
    });
  });

  describe('Tool Execution', () => {
    it('should return the evidence snippets', async () => {
      const result = await searchKnowledge({ query: 'capital of France' });

      expect(result).toEqual({
        success: true,
        data: {
          query: 'capital of France',
          domain: 'factual',
          queryType: 'natural_language',
          snippets: ['Paris is the capital of France.', 'Paris has about two million residents.'],
          total: 2,
        },
      });
      expect(mockSearchEvidence).toHaveBeenCalledWith('capital of France', 'natural_language', 'factual');
    });

    it('should pass domain and query type through', async () => {
      await searchKnowledge({ query: 'aspirin', domain: 'medical', queryType: 'medical' });

      expect(mockSearchEvidence).toHaveBeenCalledWith('aspirin', 'medical', 'medical');
    });

    it('should return no snippets when nothing is found', async () => {
      mockSearchEvidence.mockResolvedValue([]);

      const result = await searchKnowledge({ query: 'zzz' });

      expect(result.data?.snippets).toEqual([]);
      expect(result.data?.total).toBe(0);
    });

    it('should keep a snippet that spans lines as one entry', async () => {
      mockSearchEvidence.mockResolvedValue(['Aspirin is an analgesic.\nIt was first synthesized in 1897.']);

      const result = await searchKnowledge({ query: 'aspirin', domain: 'medical', queryType: 'medical' });

      expect(result.data?.snippets).toEqual(['Aspirin is an analgesic.\nIt was first synthesized in 1897.']);
      expect(result.data?.total).toBe(1);
    });
  });

  describe('Error Handling', () => {
    it('should return an error response when the service throws', async () => {
      mockSearchEvidence.mockRejectedValue(new Error('registry unavailable'));

      const result = await searchKnowledge({ query: 'test' });

      expect(result).toEqual({ success: false, error: 'registry unavailable' });
    });

    it('should handle non-Error throws', async () => {
      mockSearchEvidence.mockRejectedValue(null);

      const result = await searchKnowledge({ query: 'test' });

      expect(result.error).toBe('An unexpected error occurred');
    });
  });
});
