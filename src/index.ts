#!/usr/bin/env node
/**
 * Chain-of-Knowledge - Main Entry Point
 *
 * This module provides both programmatic API and CLI interface.
 *
 * Usage:
 *   - MCP Server: node dist/mcp/main.js
 *   - CLI: node dist/index.js <command>
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { getPipelineService, type PipelineService } from './core/pipeline/index.js';
import { getRetrievalService, NO_RESULTS } from './core/retrieval/index.js';
import { getModelGateway, type CacheStats } from './core/llm/index.js';
import { VERIFICATION_LABELS, type VerificationLabel } from './core/consolidation/index.js';
import { toClaimQuestion } from './mcp/tools/verify.js';
import { DOMAINS, type BatchPrediction, type Domain, type PipelineResult, type QueryType } from './types/index.js';

// Re-export services for programmatic use
export { getPipelineService, PipelineService } from './core/pipeline/index.js';
export { getRetrievalService, RetrievalService } from './core/retrieval/index.js';
export { getReasoningService, ReasoningService } from './core/reasoning/index.js';
export { getModelGateway, ModelGateway, LLMService } from './core/llm/index.js';
export { getKnowledgeSourceRegistry, KnowledgeSourceRegistry } from './core/knowledge/index.js';
export { RationaleCorrector } from './core/correction/index.js';
export { AnswerConsolidator, type VerificationLabel } from './core/consolidation/index.js';
export * from './types/index.js';

export type PipelineRunner = Pick<PipelineService, 'run' | 'runBatch'>;

export interface VerifyResult {
  label: VerificationLabel;
  result: PipelineResult;
}

/**
 * High-level API for Chain-of-Knowledge operations
 */
export class ChainOfKnowledgeClient {
  private readonly pipeline: PipelineRunner;

  constructor(pipeline: PipelineRunner = getPipelineService()) {
    this.pipeline = pipeline;
  }

  /**
   * Answer a question
   */
  async ask(question: string, datasetHint?: string): Promise<PipelineResult> {
    return this.pipeline.run(question, datasetHint);
  }

  /**
   * Verify a claim; the answer is always one of the three labels
   */
  async verify(claim: string): Promise<VerifyResult> {
    const result = await this.pipeline.run(toClaimQuestion(claim));
    const label = VERIFICATION_LABELS.find(l => l === result.answer) ?? 'NOT ENOUGH INFO';
    return { label, result };
  }

  /**
   * Relevant snippets for a query, without any reasoning
   */
  async search(query: string, domain: Domain = 'factual', queryType: QueryType = 'natural_language'): Promise<string[]> {
    return getRetrievalService().searchEvidence(query, queryType, domain);
  }

  /**
   * Answer many questions; failures become empty predictions
   */
  async batch(questions: readonly string[], datasetHint?: string): Promise<BatchPrediction[]> {
    return this.pipeline.runBatch(questions, datasetHint);
  }

  cacheStats(): CacheStats {
    return getModelGateway().cacheStats();
  }
}

/**
 * Remove `--name value` from args and return the value
 */
export function takeOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index === -1) return undefined;
  const [, value] = args.splice(index, 2);
  return value;
}

function isDomain(value: string): value is Domain {
  return DOMAINS.some(domain => domain === value);
}

function printResult(result: PipelineResult): void {
  console.log('Answer:');
  console.log(result.answer);
  console.log(`\nStage: ${result.stage} (confidence: ${result.confidence})`);
  console.log(`Agreement: ${(result.agreement * 100).toFixed(0)}%`);
  if (result.domains.length > 0) {
    console.log(`Domains: ${result.domains.join(', ')}`);
  }
  console.log(`Trace: ${result.trace.join(' -> ')}`);
  console.log(`(${(result.durationMs / 1000).toFixed(1)}s)`);
}

/**
 * CLI interface
 */
async function cli(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case 'ask': {
      const dataset = takeOption(rest, 'dataset');
      const question = rest.join(' ');
      if (!question) {
        console.error('Usage: ask <question> [--dataset <hint>]');
        process.exit(1);
      }
      console.log(`Question: "${question}"\n`);
      printResult(await new ChainOfKnowledgeClient().ask(question, dataset));
      break;
    }

    case 'verify': {
      const claim = rest.join(' ');
      if (!claim) {
        console.error('Usage: verify <claim>');
        process.exit(1);
      }
      console.log(`Claim: "${claim}"\n`);
      const { label, result } = await new ChainOfKnowledgeClient().verify(claim);
      console.log(`Label: ${label}`);
      console.log(`(${(result.durationMs / 1000).toFixed(1)}s)`);
      break;
    }

    case 'search': {
      const domainArg = takeOption(rest, 'domain') ?? 'factual';
      if (!isDomain(domainArg)) {
        console.error(`Unknown domain: ${domainArg} (expected one of ${DOMAINS.join(', ')})`);
        process.exit(1);
      }
      const query = rest.join(' ');
      if (!query) {
        console.error('Usage: search <query> [--domain <domain>]');
        process.exit(1);
      }
      console.log(`Searching: "${query}" (domain: ${domainArg})`);
      const snippets = await new ChainOfKnowledgeClient().search(query, domainArg);
      if (snippets.length === 0) {
        console.log(NO_RESULTS);
      } else {
        for (const snippet of snippets) {
          console.log(`\n  ${snippet}`);
        }
      }
      break;
    }

    case 'help':
    default: {
      console.log(`
Chain-of-Knowledge CLI

Commands:
  ask <question>       Answer a question
    --dataset <hint>   Question style: fever, hotpotqa, medmcqa, mmlu_*
  verify <claim>       Verify a claim (SUPPORTS, REFUTES, NOT ENOUGH INFO)
  search <query>       Search the knowledge sources
    --domain <domain>  factual, medical, physics or biology (default: factual)
  help                 Show this help message

MCP Server:
  node dist/mcp/main.js
      `);
      break;
    }
  }
}

// Run CLI if this is the main module (argv[1] may be a bin symlink)
function isMainModule(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isMainModule()) {
  cli().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
