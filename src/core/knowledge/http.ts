/**
 * Timed GET requests for knowledge sources
 */

import type { z } from 'zod';
import { KnowledgeSourceError } from '../../utils/errors.js';
import type { SourceOptions } from './types.js';

export interface GetOptions extends SourceOptions {
  source: string;
  accept?: string;
}

/**
 * GET a URL, rejecting with KnowledgeSourceError on timeout or a non-2xx status
 */
export async function httpGet(url: string, options: GetOptions): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeout);

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': options.userAgent,
        Accept: options.accept ?? 'application/json',
      },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new KnowledgeSourceError(
        `${options.source} request failed with status ${response.status}`,
        options.source,
        response.status
      );
    }
    return response;
  } catch (error) {
    if (error instanceof KnowledgeSourceError) throw error;
    if (error instanceof Error && error.name === 'AbortError') {
      throw new KnowledgeSourceError(`${options.source} request timed out after ${options.timeout}ms`, options.source);
    }
    throw new KnowledgeSourceError(
      `${options.source} request failed: ${error instanceof Error ? error.message : String(error)}`,
      options.source,
      undefined,
      { cause: error }
    );
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * GET a JSON document and validate it against a schema
 */
export async function getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: GetOptions): Promise<T> {
  const response = await httpGet(url, options);
  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new KnowledgeSourceError(`${options.source} returned an unexpected response shape`, options.source);
  }
  return parsed.data;
}
