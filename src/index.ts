/**
 * Credential Canonicalizer - request handler
 *
 * Fetch-style entry point: normalizes raw dump records into canonical
 * accounts and classifies search queries. Any host that speaks the web
 * Request/Response API can serve it.
 */

import { z } from 'zod';
import { isBase64 } from './lib/codec';
import { parseConfig, type IngestConfig } from './lib/config';
import { ConfigError, isCredentialError } from './lib/errors';
import { validateQueryType } from './lib/validation';
import { corsHeaders, unauthorizedResponse, validateApiKey } from './middleware/auth';
import { ingestBatch } from './services/ingestion';
import type { Env, HealthResponse, NormalizeResponse, QueryValidationResponse } from './types';

export { Account, AccountMetadata } from './lib/account';
export { accountId, domainChunkOf, parseAccountId, recoverEmail } from './lib/identity';
export { fromDocument, toDocument, toPresentation } from './lib/document';
export {
  findEmail,
  isDomain,
  isEmail,
  isFuzzyEmail,
  isHash,
  passwordBaseWords,
  validateQueryType,
} from './lib/validation';
export { CodecError, ConfigError, QueryValidationError, RecordConstructionError } from './lib/errors';
export { ingestBatch } from './services/ingestion';

const VERSION = '1.0.0';

// =============================================================================
// REQUEST SCHEMAS
// =============================================================================

const RECORD_FIELDS = ['email', 'username', 'password', 'hash', 'misc'] as const;

const rawRecordSchema = z
  .object({
    email: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    hash: z.string().optional(),
    misc: z.string().optional(),
    encoding: z.enum(['utf8', 'base64']).optional(),
    source: z.string().min(1).optional(),
  })
  .superRefine((record, ctx) => {
    if (record.encoding !== 'base64') {
      return;
    }
    for (const field of RECORD_FIELDS) {
      const value = record[field];
      if (value !== undefined && !isBase64(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: 'Invalid base64' });
      }
    }
  });

const normalizeRequestSchema = z.object({
  records: z.array(rawRecordSchema),
  strict: z.boolean().optional(),
  source: z.string().min(1).optional(),
});

const queryRequestSchema = z.object({
  query: z.string(),
  type: z.string().optional(),
});

// =============================================================================
// HELPERS
// =============================================================================

function jsonResponse(data: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      ...corsHeaders,
      'Content-Type': 'application/json',
    },
  });
}

function errorResponse(message: string, status: number = 400, details?: string): Response {
  return jsonResponse(details ? { error: message, details } : { error: message }, status);
}

async function readBody<T>(request: Request, schema: z.ZodType<T>): Promise<T | Response> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return errorResponse('Invalid JSON body', 400);
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    return errorResponse('Invalid request body', 400, `${issue.path.join('.')}: ${issue.message}`);
  }
  return result.data;
}

// =============================================================================
// HANDLERS
// =============================================================================

async function handleNormalize(request: Request, config: IngestConfig): Promise<Response> {
  const body = await readBody(request, normalizeRequestSchema);
  if (body instanceof Response) {
    return body;
  }

  if (body.records.length > config.maxBatchSize) {
    return errorResponse(`Batch too large: ${body.records.length} records (max ${config.maxBatchSize})`, 413);
  }

  const result: NormalizeResponse = ingestBatch(body.records, {
    strict: body.strict ?? config.strict,
    quiet: config.quiet,
    source: body.source ?? config.source,
  });
  return jsonResponse(result);
}

async function handleValidateQuery(request: Request): Promise<Response> {
  const body = await readBody(request, queryRequestSchema);
  if (body instanceof Response) {
    return body;
  }

  const response: QueryValidationResponse = {
    query: body.query,
    type: validateQueryType(body.query, body.type),
  };
  return jsonResponse(response);
}

function handleHealth(): Response {
  const health: HealthResponse = {
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: VERSION,
  };
  return jsonResponse(health);
}

// =============================================================================
// MAIN HANDLER
// =============================================================================

export default {
  async fetch(request: Request, env: Env): Promise<Response> {
    const url = new URL(request.url);
    const path = url.pathname;

    // Handle CORS preflight
    if (request.method === 'OPTIONS') {
      return new Response(null, { headers: corsHeaders });
    }

    // Public endpoints (no auth required)
    if (path === '/api/health') {
      return handleHealth();
    }

    if (!validateApiKey(request, env).isAuthenticated) {
      return unauthorizedResponse('Invalid or missing API key');
    }

    try {
      const config = parseConfig(env.CONFIG_YAML);

      if (path === '/api/accounts/normalize' && request.method === 'POST') {
        return await handleNormalize(request, config);
      }

      if (path === '/api/query/validate' && request.method === 'POST') {
        return await handleValidateQuery(request);
      }

      return errorResponse('Not found', 404);
    } catch (error) {
      if (isCredentialError(error) && !(error instanceof ConfigError)) {
        return errorResponse(error.message, 400);
      }
      console.error('Request error:', error);
      return errorResponse(error instanceof Error ? error.message : 'Internal error', 500);
    }
  },
};
