/**
 * Authentication Middleware
 *
 * Handles API key validation.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { Env, AuthContext } from '../types';

// CORS headers for all responses
export const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization, X-API-Key',
};

/**
 * Hash a string using SHA-256
 */
function hashApiKey(key: string): Buffer {
  return createHash('sha256').update(key).digest();
}

/**
 * Extract API key from request headers
 */
function extractApiKey(request: Request): string | null {
  // Check X-API-Key header first
  const apiKeyHeader = request.headers.get('X-API-Key');
  if (apiKeyHeader) {
    return apiKeyHeader;
  }

  // Check Authorization header (Bearer token)
  const authHeader = request.headers.get('Authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.slice(7);
  }

  return null;
}

/**
 * Validate API key against the configured secret
 */
export function validateApiKey(request: Request, env: Env): AuthContext {
  // If no API_SECRET_KEY is configured, allow all requests (development mode)
  if (!env.API_SECRET_KEY) {
    return { isAuthenticated: true };
  }

  const apiKey = extractApiKey(request);

  if (!apiKey) {
    return { isAuthenticated: false };
  }

  if (!timingSafeEqual(hashApiKey(apiKey), hashApiKey(env.API_SECRET_KEY))) {
    return { isAuthenticated: false };
  }

  return { isAuthenticated: true };
}

/**
 * Create authentication error response
 */
export function unauthorizedResponse(message: string = 'Unauthorized'): Response {
  return new Response(
    JSON.stringify({ error: message }),
    {
      status: 401,
      headers: {
        ...corsHeaders,
        'Content-Type': 'application/json',
        'WWW-Authenticate': 'Bearer realm="Credential API"',
      },
    }
  );
}
