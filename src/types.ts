/**
 * Shared Type Definitions
 */

import type { AccountPresentation, AccountDocument } from './lib/document';

// =============================================================================
// ENVIRONMENT TYPES
// =============================================================================

export interface Env {
  API_SECRET_KEY?: string;
  CONFIG_YAML?: string;
}

// =============================================================================
// INGESTION TYPES
// =============================================================================

export type RawFieldEncoding = 'utf8' | 'base64';

export interface RawRecordInput {
  email?: string;
  username?: string;
  password?: string;
  hash?: string;
  misc?: string;
  encoding?: RawFieldEncoding;
  source?: string;
}

export interface IngestedAccount extends AccountPresentation {
  sources: string[];
}

export interface SkippedRecord {
  index: number;
  reason: string;
}

// =============================================================================
// REQUEST/RESPONSE TYPES
// =============================================================================

export interface NormalizeResponse {
  accounts: IngestedAccount[];
  documents: AccountDocument[];
  skipped: SkippedRecord[];
  duplicates: number;
}

export interface QueryValidationResponse {
  query: string;
  type: 'email' | 'domain';
}

export interface ErrorResponse {
  error: string;
  details?: string;
}

export interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  version?: string;
}

// =============================================================================
// AUTH TYPES
// =============================================================================

export interface AuthContext {
  isAuthenticated: boolean;
}
