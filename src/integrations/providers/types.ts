/**
 * Provider adapter contract
 * The sync engine and handshake manager only ever talk to providers through this.
 */

import type {
  IntegrationProvider,
  ProviderCategory,
  SyncJobParams,
  TokenSet,
} from '../../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface AuthorizationRequest {
  state: string;
  redirectUri: string;
  scopes: string[];
  accountHint?: string | null;
}

export interface CodeExchangeRequest {
  code: string;
  redirectUri: string;
  accountHint?: string | null;
  /** Raw query parameters the provider sent to the callback */
  callbackParams: Record<string, string>;
}

export interface ExchangedTokens extends TokenSet {
  externalAccountId: string;
  externalAccountName?: string;
}

export interface ProviderRecord {
  externalId: string;
  payload: Record<string, unknown>;
}

export interface FetchPageRequest {
  accessToken: string;
  externalAccountId: string;
  cursor?: string;
  params: SyncJobParams;
  /** Incremental sync marker returned by the previous completed sync */
  syncToken?: string;
  signal?: AbortSignal;
}

export interface FetchPageResult {
  records: ProviderRecord[];
  nextCursor?: string;
  syncToken?: string;
}

export interface AccountDescription {
  name?: string;
  metadata: Record<string, unknown>;
}

export interface ProviderRateLimit {
  limit: number;
  windowMs: number;
}

export interface ProviderAdapter {
  readonly provider: IntegrationProvider;
  readonly category: ProviderCategory;
  readonly rateLimit: ProviderRateLimit;
  readonly defaultScopes: string[];

  buildAuthorizationUrl(request: AuthorizationRequest): string;
  exchangeCode(request: CodeExchangeRequest): Promise<ExchangedTokens>;
  refreshToken(refreshToken: string, externalAccountId: string): Promise<TokenSet>;
  fetchPage(request: FetchPageRequest): Promise<FetchPageResult>;

  /** Present only for providers with a revocation endpoint */
  revoke?(token: string, externalAccountId: string): Promise<void>;
  /** Present only for providers that sign their callback query string */
  verifyCallback?(params: Record<string, string>): boolean;
  /** Present only for providers with an account profile endpoint */
  describeAccount?(accessToken: string, externalAccountId: string, signal?: AbortSignal): Promise<AccountDescription>;
}
