/**
 * HttpProviderAdapter
 * Generic OAuth 2.0 + JSON paging adapter, configured per provider
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import {
  ProviderPermanentError,
  ProviderTransientError,
  ProviderUnauthorizedError,
  TokenExchangeError,
  ValidationError,
  toErrorMessage,
} from '../../utils/errors.js';
import { isRecord } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';
import type { IntegrationProvider, ProviderCategory, TokenSet } from '../../types/index.js';
import { expandAccountUrl, type AccountInfoDefinition, type ProviderDefinition } from './definitions.js';
import type {
  AccountDescription,
  AuthorizationRequest,
  CodeExchangeRequest,
  ExchangedTokens,
  FetchPageRequest,
  FetchPageResult,
  ProviderAdapter,
  ProviderRateLimit,
  ProviderRecord,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ProviderCredentials {
  clientId: string;
  clientSecret: string;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1).optional(),
    expires_in: z.coerce.number().positive().optional(),
    token_type: z.string().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

type TokenResponse = z.infer<typeof tokenResponseSchema>;

const SHOP_DOMAIN_PATTERN = /^[a-z0-9][a-z0-9-]*\.myshopify\.com$/;

// ============================================================================
// HttpProviderAdapter Class
// ============================================================================

export class HttpProviderAdapter implements ProviderAdapter {
  readonly provider: IntegrationProvider;
  readonly category: ProviderCategory;
  readonly rateLimit: ProviderRateLimit;
  readonly defaultScopes: string[];
  readonly revoke?: (token: string, externalAccountId: string) => Promise<void>;
  readonly verifyCallback?: (params: Record<string, string>) => boolean;
  readonly describeAccount?: (
    accessToken: string,
    externalAccountId: string,
    signal?: AbortSignal
  ) => Promise<AccountDescription>;

  constructor(
    private readonly definition: ProviderDefinition,
    private readonly credentials: ProviderCredentials,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.provider = definition.provider;
    this.category = definition.category;
    this.rateLimit = definition.rateLimit;
    this.defaultScopes = definition.scopes;

    if (definition.revokeUrl) {
      const revokeUrl = definition.revokeUrl;
      this.revoke = (token, externalAccountId) => this.revokeAt(revokeUrl, token, externalAccountId);
    }
    if (definition.signsCallbacks) {
      this.verifyCallback = (params) => this.verifyHmac(params);
    }
    if (definition.accountInfo) {
      const accountInfo = definition.accountInfo;
      this.describeAccount = (accessToken, externalAccountId, signal) =>
        this.fetchAccountInfo(accountInfo, accessToken, externalAccountId, signal);
    }
  }

  // ==========================================================================
  // Authorization
  // ==========================================================================

  buildAuthorizationUrl(request: AuthorizationRequest): string {
    const account = this.resolveHintAccount(request.accountHint);

    const params = new URLSearchParams({
      client_id: this.credentials.clientId,
      redirect_uri: request.redirectUri,
      response_type: 'code',
      scope: request.scopes.join(this.definition.scopeSeparator),
      state: request.state,
      ...this.definition.extraAuthParams,
    });

    return `${expandAccountUrl(this.definition.authUrl, account ?? '')}?${params.toString()}`;
  }

  /**
   * Exchange the authorization code. Any failure is a TokenExchangeError:
   * codes are single-use, so nothing here is retried.
   */
  async exchangeCode(request: CodeExchangeRequest): Promise<ExchangedTokens> {
    const hintAccount =
      this.definition.accountId.from === 'hint'
        ? this.resolveHintAccount(
            request.callbackParams[this.definition.accountId.callbackParam] ?? request.accountHint
          )
        : undefined;

    try {
      const tokenUrl = expandAccountUrl(this.definition.tokenUrl, hintAccount ?? '');
      const tokens = await this.postTokenRequest(tokenUrl, {
        code: request.code,
        grant_type: 'authorization_code',
        redirect_uri: request.redirectUri,
      });

      const account = await this.resolveAccount(tokens, request.callbackParams, hintAccount);

      return {
        ...this.toTokenSet(tokens),
        externalAccountId: account.id,
        externalAccountName: account.name,
      };
    } catch (error) {
      logger.error('OAuth code exchange error', { provider: this.provider, error: toErrorMessage(error) });
      if (error instanceof TokenExchangeError) {
        throw error;
      }
      throw new TokenExchangeError(`${this.definition.displayName} rejected the authorization code`, {
        provider: this.provider,
        cause: toErrorMessage(error),
      });
    }
  }

  async refreshToken(refreshToken: string, externalAccountId: string): Promise<TokenSet> {
    const tokenUrl = expandAccountUrl(this.definition.tokenUrl, externalAccountId);
    const tokens = await this.postTokenRequest(tokenUrl, {
      refresh_token: refreshToken,
      grant_type: 'refresh_token',
    });
    return this.toTokenSet(tokens);
  }

  // ==========================================================================
  // Data
  // ==========================================================================

  async fetchPage(request: FetchPageRequest): Promise<FetchPageResult> {
    const paging = this.definition.paging;
    const url = new URL(expandAccountUrl(this.definition.dataUrl, request.externalAccountId));

    url.searchParams.set(paging.pageSizeParam, String(paging.pageSize));
    if (request.cursor) {
      url.searchParams.set(paging.cursorParam, request.cursor);
    }

    const since = request.params.since ?? (paging.syncTokenParam ? undefined : request.syncToken);
    if (since && paging.sinceParam) {
      url.searchParams.set(paging.sinceParam, since);
    }
    if (request.params.until && paging.untilParam) {
      url.searchParams.set(paging.untilParam, request.params.until);
    }
    if (request.syncToken && paging.syncTokenParam && !request.params.since) {
      url.searchParams.set(paging.syncTokenParam, request.syncToken);
    }
    for (const [key, value] of Object.entries(request.params.filters ?? {})) {
      url.searchParams.set(key, value);
    }

    const body = await this.requestJson(
      url.toString(),
      {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${request.accessToken}`,
          Accept: 'application/json',
        },
        signal: request.signal,
      },
      'fetch page'
    );

    return this.parsePage(body);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async fetchAccountInfo(
    accountInfo: AccountInfoDefinition,
    accessToken: string,
    externalAccountId: string,
    signal?: AbortSignal
  ): Promise<AccountDescription> {
    const body = await this.requestJson(
      expandAccountUrl(accountInfo.url, externalAccountId),
      {
        method: 'GET',
        headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' },
        signal,
      },
      'account info'
    );

    const profile = isRecord(body) && accountInfo.field ? body[accountInfo.field] : body;
    if (!isRecord(profile)) {
      throw new ProviderPermanentError(`${this.provider} account info is not a JSON object`);
    }

    const metadata: Record<string, unknown> = {};
    for (const field of accountInfo.metadataFields) {
      if (profile[field] !== undefined) {
        metadata[field] = profile[field];
      }
    }
    const name = profile[accountInfo.nameField];

    return { name: typeof name === 'string' ? name : undefined, metadata };
  }

  private async postTokenRequest(tokenUrl: string, fields: Record<string, string>): Promise<TokenResponse> {
    const params = new URLSearchParams(fields);
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };

    if (this.definition.clientAuth === 'basic') {
      const basic = Buffer.from(`${this.credentials.clientId}:${this.credentials.clientSecret}`).toString('base64');
      headers.Authorization = `Basic ${basic}`;
    } else {
      params.set('client_id', this.credentials.clientId);
      params.set('client_secret', this.credentials.clientSecret);
    }

    const body = await this.requestJson(
      tokenUrl,
      { method: 'POST', headers, body: params.toString() },
      'token request'
    );

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderPermanentError('Malformed token response', undefined, {
        provider: this.provider,
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }
    return parsed.data;
  }

  private async revokeAt(revokeUrl: string, token: string, externalAccountId: string): Promise<void> {
    const fields: Record<string, string> =
      this.definition.revokeBy === 'account'
        ? { client_id: this.credentials.clientId, stripe_user_id: externalAccountId }
        : { token };

    const headers: Record<string, string> = { 'Content-Type': 'application/x-www-form-urlencoded' };
    if (this.definition.clientAuth === 'basic') {
      const basic = Buffer.from(`${this.credentials.clientId}:${this.credentials.clientSecret}`).toString('base64');
      headers.Authorization = `Basic ${basic}`;
    } else if (this.definition.revokeBy === 'account') {
      headers.Authorization = `Bearer ${this.credentials.clientSecret}`;
    }

    await this.send(
      expandAccountUrl(revokeUrl, externalAccountId),
      { method: 'POST', headers, body: new URLSearchParams(fields).toString() },
      'revoke'
    );
  }

  /**
   * Perform a request and map non-2xx statuses onto the provider error taxonomy:
   * 408, 429, 5xx and network failures are transient; 401 is an auth failure;
   * any other 4xx is permanent.
   */
  private async send(url: string, init: RequestInit, operation: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      if (init.signal?.aborted) {
        throw init.signal.reason;
      }
      throw new ProviderTransientError(`${this.provider} ${operation} network error: ${toErrorMessage(error)}`);
    }

    if (response.ok) {
      return response;
    }

    const bodyText = await response.text().catch((error: unknown) => toErrorMessage(error));
    logger.warn('Provider request failed', {
      provider: this.provider,
      operation,
      status: response.status,
      body: bodyText.slice(0, 500),
    });

    const status = response.status;
    if (status === 401) {
      throw new ProviderUnauthorizedError();
    }
    if (status === 408 || status === 429 || status >= 500) {
      throw new ProviderTransientError(
        `${this.provider} ${operation} failed with status ${status}`,
        status,
        parseRetryAfter(response.headers.get('retry-after'))
      );
    }
    throw new ProviderPermanentError(`${this.provider} ${operation} failed with status ${status}`, status, {
      provider: this.provider,
    });
  }

  private async requestJson(url: string, init: RequestInit, operation: string): Promise<unknown> {
    const response = await this.send(url, init, operation);
    try {
      return await response.json();
    } catch (error) {
      if (init.signal?.aborted) {
        throw init.signal.reason;
      }
      throw new ProviderPermanentError(`${this.provider} ${operation} returned malformed JSON`, response.status, {
        cause: toErrorMessage(error),
      });
    }
  }

  private parsePage(body: unknown): FetchPageResult {
    const paging = this.definition.paging;
    if (!isRecord(body)) {
      throw new ProviderPermanentError(`${this.provider} page is not a JSON object`);
    }

    const rawRecords = body[paging.recordsField];
    if (!Array.isArray(rawRecords)) {
      throw new ProviderPermanentError(`${this.provider} page has no "${paging.recordsField}" array`);
    }

    const records: ProviderRecord[] = rawRecords.map((raw, index) => {
      const id = isRecord(raw) ? raw[paging.idField] : undefined;
      if (!isRecord(raw) || (typeof id !== 'string' && typeof id !== 'number')) {
        throw new ProviderPermanentError(`${this.provider} record ${index} has no "${paging.idField}"`);
      }
      return { externalId: String(id), payload: raw };
    });

    const lastId = records.length > 0 ? records[records.length - 1].externalId : undefined;
    let nextCursor: string | undefined;
    switch (paging.nextCursor.kind) {
      case 'field': {
        const value = body[paging.nextCursor.field];
        nextCursor = typeof value === 'string' && value.length > 0 ? value : undefined;
        break;
      }
      case 'hasMore':
        nextCursor = body[paging.nextCursor.field] === true ? lastId : undefined;
        break;
      case 'fullPage':
        nextCursor = records.length >= paging.pageSize ? lastId : undefined;
        break;
    }

    const syncTokenValue = paging.syncTokenField ? body[paging.syncTokenField] : undefined;

    return {
      records,
      nextCursor,
      syncToken: typeof syncTokenValue === 'string' ? syncTokenValue : undefined,
    };
  }

  private toTokenSet(tokens: TokenResponse): TokenSet {
    const scopes = tokens.scope
      ? tokens.scope.split(/[\s,]+/).filter(Boolean)
      : this.defaultScopes;

    return {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token,
      tokenType: tokens.token_type ?? 'Bearer',
      scopes,
      expiresIn: tokens.expires_in,
    };
  }

  private async resolveAccount(
    tokens: TokenResponse,
    callbackParams: Record<string, string>,
    hintAccount: string | undefined
  ): Promise<{ id: string; name?: string }> {
    const source = this.definition.accountId;

    switch (source.from) {
      case 'hint':
        if (!hintAccount) {
          throw new TokenExchangeError('Callback did not identify the account', { provider: this.provider });
        }
        return { id: hintAccount, name: hintAccount };

      case 'callback': {
        const id = callbackParams[source.param];
        if (!id) {
          throw new TokenExchangeError(`Callback is missing "${source.param}"`, { provider: this.provider });
        }
        return { id };
      }

      case 'token':
        return readAccountFields(tokens, source.idField, source.nameField, this.provider);

      case 'userinfo': {
        const body = await this.requestJson(
          source.url,
          { method: 'GET', headers: { Authorization: `Bearer ${tokens.access_token}` } },
          'userinfo'
        );
        if (!isRecord(body)) {
          throw new TokenExchangeError('Malformed account lookup response', { provider: this.provider });
        }
        return readAccountFields(body, source.idField, source.nameField, this.provider);
      }
    }
  }

  private resolveHintAccount(hint: string | null | undefined): string | undefined {
    if (this.definition.accountId.from !== 'hint') {
      return undefined;
    }
    const shop = hint?.trim().toLowerCase();
    if (!shop || !SHOP_DOMAIN_PATTERN.test(shop)) {
      throw new ValidationError(`A valid ${this.definition.displayName} account domain is required`, {
        provider: this.provider,
      });
    }
    return shop;
  }

  /**
   * Verify an HMAC-SHA256 signed callback: the `hmac` parameter is removed,
   * the remaining parameters are sorted and joined as `k=v&k=v`.
   */
  private verifyHmac(params: Record<string, string>): boolean {
    const provided = params.hmac;
    if (!provided) {
      return false;
    }

    const message = Object.keys(params)
      .filter((key) => key !== 'hmac' && key !== 'signature')
      .sort()
      .map((key) => `${key}=${params[key]}`)
      .join('&');

    const expected = createHmac('sha256', this.credentials.clientSecret).update(message).digest('hex');
    const expectedBuffer = Buffer.from(expected, 'utf8');
    const providedBuffer = Buffer.from(provided, 'utf8');

    return expectedBuffer.length === providedBuffer.length && timingSafeEqual(expectedBuffer, providedBuffer);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function readAccountFields(
  source: Record<string, unknown>,
  idField: string,
  nameField: string | undefined,
  provider: IntegrationProvider
): { id: string; name?: string } {
  const id = source[idField];
  if (typeof id !== 'string' && typeof id !== 'number') {
    throw new TokenExchangeError(`Provider response is missing "${idField}"`, { provider });
  }
  const name = nameField ? source[nameField] : undefined;
  return { id: String(id), name: typeof name === 'string' ? name : undefined };
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

