import { createHmac } from 'crypto';
import { describe, expect, it } from 'vitest';
import {
  ProviderPermanentError,
  ProviderTransientError,
  ProviderUnauthorizedError,
  TokenExchangeError,
  ValidationError,
} from '../../utils/errors.js';
import { PROVIDER_DEFINITIONS } from './definitions.js';
import { HttpProviderAdapter, type FetchLike } from './HttpProviderAdapter.js';

const CREDENTIALS = { clientId: 'test-client', clientSecret: 'test-secret' };

interface RecordedRequest {
  url: string;
  method?: string;
  headers: Headers;
  body?: string;
}

function fakeFetch(...responses: Array<Response | Error>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    requests.push({
      url,
      method: init?.method,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });
    const next = responses.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  return { fetchImpl, requests };
}

function json(body: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

const FETCH_REQUEST = {
  accessToken: 'test-access-token',
  externalAccountId: 'acme.myshopify.com',
  params: {},
};

describe('HttpProviderAdapter', () => {
  describe('authorization', () => {
    it('should build the consent URL on the tenant shop domain', () => {
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS);

      const url = new URL(
        adapter.buildAuthorizationUrl({
          state: 'state-1',
          redirectUri: 'http://localhost:3000/api/integrations/shopify/callback',
          scopes: adapter.defaultScopes,
          accountHint: ' Acme.myshopify.com ',
        })
      );

      expect(url.origin).toBe('https://acme.myshopify.com');
      expect(url.pathname).toBe('/admin/oauth/authorize');
      expect(url.searchParams.get('client_id')).toBe('test-client');
      expect(url.searchParams.get('state')).toBe('state-1');
      expect(url.searchParams.get('response_type')).toBe('code');
      expect(url.searchParams.get('scope')).toBe('read_orders,read_products,read_customers,read_inventory');
    });

    it('should refuse a shop hint that is not a shop domain', () => {
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS);

      expect(() =>
        adapter.buildAuthorizationUrl({ state: 's', redirectUri: 'http://localhost/cb', scopes: [], accountHint: 'evil.example.com' })
      ).toThrow(ValidationError);
    });

    it('should add the offline access parameters for Google', () => {
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.GOOGLE_SHEETS, CREDENTIALS);

      const url = new URL(
        adapter.buildAuthorizationUrl({ state: 's', redirectUri: 'http://localhost/cb', scopes: ['openid', 'email'] })
      );

      expect(url.searchParams.get('access_type')).toBe('offline');
      expect(url.searchParams.get('prompt')).toBe('consent');
      expect(url.searchParams.get('scope')).toBe('openid email');
    });
  });

  describe('verifyCallback', () => {
    const params = { code: 'abc', shop: 'acme.myshopify.com', state: 'state-1', timestamp: '1772441999' };
    const signature = createHmac('sha256', 'test-secret')
      .update('code=abc&shop=acme.myshopify.com&state=state-1&timestamp=1772441999')
      .digest('hex');

    it('should accept a correctly signed callback', () => {
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS);

      expect(adapter.verifyCallback?.({ ...params, hmac: signature })).toBe(true);
    });

    it('should reject a tampered or unsigned callback', () => {
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS);

      expect(adapter.verifyCallback?.({ ...params, state: 'state-2', hmac: signature })).toBe(false);
      expect(adapter.verifyCallback?.(params)).toBe(false);
    });

    it('should only exist for providers that sign callbacks', () => {
      expect(new HttpProviderAdapter(PROVIDER_DEFINITIONS.STRIPE, CREDENTIALS).verifyCallback).toBeUndefined();
    });
  });

  describe('token endpoint', () => {
    it('should exchange a QuickBooks code with basic auth and take the realm from the callback', async () => {
      const { fetchImpl, requests } = fakeFetch(
        json({ access_token: 'qb-access', refresh_token: 'qb-refresh', expires_in: 3600, token_type: 'bearer' })
      );
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.QUICKBOOKS, CREDENTIALS, fetchImpl);

      const exchanged = await adapter.exchangeCode({
        code: 'test-code',
        redirectUri: 'http://localhost/cb',
        callbackParams: { code: 'test-code', realmId: 'realm-1', state: 's' },
      });

      expect(exchanged).toEqual({
        accessToken: 'qb-access',
        refreshToken: 'qb-refresh',
        tokenType: 'bearer',
        scopes: ['com.intuit.quickbooks.accounting'],
        expiresIn: 3600,
        externalAccountId: 'realm-1',
        externalAccountName: undefined,
      });
      expect(requests[0].url).toBe('https://oauth.platform.intuit.com/oauth2/v1/tokens/bearer');
      expect(requests[0].headers.get('authorization')).toBe(
        `Basic ${Buffer.from('test-client:test-secret').toString('base64')}`
      );
      const body = new URLSearchParams(requests[0].body);
      expect(body.get('grant_type')).toBe('authorization_code');
      expect(body.get('client_secret')).toBeNull();
    });

    it('should take the Stripe account id from the token response', async () => {
      const { fetchImpl, requests } = fakeFetch(
        json({ access_token: 'sk-access', refresh_token: 'sk-refresh', scope: 'read_only', stripe_user_id: 'acct_123' })
      );
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.STRIPE, CREDENTIALS, fetchImpl);

      const exchanged = await adapter.exchangeCode({ code: 'test-code', redirectUri: 'http://localhost/cb', callbackParams: {} });

      expect(exchanged.externalAccountId).toBe('acct_123');
      expect(exchanged.expiresIn).toBeUndefined();
      expect(new URLSearchParams(requests[0].body).get('client_secret')).toBe('test-secret');
    });

    it('should turn a rejected code into a token exchange error', async () => {
      const { fetchImpl } = fakeFetch(json({ error: 'invalid_grant' }, 400));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.QUICKBOOKS, CREDENTIALS, fetchImpl);

      const exchange = adapter.exchangeCode({
        code: 'used-code',
        redirectUri: 'http://localhost/cb',
        callbackParams: { realmId: 'realm-1' },
      });

      await expect(exchange).rejects.toBeInstanceOf(TokenExchangeError);
      await expect(exchange).rejects.toThrow('QuickBooks Online rejected the authorization code');
    });

    it('should refresh against the shop token endpoint', async () => {
      const { fetchImpl, requests } = fakeFetch(json({ access_token: 'new-access' }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      const tokens = await adapter.refreshToken('test-refresh-token', 'acme.myshopify.com');

      expect(tokens).toEqual({
        accessToken: 'new-access',
        refreshToken: undefined,
        tokenType: 'Bearer',
        scopes: PROVIDER_DEFINITIONS.SHOPIFY.scopes,
        expiresIn: undefined,
      });
      expect(requests[0].url).toBe('https://acme.myshopify.com/admin/oauth/access_token');
      expect(new URLSearchParams(requests[0].body).get('refresh_token')).toBe('test-refresh-token');
    });

    it('should reject a token response without an access token', async () => {
      const { fetchImpl } = fakeFetch(json({ token_type: 'Bearer' }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      await expect(adapter.refreshToken('test-refresh-token', 'acme.myshopify.com')).rejects.toBeInstanceOf(
        ProviderPermanentError
      );
    });
  });

  describe('fetchPage', () => {
    it('should request a Shopify page and stop on a short page', async () => {
      const { fetchImpl, requests } = fakeFetch(json({ orders: [{ id: 101, total: '9.99' }, { id: 102 }] }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      const page = await adapter.fetchPage({
        ...FETCH_REQUEST,
        cursor: '100',
        params: { since: '2026-01-01T00:00:00.000Z' },
      });

      expect(page.records).toEqual([
        { externalId: '101', payload: { id: 101, total: '9.99' } },
        { externalId: '102', payload: { id: 102 } },
      ]);
      expect(page.nextCursor).toBeUndefined();
      const url = new URL(requests[0].url);
      expect(url.searchParams.get('limit')).toBe('250');
      expect(url.searchParams.get('since_id')).toBe('100');
      expect(url.searchParams.get('updated_at_min')).toBe('2026-01-01T00:00:00.000Z');
      expect(requests[0].headers.get('authorization')).toBe('Bearer test-access-token');
    });

    it('should continue after the last Stripe id while more data is flagged', async () => {
      const { fetchImpl } = fakeFetch(json({ data: [{ id: 'ch_1' }, { id: 'ch_2' }], has_more: true }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.STRIPE, CREDENTIALS, fetchImpl);

      const page = await adapter.fetchPage({ ...FETCH_REQUEST, externalAccountId: 'acct_123' });

      expect(page.nextCursor).toBe('ch_2');
    });

    it('should send and return the Google change token', async () => {
      const { fetchImpl, requests } = fakeFetch(json({ files: [{ id: 'file-1' }], newStartPageToken: 'token-9' }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.GOOGLE_SHEETS, CREDENTIALS, fetchImpl);

      const page = await adapter.fetchPage({ ...FETCH_REQUEST, externalAccountId: 'sub-1', syncToken: 'token-8' });

      expect(new URL(requests[0].url).searchParams.get('startPageToken')).toBe('token-8');
      expect(page.syncToken).toBe('token-9');
    });

    it('should map 5xx to a transient error', async () => {
      const { fetchImpl } = fakeFetch(new Response('unavailable', { status: 503 }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      const fetchPage = adapter.fetchPage(FETCH_REQUEST);

      await expect(fetchPage).rejects.toBeInstanceOf(ProviderTransientError);
      await expect(fetchPage).rejects.toMatchObject({ httpStatus: 503 });
    });

    it('should carry Retry-After on a 429', async () => {
      const { fetchImpl } = fakeFetch(new Response('slow down', { status: 429, headers: { 'Retry-After': '7' } }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      await expect(adapter.fetchPage(FETCH_REQUEST)).rejects.toMatchObject({ httpStatus: 429, retryAfterMs: 7000 });
    });

    it('should map 401 to an unauthorized error', async () => {
      const { fetchImpl } = fakeFetch(new Response('', { status: 401 }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      await expect(adapter.fetchPage(FETCH_REQUEST)).rejects.toBeInstanceOf(ProviderUnauthorizedError);
    });

    it('should map other 4xx to a permanent error', async () => {
      const { fetchImpl } = fakeFetch(new Response('not found', { status: 404 }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      await expect(adapter.fetchPage(FETCH_REQUEST)).rejects.toBeInstanceOf(ProviderPermanentError);
    });

    it('should treat network failures as transient', async () => {
      const { fetchImpl } = fakeFetch(new Error('ECONNRESET'));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      await expect(adapter.fetchPage(FETCH_REQUEST)).rejects.toBeInstanceOf(ProviderTransientError);
    });

    it('should reject a page without the records array', async () => {
      const { fetchImpl } = fakeFetch(json({ unexpected: true }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      await expect(adapter.fetchPage(FETCH_REQUEST)).rejects.toThrow('SHOPIFY page has no "orders" array');
    });
  });

  describe('describeAccount', () => {
    it('should read the shop profile and keep the listed fields', async () => {
      const { fetchImpl, requests } = fakeFetch(
        json({
          shop: {
            id: 1,
            name: 'Acme Retail',
            domain: 'acme.example',
            currency: 'EUR',
            plan_name: 'basic',
            customer_email: 'owner@acme.example',
          },
        })
      );
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      const account = await adapter.describeAccount?.('test-access-token', 'acme.myshopify.com');

      expect(requests[0].url).toBe('https://acme.myshopify.com/admin/api/2024-01/shop.json');
      expect(requests[0].headers.get('authorization')).toBe('Bearer test-access-token');
      expect(account).toEqual({
        name: 'Acme Retail',
        metadata: { domain: 'acme.example', currency: 'EUR', plan_name: 'basic' },
      });
    });

    it('should reject a profile response without the profile object', async () => {
      const { fetchImpl } = fakeFetch(json({ errors: 'Not Found' }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS, fetchImpl);

      await expect(adapter.describeAccount?.('test-access-token', 'acme.myshopify.com')).rejects.toBeInstanceOf(
        ProviderPermanentError
      );
    });

    it('should only exist for providers with a profile endpoint', () => {
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.STRIPE, CREDENTIALS);

      expect(adapter.describeAccount).toBeUndefined();
    });
  });

  describe('revoke', () => {
    it('should deauthorize a Stripe account by id', async () => {
      const { fetchImpl, requests } = fakeFetch(json({ stripe_user_id: 'acct_123' }));
      const adapter = new HttpProviderAdapter(PROVIDER_DEFINITIONS.STRIPE, CREDENTIALS, fetchImpl);

      await adapter.revoke?.('test-access-token', 'acct_123');

      expect(requests[0].url).toBe('https://connect.stripe.com/oauth/deauthorize');
      expect(new URLSearchParams(requests[0].body).get('stripe_user_id')).toBe('acct_123');
      expect(requests[0].headers.get('authorization')).toBe('Bearer test-secret');
    });

    it('should not exist for Shopify', () => {
      expect(new HttpProviderAdapter(PROVIDER_DEFINITIONS.SHOPIFY, CREDENTIALS).revoke).toBeUndefined();
    });
  });
});
