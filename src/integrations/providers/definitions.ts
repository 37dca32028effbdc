/**
 * Static description of each supported provider's OAuth and paging endpoints.
 * `{account}` in a URL is replaced with the integration's external account id.
 */

import type { IntegrationProvider, ProviderCategory } from '../../types/index.js';
import type { ProviderRateLimit } from './types.js';

export type AccountIdSource =
  /** Supplied by the tenant when connecting and echoed back on the callback (shop domain) */
  | { from: 'hint'; callbackParam: string }
  /** Sent by the provider as a callback query parameter */
  | { from: 'callback'; param: string }
  /** Returned in the token response body */
  | { from: 'token'; idField: string; nameField?: string }
  /** Looked up with the fresh access token */
  | { from: 'userinfo'; url: string; idField: string; nameField?: string };

export type NextCursorSource =
  | { kind: 'field'; field: string }
  /** Cursor is the last record id while the response flags more data */
  | { kind: 'hasMore'; field: string }
  /** Cursor is the last record id while pages come back full */
  | { kind: 'fullPage' };

export interface AccountInfoDefinition {
  url: string;
  /** Object in the response body holding the profile; the body itself when absent */
  field?: string;
  nameField: string;
  /** Profile fields copied into the integration's metadata */
  metadataFields: string[];
}

export interface PagingDefinition {
  recordsField: string;
  idField: string;
  cursorParam: string;
  nextCursor: NextCursorSource;
  pageSizeParam: string;
  pageSize: number;
  sinceParam?: string;
  untilParam?: string;
  syncTokenParam?: string;
  syncTokenField?: string;
}

export interface ProviderDefinition {
  provider: IntegrationProvider;
  displayName: string;
  category: ProviderCategory;
  authUrl: string;
  tokenUrl: string;
  revokeUrl?: string;
  /** What the revocation endpoint identifies: the token itself or the connected account */
  revokeBy?: 'token' | 'account';
  dataUrl: string;
  scopes: string[];
  scopeSeparator: ' ' | ',';
  /** How client credentials are presented to the token endpoint */
  clientAuth: 'body' | 'basic';
  extraAuthParams?: Record<string, string>;
  accountId: AccountIdSource;
  accountInfo?: AccountInfoDefinition;
  paging: PagingDefinition;
  rateLimit: ProviderRateLimit;
  /** Provider signs callback query strings with the client secret (HMAC-SHA256) */
  signsCallbacks: boolean;
}

export const PROVIDER_DEFINITIONS: Record<IntegrationProvider, ProviderDefinition> = {
  SHOPIFY: {
    provider: 'SHOPIFY',
    displayName: 'Shopify',
    category: 'ECOMMERCE',
    authUrl: 'https://{account}/admin/oauth/authorize',
    tokenUrl: 'https://{account}/admin/oauth/access_token',
    dataUrl: 'https://{account}/admin/api/2024-01/orders.json',
    scopes: ['read_orders', 'read_products', 'read_customers', 'read_inventory'],
    scopeSeparator: ',',
    clientAuth: 'body',
    accountId: { from: 'hint', callbackParam: 'shop' },
    accountInfo: {
      url: 'https://{account}/admin/api/2024-01/shop.json',
      field: 'shop',
      nameField: 'name',
      metadataFields: ['domain', 'email', 'currency', 'iana_timezone', 'plan_name'],
    },
    paging: {
      recordsField: 'orders',
      idField: 'id',
      cursorParam: 'since_id',
      nextCursor: { kind: 'fullPage' },
      pageSizeParam: 'limit',
      pageSize: 250,
      sinceParam: 'updated_at_min',
      untilParam: 'updated_at_max',
    },
    rateLimit: { limit: 120, windowMs: 60_000 },
    signsCallbacks: true,
  },

  QUICKBOOKS: {
    provider: 'QUICKBOOKS',
    displayName: 'QuickBooks Online',
    category: 'ACCOUNTING',
    authUrl: 'https://appcenter.intuit.com/connect/oauth2',
    tokenUrl: 'https://oauth.platform.intuit.com/oauth2/v1/tokens/bearer',
    revokeUrl: 'https://developer.api.intuit.com/v2/oauth2/tokens/revoke',
    revokeBy: 'token',
    dataUrl: 'https://quickbooks.api.intuit.com/v3/company/{account}/invoices',
    scopes: ['com.intuit.quickbooks.accounting'],
    scopeSeparator: ' ',
    clientAuth: 'basic',
    accountId: { from: 'callback', param: 'realmId' },
    paging: {
      recordsField: 'records',
      idField: 'Id',
      cursorParam: 'cursor',
      nextCursor: { kind: 'field', field: 'next_cursor' },
      pageSizeParam: 'maxresults',
      pageSize: 100,
      sinceParam: 'changed_since',
    },
    rateLimit: { limit: 500, windowMs: 60_000 },
    signsCallbacks: false,
  },

  STRIPE: {
    provider: 'STRIPE',
    displayName: 'Stripe',
    category: 'PAYMENTS',
    authUrl: 'https://connect.stripe.com/oauth/authorize',
    tokenUrl: 'https://connect.stripe.com/oauth/token',
    revokeUrl: 'https://connect.stripe.com/oauth/deauthorize',
    revokeBy: 'account',
    dataUrl: 'https://api.stripe.com/v1/charges',
    scopes: ['read_only'],
    scopeSeparator: ' ',
    clientAuth: 'body',
    accountId: { from: 'token', idField: 'stripe_user_id' },
    paging: {
      recordsField: 'data',
      idField: 'id',
      cursorParam: 'starting_after',
      nextCursor: { kind: 'hasMore', field: 'has_more' },
      pageSizeParam: 'limit',
      pageSize: 100,
      sinceParam: 'created[gte]',
      untilParam: 'created[lte]',
    },
    rateLimit: { limit: 100, windowMs: 1_000 },
    signsCallbacks: false,
  },

  GOOGLE_SHEETS: {
    provider: 'GOOGLE_SHEETS',
    displayName: 'Google Sheets',
    category: 'SPREADSHEET',
    authUrl: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenUrl: 'https://oauth2.googleapis.com/token',
    revokeUrl: 'https://oauth2.googleapis.com/revoke',
    revokeBy: 'token',
    dataUrl: 'https://www.googleapis.com/drive/v3/files',
    scopes: [
      'openid',
      'email',
      'https://www.googleapis.com/auth/spreadsheets.readonly',
      'https://www.googleapis.com/auth/drive.metadata.readonly',
    ],
    scopeSeparator: ' ',
    clientAuth: 'body',
    extraAuthParams: { access_type: 'offline', prompt: 'consent' },
    accountId: {
      from: 'userinfo',
      url: 'https://openidconnect.googleapis.com/v1/userinfo',
      idField: 'sub',
      nameField: 'email',
    },
    paging: {
      recordsField: 'files',
      idField: 'id',
      cursorParam: 'pageToken',
      nextCursor: { kind: 'field', field: 'nextPageToken' },
      pageSizeParam: 'pageSize',
      pageSize: 100,
      syncTokenParam: 'startPageToken',
      syncTokenField: 'newStartPageToken',
    },
    rateLimit: { limit: 60, windowMs: 60_000 },
    signsCallbacks: false,
  },
};

export function expandAccountUrl(template: string, externalAccountId: string): string {
  return template.replaceAll('{account}', encodeURIComponent(externalAccountId));
}
