import { config, type ProviderEnvConfig } from '../../config/index.js';
import { ProviderNotConfiguredError } from '../../utils/errors.js';
import { INTEGRATION_PROVIDERS, type IntegrationProvider } from '../../types/index.js';
import { PROVIDER_DEFINITIONS, type ProviderDefinition } from './definitions.js';
import { HttpProviderAdapter, type FetchLike } from './HttpProviderAdapter.js';
import type { ProviderAdapter } from './types.js';

export interface ProviderRegistry {
  /** Throws ProviderNotConfiguredError when the provider has no client credentials */
  get(provider: IntegrationProvider): ProviderAdapter;
  isConfigured(provider: IntegrationProvider): boolean;
  listConfigured(): IntegrationProvider[];
}

/**
 * Apply environment overrides on top of the built-in definition.
 */
export function resolveDefinition(base: ProviderDefinition, env: ProviderEnvConfig): ProviderDefinition {
  return {
    ...base,
    authUrl: env.authUrl ?? base.authUrl,
    tokenUrl: env.tokenUrl ?? base.tokenUrl,
    revokeUrl: env.revokeUrl ?? base.revokeUrl,
    dataUrl: env.dataUrl ?? base.dataUrl,
    scopes: env.scopes ?? base.scopes,
    rateLimit: {
      limit: env.rateLimit ?? base.rateLimit.limit,
      windowMs: env.rateWindowMs ?? base.rateLimit.windowMs,
    },
  };
}

export class StaticProviderRegistry implements ProviderRegistry {
  private readonly adapters = new Map<IntegrationProvider, ProviderAdapter>();

  constructor(adapters: ProviderAdapter[]) {
    for (const adapter of adapters) {
      this.adapters.set(adapter.provider, adapter);
    }
  }

  get(provider: IntegrationProvider): ProviderAdapter {
    const adapter = this.adapters.get(provider);
    if (!adapter) {
      throw new ProviderNotConfiguredError(provider);
    }
    return adapter;
  }

  isConfigured(provider: IntegrationProvider): boolean {
    return this.adapters.has(provider);
  }

  listConfigured(): IntegrationProvider[] {
    return [...this.adapters.keys()];
  }
}

/**
 * Build HTTP adapters for every provider that has client credentials configured.
 */
export function createProviderRegistry(
  providerConfig: Record<IntegrationProvider, ProviderEnvConfig> = config.providers,
  fetchImpl?: FetchLike
): ProviderRegistry {
  const adapters: ProviderAdapter[] = [];

  for (const provider of INTEGRATION_PROVIDERS) {
    const env = providerConfig[provider];
    if (!env.clientId || !env.clientSecret) {
      continue;
    }
    const definition = resolveDefinition(PROVIDER_DEFINITIONS[provider], env);
    adapters.push(
      new HttpProviderAdapter(definition, { clientId: env.clientId, clientSecret: env.clientSecret }, fetchImpl)
    );
  }

  return new StaticProviderRegistry(adapters);
}
