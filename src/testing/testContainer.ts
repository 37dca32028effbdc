import { createContainer, type Container, type ContainerOptions } from '../container.js';
import type { SyncDispatcher } from '../integrations/common/SyncEngine.js';
import { StaticProviderRegistry } from '../integrations/providers/registry.js';
import type { Integration, Tenant, TokenSet } from '../types/index.js';
import { FakeProviderAdapter } from './FakeProviderAdapter.js';
import { createMemoryRepositories, type MemoryRepositories } from './memory.js';

export class TestClock {
  private current: number;

  constructor(start: Date = new Date('2026-03-02T09:00:00.000Z')) {
    this.current = start.getTime();
  }

  readonly now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  set(at: Date): void {
    this.current = at.getTime();
  }
}

/**
 * Records dispatched job ids instead of queueing them; tests run jobs
 * explicitly through the engine.
 */
export class InlineDispatcher implements SyncDispatcher {
  readonly dispatched: string[] = [];
  failNext = false;

  async dispatch(jobId: string): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('queue unavailable');
    }
    this.dispatched.push(jobId);
  }
}

export interface TestHarness {
  container: Container;
  repositories: MemoryRepositories;
  adapter: FakeProviderAdapter;
  clock: TestClock;
  dispatcher: InlineDispatcher;
  /** Every delay the sync engine slept for, in order */
  sleeps: number[];
}

export interface TestHarnessOptions {
  adapter?: FakeProviderAdapter;
  clock?: TestClock;
  oauth?: ContainerOptions['oauth'];
  tokens?: ContainerOptions['tokens'];
  sync?: ContainerOptions['sync'];
  circuit?: ContainerOptions['circuit'];
}

/**
 * Container wired to in-memory repositories, a scripted provider and a
 * manual clock. Engine sleeps return at once and advance the clock.
 */
export function createTestContainer(options: TestHarnessOptions = {}): TestHarness {
  const repositories = createMemoryRepositories();
  const adapter = options.adapter ?? new FakeProviderAdapter();
  const clock = options.clock ?? new TestClock();
  const dispatcher = new InlineDispatcher();
  const sleeps: number[] = [];

  const container = createContainer({
    repositories,
    providers: new StaticProviderRegistry([adapter]),
    dispatcher,
    now: clock.now,
    oauth: { callbackBaseUrl: 'http://localhost:3000/api/integrations', ...options.oauth },
    tokens: options.tokens,
    circuit: options.circuit,
    sync: {
      random: () => 0,
      sleep: async (ms: number, signal?: AbortSignal) => {
        sleeps.push(ms);
        clock.advance(ms);
        if (signal?.aborted) {
          throw signal.reason;
        }
      },
      ...options.sync,
    },
  });

  return { container, repositories, adapter, clock, dispatcher, sleeps };
}

export async function seedTenant(harness: TestHarness, ownerUserId: string = 'user-1'): Promise<Tenant> {
  return harness.repositories.tenants.create({
    name: 'Acme Retail',
    subdomain: `acme-${harness.repositories.tenants.rows.size + 1}`,
    ownerUserId,
  });
}

/**
 * Store an integration for the tenant as if a handshake had just completed.
 */
export async function seedIntegration(
  harness: TestHarness,
  tenant: Tenant,
  tokens: Partial<TokenSet> = {}
): Promise<Integration> {
  return harness.container.credentials.upsertFromTokens({
    tenantId: tenant.id,
    provider: harness.adapter.provider,
    externalAccountId: 'acct-1',
    externalAccountName: 'Test Account',
    tokens: {
      accessToken: 'test-access-token',
      refreshToken: 'test-refresh-token',
      scopes: ['read'],
      expiresIn: 3600,
      ...tokens,
    },
  });
}
