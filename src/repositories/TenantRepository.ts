import { eq } from 'drizzle-orm';
import { db as defaultDb, isUniqueViolation, type Database } from '../database/client.js';
import { tenants, type NewTenant, type Tenant } from '../database/schema.js';
import { ConflictError } from '../utils/errors.js';

export interface TenantRepository {
  create(values: NewTenant): Promise<Tenant>;
  findById(id: string): Promise<Tenant | null>;
  findByOwner(ownerUserId: string): Promise<Tenant | null>;
  setActive(id: string, isActive: boolean): Promise<Tenant | null>;
}

export class DrizzleTenantRepository implements TenantRepository {
  constructor(private readonly db: Database = defaultDb) {}

  async create(values: NewTenant): Promise<Tenant> {
    try {
      const [tenant] = await this.db.insert(tenants).values(values).returning();
      return tenant;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Subdomain is already taken', { subdomain: values.subdomain });
      }
      throw error;
    }
  }

  async findById(id: string): Promise<Tenant | null> {
    const [tenant] = await this.db.select().from(tenants).where(eq(tenants.id, id)).limit(1);
    return tenant ?? null;
  }

  async findByOwner(ownerUserId: string): Promise<Tenant | null> {
    const [tenant] = await this.db
      .select()
      .from(tenants)
      .where(eq(tenants.ownerUserId, ownerUserId))
      .limit(1);
    return tenant ?? null;
  }

  async setActive(id: string, isActive: boolean): Promise<Tenant | null> {
    const [tenant] = await this.db
      .update(tenants)
      .set({ isActive, updatedAt: new Date() })
      .where(eq(tenants.id, id))
      .returning();
    return tenant ?? null;
  }
}
