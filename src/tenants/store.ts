import { nanoid } from "nanoid";
import { ConflictError, NotFoundError } from "../domain/errors.js";
import type { Tenant, TenantTier } from "../domain/types.js";
import { JsonCollection } from "../persistence/jsonStore.js";
import { resolveDataRoot } from "../persistence/paths.js";
import type { TenantContext } from "../tenancy/context.js";
import { limitsForTier } from "./limits.js";

export function slugify(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export class TenantStore {
  private readonly tenants: JsonCollection<Tenant>;

  constructor(dataRoot = resolveDataRoot()) {
    this.tenants = new JsonCollection<Tenant>(dataRoot, "tenants");
  }

  async create(input: { name: string; tier: TenantTier }): Promise<Tenant> {
    const name = input.name.trim();
    const slug = slugify(name) || nanoid(8).toLowerCase();

    return this.tenants.mutate((rows) => {
      const collision = rows.some((row) => row.name.toLowerCase() === name.toLowerCase() || row.slug === slug);
      if (collision) {
        throw new ConflictError("DUPLICATE_TENANT", `Tenant "${name}" already exists`);
      }

      const now = new Date().toISOString();
      const tenant: Tenant = {
        id: `tnt_${nanoid(12)}`,
        name,
        slug,
        tier: input.tier,
        limits: limitsForTier(input.tier),
        is_active: true,
        created_at: now,
        updated_at: now
      };
      rows.push(tenant);
      return tenant;
    });
  }

  /** Looks a tenant up by id, slug or name (case-insensitive); inactive tenants are not returned. */
  async resolveActive(selector: string): Promise<Tenant | null> {
    const needle = selector.trim().toLowerCase();
    if (!needle) return null;
    const rows = await this.tenants.readAll();
    return (
      rows.find(
        (row) =>
          row.is_active &&
          (row.id.toLowerCase() === needle || row.slug === needle || row.name.toLowerCase() === needle)
      ) ?? null
    );
  }

  /** Scheduler view across tenants; never exposed over HTTP. */
  async listActive(): Promise<Tenant[]> {
    const rows = await this.tenants.readAll();
    return rows.filter((row) => row.is_active);
  }

  async findActiveById(tenant_id: string): Promise<Tenant | null> {
    const rows = await this.tenants.readAll();
    return rows.find((row) => row.id === tenant_id && row.is_active) ?? null;
  }

  async get(context: TenantContext): Promise<Tenant> {
    const rows = await this.tenants.readAll();
    const tenant = rows.find((row) => row.id === context.tenant_id);
    if (!tenant) throw new NotFoundError("Tenant not found", "TENANT_NOT_FOUND");
    return tenant;
  }

  async update(context: TenantContext, patch: { name?: string; is_active?: boolean }): Promise<Tenant> {
    return this.tenants.mutate((rows) => {
      const tenant = rows.find((row) => row.id === context.tenant_id);
      if (!tenant) throw new NotFoundError("Tenant not found", "TENANT_NOT_FOUND");

      if (patch.name !== undefined) {
        const name = patch.name.trim();
        const slug = slugify(name) || tenant.slug;
        const collision = rows.some(
          (row) => row.id !== tenant.id && (row.name.toLowerCase() === name.toLowerCase() || row.slug === slug)
        );
        if (collision) {
          throw new ConflictError("DUPLICATE_TENANT", `Tenant "${name}" already exists`);
        }
        tenant.name = name;
        tenant.slug = slug;
      }
      if (patch.is_active !== undefined) {
        tenant.is_active = patch.is_active;
      }
      tenant.updated_at = new Date().toISOString();
      return tenant;
    });
  }
}
