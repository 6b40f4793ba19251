import { nanoid } from "nanoid";
import type { AuthRole } from "../auth/types.js";
import { ConflictError, NotFoundError } from "../domain/errors.js";
import type { User } from "../domain/types.js";
import { JsonCollection } from "../persistence/jsonStore.js";
import { resolveDataRoot } from "../persistence/paths.js";
import type { TenantContext } from "../tenancy/context.js";

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export interface NewUser {
  tenant_id: string;
  email: string;
  password_hash: string;
  role: AuthRole;
  first_name?: string;
  last_name?: string;
}

export class UserStore {
  private readonly users: JsonCollection<User>;

  constructor(dataRoot = resolveDataRoot()) {
    this.users = new JsonCollection<User>(dataRoot, "users");
  }

  async create(input: NewUser): Promise<User> {
    const email = normalizeEmail(input.email);
    return this.users.mutate((rows) => {
      if (rows.some((row) => row.tenant_id === input.tenant_id && row.email === email)) {
        throw new ConflictError("DUPLICATE_USER", "A user with this email already exists in the tenant");
      }
      const now = new Date().toISOString();
      const user: User = {
        id: `usr_${nanoid(12)}`,
        tenant_id: input.tenant_id,
        email,
        password_hash: input.password_hash,
        role: input.role,
        ...(input.first_name ? { first_name: input.first_name } : {}),
        ...(input.last_name ? { last_name: input.last_name } : {}),
        is_active: true,
        last_login_at: null,
        created_at: now,
        updated_at: now
      };
      rows.push(user);
      return user;
    });
  }

  /** Credential lookup for the session issuer, keyed by an already resolved tenant. */
  async findByEmail(tenant_id: string, email: string): Promise<User | null> {
    const needle = normalizeEmail(email);
    const rows = await this.users.readAll();
    return rows.find((row) => row.tenant_id === tenant_id && row.email === needle) ?? null;
  }

  async findById(tenant_id: string, user_id: string): Promise<User | null> {
    const rows = await this.users.readAll();
    return rows.find((row) => row.tenant_id === tenant_id && row.id === user_id) ?? null;
  }

  async recordLogin(user: User): Promise<User> {
    return this.users.mutate((rows) => {
      const row = rows.find((candidate) => candidate.id === user.id && candidate.tenant_id === user.tenant_id);
      if (!row) throw new NotFoundError("User not found");
      row.last_login_at = new Date().toISOString();
      row.updated_at = row.last_login_at;
      return row;
    });
  }

  async ownerOf(user_id: string): Promise<string | null> {
    const rows = await this.users.readAll();
    return rows.find((row) => row.id === user_id)?.tenant_id ?? null;
  }

  async get(context: TenantContext, user_id: string): Promise<User | null> {
    return this.findById(context.tenant_id, user_id);
  }

  async list(context: TenantContext): Promise<User[]> {
    const rows = await this.users.readAll();
    return rows.filter((row) => row.tenant_id === context.tenant_id);
  }

  async update(
    context: TenantContext,
    user_id: string,
    patch: { role?: AuthRole; is_active?: boolean }
  ): Promise<User> {
    return this.users.mutate((rows) => {
      const row = rows.find((candidate) => candidate.id === user_id && candidate.tenant_id === context.tenant_id);
      if (!row) throw new NotFoundError("User not found");

      const wasActiveOwner = row.role === "owner" && row.is_active;
      const staysActiveOwner = (patch.role ?? row.role) === "owner" && (patch.is_active ?? row.is_active);
      if (wasActiveOwner && !staysActiveOwner) {
        const others = rows.filter(
          (candidate) =>
            candidate.tenant_id === context.tenant_id &&
            candidate.id !== row.id &&
            candidate.role === "owner" &&
            candidate.is_active
        );
        if (others.length === 0) {
          throw new ConflictError("LAST_OWNER", "A tenant must keep at least one active owner");
        }
      }

      if (patch.role !== undefined) row.role = patch.role;
      if (patch.is_active !== undefined) row.is_active = patch.is_active;
      row.updated_at = new Date().toISOString();
      return row;
    });
  }
}
