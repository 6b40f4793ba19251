import { nanoid } from "nanoid";
import path from "node:path";
import type { AuditLogEntry, AuditOutcome } from "../domain/types.js";
import { JsonLinesLog } from "../persistence/jsonStore.js";
import { resolveDataRoot } from "../persistence/paths.js";
import type { TenantContext } from "../tenancy/context.js";

export type AuditInput = Omit<AuditLogEntry, "id" | "created_at">;

export interface AuditFilter {
  event?: string;
  outcome?: AuditOutcome;
  target_type?: string;
  target_id?: string;
  limit?: number;
}

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

export class AuditLog {
  private readonly log: JsonLinesLog<AuditLogEntry>;

  constructor(dataRoot = resolveDataRoot()) {
    this.log = new JsonLinesLog(path.join(dataRoot, "audit"), "entries");
  }

  async append(input: AuditInput): Promise<AuditLogEntry> {
    const row: AuditLogEntry = {
      id: nanoid(12),
      created_at: new Date().toISOString(),
      ...input
    };
    await this.log.append(row);
    return row;
  }

  /** Newest first, restricted to the caller's tenant. */
  async list(context: TenantContext, filter: AuditFilter = {}): Promise<AuditLogEntry[]> {
    const rows = await this.log.readAll();
    const limit = Math.min(Math.max(filter.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
    return rows
      .filter((row) => row.tenant_id === context.tenant_id)
      .filter((row) => (filter.event ? row.event === filter.event : true))
      .filter((row) => (filter.outcome ? row.outcome === filter.outcome : true))
      .filter((row) => (filter.target_type ? row.target_type === filter.target_type : true))
      .filter((row) => (filter.target_id ? row.target_id === filter.target_id : true))
      .reverse()
      .slice(0, limit);
  }
}
