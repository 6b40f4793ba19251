import { nanoid } from "nanoid";
import type { AuditLog } from "../audit/store.js";
import { ConflictError, NotFoundError, ValidationError } from "../domain/errors.js";
import type { Agent, AgentStatus } from "../domain/types.js";
import { logInfo } from "../observability/logger.js";
import { JsonCollection } from "../persistence/jsonStore.js";
import { resolveDataRoot } from "../persistence/paths.js";
import type { TenantContext } from "../tenancy/context.js";
import type { TenantStore } from "../tenants/store.js";
import { createAgentSchema, type CreateAgentInput, type UpdateAgentInput } from "./schemas.js";

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Tenant-scoped agent registry. Names are unique per tenant among agents
 * that are not terminated; deletion only ever terminates.
 */
export class AgentService {
  private readonly agents: JsonCollection<Agent>;

  constructor(
    private readonly deps: { tenants: TenantStore; audit: AuditLog },
    dataRoot = resolveDataRoot()
  ) {
    this.agents = new JsonCollection<Agent>(dataRoot, "agents");
  }

  async list(context: TenantContext, filter: { status?: AgentStatus } = {}): Promise<Agent[]> {
    const rows = await this.agents.readAll();
    return rows
      .filter((row) => row.tenant_id === context.tenant_id)
      .filter((row) => (filter.status ? row.status === filter.status : true));
  }

  /** Tenant that owns `agent_id`, for the authorization guard; null when there is no such agent. */
  async ownerOf(agent_id: string): Promise<string | null> {
    const rows = await this.agents.readAll();
    return rows.find((row) => row.id === agent_id)?.tenant_id ?? null;
  }

  async get(context: TenantContext, agent_id: string): Promise<Agent> {
    const rows = await this.agents.readAll();
    const agent = rows.find((row) => row.id === agent_id && row.tenant_id === context.tenant_id);
    if (!agent) throw new NotFoundError("Agent not found");
    return agent;
  }

  async create(context: TenantContext, input: CreateAgentInput): Promise<Agent> {
    const parsed = createAgentSchema.parse(input);
    if (parsed.tenant_id !== undefined && parsed.tenant_id !== context.tenant_id) {
      throw new NotFoundError("Tenant not found", "TENANT_NOT_FOUND");
    }
    const tenant = await this.deps.tenants.get(context);

    const agent = await this.agents.mutate((rows) => {
      const live = rows.filter((row) => row.tenant_id === context.tenant_id && row.status !== "terminated");
      if (live.length >= tenant.limits.max_agents) {
        throw new ConflictError(
          "AGENT_LIMIT_REACHED",
          `Tenant tier ${tenant.tier} allows at most ${tenant.limits.max_agents} agents`
        );
      }
      if (live.some((row) => sameName(row.name, parsed.name))) {
        throw new ConflictError("DUPLICATE_AGENT", `Agent "${parsed.name}" already exists`);
      }

      const now = new Date().toISOString();
      const created: Agent = {
        id: `agt_${nanoid(12)}`,
        tenant_id: context.tenant_id,
        name: parsed.name,
        agent_type: parsed.agent_type,
        ...(parsed.description !== undefined ? { description: parsed.description } : {}),
        status: "idle",
        config: parsed.config,
        created_by: context.actor_id,
        created_at: now,
        updated_at: now
      };
      rows.push(created);
      return created;
    });

    await this.record(context, "agent.created", agent);
    logInfo("agent.created", { context: { tenant_id: context.tenant_id, agent_id: agent.id } });
    return agent;
  }

  async update(context: TenantContext, agent_id: string, patch: UpdateAgentInput): Promise<Agent> {
    const agent = await this.agents.mutate((rows) => {
      const existing = rows.find((row) => row.id === agent_id && row.tenant_id === context.tenant_id);
      if (!existing) throw new NotFoundError("Agent not found");
      if (existing.status === "terminated") {
        throw new ValidationError("Terminated agents cannot be modified");
      }
      if (patch.name !== undefined) {
        const name = patch.name;
        const clash = rows.some(
          (row) =>
            row.id !== existing.id &&
            row.tenant_id === context.tenant_id &&
            row.status !== "terminated" &&
            sameName(row.name, name)
        );
        if (clash) throw new ConflictError("DUPLICATE_AGENT", `Agent "${name}" already exists`);
        existing.name = name;
      }
      if (patch.description !== undefined) existing.description = patch.description;
      if (patch.config !== undefined) existing.config = patch.config;
      if (patch.status !== undefined) existing.status = patch.status;
      existing.updated_at = new Date().toISOString();
      return existing;
    });

    await this.record(context, "agent.updated", agent, { fields: Object.keys(patch) });
    return agent;
  }

  /** Soft delete: the agent stays readable with status `terminated`. */
  async terminate(context: TenantContext, agent_id: string): Promise<Agent> {
    const agent = await this.agents.mutate((rows) => {
      const existing = rows.find((row) => row.id === agent_id && row.tenant_id === context.tenant_id);
      if (!existing) throw new NotFoundError("Agent not found");
      existing.status = "terminated";
      existing.updated_at = new Date().toISOString();
      return existing;
    });

    await this.record(context, "agent.terminated", agent);
    logInfo("agent.terminated", { context: { tenant_id: context.tenant_id, agent_id } });
    return agent;
  }

  private async record(context: TenantContext, event: string, agent: Agent, detail?: Record<string, unknown>): Promise<void> {
    await this.deps.audit.append({
      tenant_id: context.tenant_id,
      actor_id: context.actor_id,
      event,
      target_type: "agent",
      target_id: agent.id,
      outcome: "allowed",
      ...(detail ? { detail } : {})
    });
  }
}
