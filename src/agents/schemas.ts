import { z } from "zod";
import { AGENT_STATUSES } from "../domain/types.js";

const agentName = z.string().trim().min(1).max(100);

export const createAgentSchema = z.object({
  name: agentName,
  agent_type: z.string().trim().min(1).max(50).default("general"),
  description: z.string().max(1000).optional(),
  config: z.record(z.unknown()).default({}),
  tenant_id: z.string().optional()
});

export const updateAgentSchema = z
  .object({
    name: agentName.optional(),
    description: z.string().max(1000).optional(),
    config: z.record(z.unknown()).optional(),
    status: z.enum(AGENT_STATUSES).exclude(["terminated"]).optional()
  })
  .strict();

export const listAgentsQuerySchema = z.object({
  status: z.enum(AGENT_STATUSES).optional()
});

export type CreateAgentInput = z.input<typeof createAgentSchema>;
export type UpdateAgentInput = z.infer<typeof updateAgentSchema>;
