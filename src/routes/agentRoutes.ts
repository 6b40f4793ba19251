import { Router } from "express";
import { createAgentSchema, listAgentsQuerySchema, updateAgentSchema } from "../agents/schemas.js";
import type { AgentService } from "../agents/service.js";
import { currentTenant, requireCapability, type ResourceScope } from "../auth/middleware.js";
import type { AuthorizationGuard } from "../tenancy/guard.js";
import { sendError } from "./httpErrors.js";

export function createAgentRouter(deps: { agents: AgentService; guard: AuthorizationGuard }): Router {
  const router = Router();
  const { agents, guard } = deps;
  const agentScope: ResourceScope = {
    type: "agent",
    ownerOf: (id) => agents.ownerOf(id),
    notFoundMessage: "Agent not found"
  };

  router.get("/agents", requireCapability(guard, "VIEW_AGENTS", "agent"), async (req, res) => {
    try {
      const query = listAgentsQuerySchema.parse(req.query);
      res.json({ agents: await agents.list(currentTenant(req), query) });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.post("/agents", requireCapability(guard, "CREATE_AGENTS", "agent"), async (req, res) => {
    try {
      const agent = await agents.create(currentTenant(req), createAgentSchema.parse(req.body));
      res.status(201).json(agent);
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.get("/agents/:id", requireCapability(guard, "VIEW_AGENTS", agentScope), async (req, res) => {
    try {
      res.json(await agents.get(currentTenant(req), req.params.id));
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.put("/agents/:id", requireCapability(guard, "EDIT_AGENTS", agentScope), async (req, res) => {
    try {
      res.json(await agents.update(currentTenant(req), req.params.id, updateAgentSchema.parse(req.body)));
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.delete("/agents/:id", requireCapability(guard, "DELETE_AGENTS", agentScope), async (req, res) => {
    try {
      await agents.terminate(currentTenant(req), req.params.id);
      res.status(204).end();
    } catch (error) {
      sendError(req, res, error);
    }
  });

  return router;
}
