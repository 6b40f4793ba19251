import { Router } from "express";
import { currentTenant, requireCapability, type ResourceScope } from "../auth/middleware.js";
import type { AuthorizationGuard } from "../tenancy/guard.js";
import type { TaskLifecycleManager } from "../tasks/lifecycle.js";
import { listTasksQuerySchema } from "../tasks/schemas.js";
import type { TaskWorkerPool } from "../tasks/workerPool.js";
import { sendError } from "./httpErrors.js";

export function createTaskRouter(deps: {
  lifecycle: TaskLifecycleManager;
  pool: TaskWorkerPool;
  guard: AuthorizationGuard;
}): Router {
  const router = Router();
  const { lifecycle, pool, guard } = deps;
  const taskScope: ResourceScope = {
    type: "task",
    ownerOf: (id) => lifecycle.ownerOf(id),
    notFoundMessage: "Task not found"
  };

  router.get("/tasks", requireCapability(guard, "VIEW_TASKS", "task"), async (req, res) => {
    try {
      const query = listTasksQuerySchema.parse(req.query);
      res.json({ tasks: await lifecycle.listTasks(currentTenant(req), query) });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.post("/tasks", requireCapability(guard, "CREATE_TASKS", "task"), async (req, res) => {
    try {
      const task = await lifecycle.createTask(currentTenant(req), req.body);
      res.status(201).json(task);
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.get("/tasks/:id", requireCapability(guard, "VIEW_TASKS", taskScope), async (req, res) => {
    try {
      res.json(await lifecycle.getTask(currentTenant(req), req.params.id));
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.post("/tasks/:id/execute", requireCapability(guard, "EXECUTE_TASKS", taskScope), async (req, res) => {
    try {
      const request = await lifecycle.requestExecution(currentTenant(req), req.params.id, pool.id);
      if (request.status === "started") {
        pool.submit(request.claim);
        res.status(202).json({ status: request.status, task: request.task });
        return;
      }
      res.status(202).json({ status: request.status, task: request.task, retry_at: request.retry_at });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.post("/tasks/:id/cancel", requireCapability(guard, "CANCEL_TASKS", taskScope), async (req, res) => {
    try {
      res.json(await lifecycle.cancel(currentTenant(req), req.params.id));
    } catch (error) {
      sendError(req, res, error);
    }
  });

  return router;
}
