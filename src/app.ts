import cors from "cors";
import express from "express";
import { AgentService } from "./agents/service.js";
import { AuditLog } from "./audit/store.js";
import { getAuthConfig, readPositiveInt, type AuthConfig } from "./auth/config.js";
import { createAuthenticate, currentTenant, requireCapability } from "./auth/middleware.js";
import { SessionIssuer } from "./auth/sessionIssuer.js";
import { SessionStore } from "./auth/sessionStore.js";
import { TokenSigner } from "./auth/tokens.js";
import { InvitationStore } from "./invitations/store.js";
import { attachRequestContext, logUnhandledError, observeRequests } from "./observability/requestContext.js";
import { resolveDataRoot } from "./persistence/paths.js";
import { createAgentRouter } from "./routes/agentRoutes.js";
import { createAuditRouter } from "./routes/auditRoutes.js";
import { createPublicAuthRouter, createSessionRouter } from "./routes/authRoutes.js";
import { handleBodyParseError } from "./routes/httpErrors.js";
import { systemRouter } from "./routes/systemRoutes.js";
import { createTaskRouter } from "./routes/taskRoutes.js";
import { createUserRouter } from "./routes/userRoutes.js";
import { subscribeEvents } from "./services/eventBus.js";
import { readRetryPolicy } from "./tasks/backoff.js";
import { TaskDispatcher, type DispatcherOptions } from "./tasks/dispatcher.js";
import { TaskLifecycleManager } from "./tasks/lifecycle.js";
import { QuotaTracker } from "./tasks/quota.js";
import { TaskStore } from "./tasks/store.js";
import { readWorkerPoolOptions, TaskWorkerPool, type WorkerPoolOptions } from "./tasks/workerPool.js";
import { AuthorizationGuard } from "./tenancy/guard.js";
import { TenantStore } from "./tenants/store.js";
import { UserStore } from "./users/store.js";

export interface ServiceOptions {
  dataRoot?: string;
  authConfig?: AuthConfig;
  dispatcher?: DispatcherOptions;
  workerPool?: WorkerPoolOptions;
  now?: () => Date;
}

export type AppServices = ReturnType<typeof createServices>;

export function createServices(options: ServiceOptions = {}) {
  const dataRoot = options.dataRoot ?? resolveDataRoot();
  const authConfig = options.authConfig ?? getAuthConfig();
  const now = options.now ?? (() => new Date());

  const audit = new AuditLog(dataRoot);
  const guard = new AuthorizationGuard(audit);
  const tenants = new TenantStore(dataRoot);
  const users = new UserStore(dataRoot);
  const invitations = new InvitationStore(dataRoot);
  const agents = new AgentService({ tenants, audit }, dataRoot);
  const issuer = new SessionIssuer({
    tenants,
    users,
    invitations,
    sessions: new SessionStore(dataRoot),
    signer: new TokenSigner(authConfig, now),
    audit,
    invitationTtlDays: authConfig.invitationTtlDays,
    now
  });
  const lifecycle = new TaskLifecycleManager({
    store: new TaskStore(dataRoot),
    agents,
    tenants,
    audit,
    dispatcher: new TaskDispatcher(options.dispatcher),
    quota: new QuotaTracker(readPositiveInt(process.env.QUOTA_WINDOW_MS, 60 * 60 * 1000)),
    retryPolicy: readRetryPolicy(),
    now
  });
  const pool = new TaskWorkerPool(lifecycle, options.workerPool ?? readWorkerPoolOptions());

  return { audit, guard, tenants, users, invitations, agents, issuer, lifecycle, pool };
}

export function createApp(services: AppServices) {
  const app = express();

  app.use(attachRequestContext);
  app.use(observeRequests);
  app.use(cors());
  app.use(express.json());
  app.use(handleBodyParseError);

  app.use(systemRouter);
  app.use(createPublicAuthRouter(services.issuer));

  app.use(createAuthenticate(services.issuer));

  app.use(createSessionRouter(services));
  app.use(createAgentRouter(services));
  app.use(createTaskRouter(services));
  app.use(createAuditRouter(services));
  app.use(createUserRouter(services));

  app.get("/events", requireCapability(services.guard, "VIEW_TASKS", "task"), (req, res) => {
    const { tenant_id } = currentTenant(req);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const unsubscribe = subscribeEvents(tenant_id, (event) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    });

    const heartbeat = setInterval(() => {
      res.write(": heartbeat\n\n");
    }, 20000);

    res.on("close", () => {
      clearInterval(heartbeat);
      unsubscribe();
      res.end();
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found", code: "NOT_FOUND" });
  });
  app.use(logUnhandledError);
  return app;
}
