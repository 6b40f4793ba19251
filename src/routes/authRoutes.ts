import { Router } from "express";
import { z } from "zod";
import { capabilitiesFor, describePermissionTable } from "../auth/permissions.js";
import { currentTenant } from "../auth/middleware.js";
import type { RegisterInput, SessionIssuer } from "../auth/sessionIssuer.js";
import { NotFoundError } from "../domain/errors.js";
import { TENANT_TIERS, toPublicUser } from "../domain/types.js";
import type { TenantStore } from "../tenants/store.js";
import type { UserStore } from "../users/store.js";
import { sendError } from "./httpErrors.js";

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
  tenant_selector: z.string().trim().min(1)
});

const refreshSchema = z.object({ refresh_token: z.string().min(1) });

const profileSchema = {
  password: z.string().min(8).max(200),
  first_name: z.string().max(100).optional(),
  last_name: z.string().max(100).optional()
};

const registerSchema = z.union([
  z.object({
    tenant: z.object({ name: z.string().trim().min(1).max(100), tier: z.enum(TENANT_TIERS).optional() }),
    user: z.object({ email: z.string().email(), ...profileSchema })
  }),
  z.object({
    invitation_token: z.string().min(1),
    user: z.object(profileSchema)
  })
]);

function toRegisterInput(body: z.infer<typeof registerSchema>): RegisterInput {
  if ("invitation_token" in body) {
    return { kind: "invitation", invitation_token: body.invitation_token, user: body.user };
  }
  return { kind: "organization", tenant: body.tenant, user: body.user };
}

/** Login, refresh and registration; mounted before authentication. */
export function createPublicAuthRouter(issuer: SessionIssuer): Router {
  const router = Router();

  router.post("/auth/login", async (req, res) => {
    try {
      const body = loginSchema.parse(req.body);
      const session = await issuer.authenticate(body.email, body.password, body.tenant_selector);
      res.json(session);
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.post("/auth/refresh", async (req, res) => {
    try {
      const body = refreshSchema.parse(req.body);
      res.json(await issuer.refresh(body.refresh_token));
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.post("/auth/register", async (req, res) => {
    try {
      const session = await issuer.register(toRegisterInput(registerSchema.parse(req.body)));
      res.status(201).json(session);
    } catch (error) {
      sendError(req, res, error);
    }
  });

  return router;
}

export function createSessionRouter(deps: { issuer: SessionIssuer; users: UserStore; tenants: TenantStore }): Router {
  const router = Router();

  router.post("/auth/logout", async (req, res) => {
    try {
      await deps.issuer.logout(currentTenant(req));
      res.status(204).end();
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.get("/auth/me", async (req, res) => {
    try {
      const context = currentTenant(req);
      const user = await deps.users.get(context, context.actor_id);
      if (!user) throw new NotFoundError("User not found");
      const tenant = await deps.tenants.get(context);
      res.json({ user: toPublicUser(user), tenant, capabilities: [...capabilitiesFor(context.role)] });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.get("/permissions", (req, res) => {
    try {
      const context = currentTenant(req);
      res.json({ role: context.role, capabilities: [...capabilitiesFor(context.role)], roles: describePermissionTable() });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  return router;
}
