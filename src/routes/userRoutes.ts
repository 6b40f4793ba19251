import { Router } from "express";
import { z } from "zod";
import { currentTenant, requireCapability, type ResourceScope } from "../auth/middleware.js";
import { canGrantRole } from "../auth/permissions.js";
import type { SessionIssuer } from "../auth/sessionIssuer.js";
import { AUTH_ROLES } from "../auth/types.js";
import { AuthorizationError, NotFoundError } from "../domain/errors.js";
import { toPublicUser, type Invitation } from "../domain/types.js";
import type { InvitationStore } from "../invitations/store.js";
import type { AuthorizationGuard } from "../tenancy/guard.js";
import type { TenantStore } from "../tenants/store.js";
import type { UserStore } from "../users/store.js";
import { sendError } from "./httpErrors.js";

const updateUserSchema = z
  .object({
    role: z.enum(AUTH_ROLES).optional(),
    is_active: z.boolean().optional()
  })
  .strict();

const invitationSchema = z.object({
  email: z.string().email(),
  role: z.enum(AUTH_ROLES)
});

const updateTenantSchema = z
  .object({
    name: z.string().trim().min(1).max(100).optional(),
    is_active: z.boolean().optional()
  })
  .strict();

function withoutToken(invitation: Invitation): Omit<Invitation, "token"> {
  const { token: _token, ...rest } = invitation;
  void _token;
  return rest;
}

/** Users, invitations and tenant settings of the caller's own tenant. */
export function createUserRouter(deps: {
  users: UserStore;
  tenants: TenantStore;
  invitations: InvitationStore;
  issuer: SessionIssuer;
  guard: AuthorizationGuard;
}): Router {
  const router = Router();
  const { users, tenants, invitations, issuer, guard } = deps;
  const userScope: ResourceScope = {
    type: "user",
    ownerOf: (id) => users.ownerOf(id),
    notFoundMessage: "User not found"
  };

  router.get("/users", requireCapability(guard, "VIEW_USERS", "user"), async (req, res) => {
    try {
      const rows = await users.list(currentTenant(req));
      res.json({ users: rows.map(toPublicUser) });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.put("/users/:id", requireCapability(guard, "MANAGE_USERS", userScope), async (req, res) => {
    try {
      const context = currentTenant(req);
      const patch = updateUserSchema.parse(req.body);
      const target = await users.get(context, req.params.id);
      if (!target) throw new NotFoundError("User not found");
      if (target.role === "owner" && context.role !== "owner") {
        throw new AuthorizationError("PERMISSION_DENIED", "Only an owner can change another owner");
      }
      if (patch.role !== undefined && !canGrantRole(context.role, patch.role)) {
        throw new AuthorizationError("PERMISSION_DENIED", `Role ${context.role} cannot grant ${patch.role}`);
      }

      const updated = await users.update(context, target.id, patch);
      res.json(toPublicUser(updated));
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.get("/invitations", requireCapability(guard, "INVITE_USERS", "invitation"), async (req, res) => {
    try {
      const rows = await invitations.list(currentTenant(req));
      res.json({ invitations: rows.map(withoutToken) });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  // The token is only ever returned here; delivering it is up to the caller.
  router.post("/invitations", requireCapability(guard, "INVITE_USERS", "invitation"), async (req, res) => {
    try {
      const invitation = await issuer.createInvitation(currentTenant(req), invitationSchema.parse(req.body));
      res.status(201).json(invitation);
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.get("/tenant", requireCapability(guard, "VIEW_ORG_SETTINGS"), async (req, res) => {
    try {
      res.json(await tenants.get(currentTenant(req)));
    } catch (error) {
      sendError(req, res, error);
    }
  });

  router.put("/tenant", requireCapability(guard, "MANAGE_ORG_SETTINGS"), async (req, res) => {
    try {
      const context = currentTenant(req);
      const patch = updateTenantSchema.parse(req.body);
      if (patch.is_active === false && context.role !== "owner") {
        throw new AuthorizationError("PERMISSION_DENIED", "Only an owner can deactivate the tenant");
      }
      res.json(await tenants.update(context, patch));
    } catch (error) {
      sendError(req, res, error);
    }
  });

  return router;
}
