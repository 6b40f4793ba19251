import { canGrantRole } from "./permissions.js";
import { hashPassword, verifyPassword } from "./passwords.js";
import type { SessionStore } from "./sessionStore.js";
import type { TokenSigner } from "./tokens.js";
import type { AuthPrincipal, AuthRole, RefreshTokenClaims, TokenPair } from "./types.js";
import type { AuditLog } from "../audit/store.js";
import { AuthenticationError, AuthorizationError, ConflictError, NotFoundError } from "../domain/errors.js";
import { toPublicUser, type Invitation, type PublicUser, type Tenant, type TenantTier, type User } from "../domain/types.js";
import type { InvitationStore } from "../invitations/store.js";
import { logInfo, logWarn } from "../observability/logger.js";
import { recordAuthFailure } from "../observability/metrics.js";
import type { TenantContext } from "../tenancy/context.js";
import type { TenantStore } from "../tenants/store.js";
import type { UserStore } from "../users/store.js";

export interface Session extends TokenPair {
  user: PublicUser;
  tenant: Tenant;
}

export interface NewUserDetails {
  email: string;
  password: string;
  first_name?: string;
  last_name?: string;
}

export type RegisterInput =
  | { kind: "organization"; tenant: { name: string; tier?: TenantTier }; user: NewUserDetails }
  | { kind: "invitation"; invitation_token: string; user: Omit<NewUserDetails, "email"> };

export interface SessionIssuerDeps {
  tenants: TenantStore;
  users: UserStore;
  invitations: InvitationStore;
  sessions: SessionStore;
  signer: TokenSigner;
  audit: AuditLog;
  invitationTtlDays: number;
  now?: () => Date;
}

export class SessionIssuer {
  private readonly now: () => Date;

  constructor(private readonly deps: SessionIssuerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async authenticate(email: string, password: string, tenantSelector: string): Promise<Session> {
    const tenant = await this.deps.tenants.resolveActive(tenantSelector);
    if (!tenant) {
      recordAuthFailure("TENANT_NOT_FOUND");
      throw new NotFoundError("Tenant not found", "TENANT_NOT_FOUND");
    }

    const user = await this.deps.users.findByEmail(tenant.id, email);
    const passwordMatches = await verifyPassword(password, user?.password_hash);
    if (!user || !passwordMatches || !user.is_active) {
      const cause = !user ? "unknown_user" : !passwordMatches ? "wrong_password" : "inactive_user";
      return this.fail(new AuthenticationError("INVALID_CREDENTIALS", "Invalid email or password"), {
        tenant_id: tenant.id,
        actor_id: user?.id ?? "anonymous",
        event: "auth.login",
        detail: { cause }
      });
    }

    const loggedIn = await this.deps.users.recordLogin(user);
    const session = await this.openSession(loggedIn, tenant);
    await this.deps.audit.append({
      tenant_id: tenant.id,
      actor_id: loggedIn.id,
      event: "auth.login",
      target_type: "user",
      target_id: loggedIn.id,
      outcome: "allowed"
    });
    logInfo("auth.login", { context: { tenant_id: tenant.id }, data: { user_id: loggedIn.id } });
    return session;
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    let claims: RefreshTokenClaims;
    try {
      claims = this.deps.signer.verifyRefresh(refreshToken);
    } catch (error) {
      if (error instanceof AuthenticationError) recordAuthFailure(error.code);
      throw error;
    }

    const rotation = await this.deps.sessions.rotate({
      family_id: claims.sid,
      tenant_id: claims.tenant_id,
      rotation_id: claims.jti,
      now: this.now()
    });

    if (rotation.kind === "reused") {
      return this.fail(new AuthenticationError("TOKEN_REUSED", "Refresh token was already used"), {
        tenant_id: claims.tenant_id,
        actor_id: claims.sub,
        event: "auth.token_reused",
        detail: { session_id: claims.sid }
      });
    }
    if (rotation.kind !== "rotated") {
      return this.fail(new AuthenticationError("INVALID_TOKEN", "Refresh token is not valid for this session"), {
        tenant_id: claims.tenant_id,
        actor_id: claims.sub,
        event: "auth.refresh",
        detail: { session_id: claims.sid, state: rotation.kind }
      });
    }

    const tenant = await this.deps.tenants.findActiveById(claims.tenant_id);
    const user = await this.deps.users.findById(claims.tenant_id, claims.sub);
    if (!tenant || !user || !user.is_active) {
      await this.deps.sessions.revoke({
        family_id: claims.sid,
        tenant_id: claims.tenant_id,
        reason: "principal_inactive",
        now: this.now()
      });
      return this.fail(new AuthenticationError("INVALID_TOKEN", "Session principal is no longer active"), {
        tenant_id: claims.tenant_id,
        actor_id: claims.sub,
        event: "auth.refresh",
        detail: { session_id: claims.sid, state: "principal_inactive" }
      });
    }

    return this.issuePair(user, claims.sid, rotation.rotation_id);
  }

  async register(input: RegisterInput): Promise<Session> {
    if (input.kind === "organization") {
      return this.registerOrganization(input.tenant, input.user);
    }
    return this.acceptInvitation(input.invitation_token, input.user);
  }

  async logout(context: TenantContext): Promise<void> {
    if (!context.session_id) return;
    await this.deps.sessions.revoke({
      family_id: context.session_id,
      tenant_id: context.tenant_id,
      reason: "logout",
      now: this.now()
    });
    await this.deps.audit.append({
      tenant_id: context.tenant_id,
      actor_id: context.actor_id,
      event: "auth.logout",
      target_type: "session",
      target_id: context.session_id,
      outcome: "allowed"
    });
  }

  /**
   * Verifies an access token, that its session family is still live and
   * that the principal behind it is unchanged: an inactive user or tenant,
   * or a role that differs from the token's, rejects the token at once.
   */
  async verifyAccessToken(token: string): Promise<AuthPrincipal> {
    try {
      const claims = this.deps.signer.verifyAccess(token);
      if (!(await this.deps.sessions.isActive(claims.sid, claims.tenant_id))) {
        throw new AuthenticationError("INVALID_TOKEN", "Session has been revoked");
      }
      const tenant = await this.deps.tenants.findActiveById(claims.tenant_id);
      const user = await this.deps.users.findById(claims.tenant_id, claims.sub);
      if (!tenant || !user || !user.is_active) {
        throw new AuthenticationError("INVALID_TOKEN", "Session principal is no longer active");
      }
      if (user.role !== claims.role) {
        throw new AuthenticationError("INVALID_TOKEN", "Role changed since the token was issued");
      }
      return { subject: claims.sub, role: claims.role, tenant_id: claims.tenant_id, session_id: claims.sid };
    } catch (error) {
      if (error instanceof AuthenticationError) recordAuthFailure(error.code);
      throw error;
    }
  }

  async createInvitation(context: TenantContext, input: { email: string; role: AuthRole }): Promise<Invitation> {
    if (!canGrantRole(context.role, input.role)) {
      throw new AuthorizationError("PERMISSION_DENIED", `Role ${context.role} cannot invite ${input.role}`, {
        role: input.role
      });
    }
    if (await this.deps.users.findByEmail(context.tenant_id, input.email)) {
      throw new ConflictError("DUPLICATE_USER", "A user with this email already exists in the tenant");
    }
    if (await this.deps.invitations.hasPending(context, input.email, this.now())) {
      throw new ConflictError("DUPLICATE_USER", "A pending invitation already exists for this email");
    }

    const invitation = await this.deps.invitations.create(context, {
      email: input.email,
      role: input.role,
      ttlDays: this.deps.invitationTtlDays,
      now: this.now()
    });
    await this.deps.audit.append({
      tenant_id: context.tenant_id,
      actor_id: context.actor_id,
      event: "invitation.created",
      target_type: "invitation",
      target_id: invitation.id,
      outcome: "allowed",
      detail: { email: invitation.email, role: invitation.role }
    });
    return invitation;
  }

  private async registerOrganization(
    tenantInput: { name: string; tier?: TenantTier },
    userInput: NewUserDetails
  ): Promise<Session> {
    const password_hash = await hashPassword(userInput.password);
    const tenant = await this.deps.tenants.create({ name: tenantInput.name, tier: tenantInput.tier ?? "free" });
    const user = await this.deps.users.create({
      tenant_id: tenant.id,
      email: userInput.email,
      password_hash,
      role: "owner",
      first_name: userInput.first_name,
      last_name: userInput.last_name
    });

    await this.deps.audit.append({
      tenant_id: tenant.id,
      actor_id: user.id,
      event: "auth.register",
      target_type: "tenant",
      target_id: tenant.id,
      outcome: "allowed",
      detail: { variant: "organization" }
    });
    logInfo("auth.register", { context: { tenant_id: tenant.id }, data: { user_id: user.id, variant: "organization" } });
    return this.openSession(user, tenant);
  }

  private async acceptInvitation(token: string, userInput: Omit<NewUserDetails, "email">): Promise<Session> {
    const password_hash = await hashPassword(userInput.password);
    const user = await this.deps.invitations.consume(token, this.now(), async (invitation) => {
      const tenant = await this.deps.tenants.findActiveById(invitation.tenant_id);
      if (!tenant) throw new NotFoundError("Tenant not found", "TENANT_NOT_FOUND");
      const created = await this.deps.users.create({
        tenant_id: invitation.tenant_id,
        email: invitation.email,
        password_hash,
        role: invitation.role,
        first_name: userInput.first_name,
        last_name: userInput.last_name
      });
      return { result: created, consumed_by: created.id };
    });

    const tenant = await this.deps.tenants.findActiveById(user.tenant_id);
    if (!tenant) throw new NotFoundError("Tenant not found", "TENANT_NOT_FOUND");

    await this.deps.audit.append({
      tenant_id: tenant.id,
      actor_id: user.id,
      event: "auth.register",
      target_type: "user",
      target_id: user.id,
      outcome: "allowed",
      detail: { variant: "invitation", role: user.role }
    });
    logInfo("auth.register", { context: { tenant_id: tenant.id }, data: { user_id: user.id, variant: "invitation" } });
    return this.openSession(user, tenant);
  }

  private async openSession(user: User, tenant: Tenant): Promise<Session> {
    const family = await this.deps.sessions.open({ tenant_id: tenant.id, user_id: user.id, now: this.now() });
    const pair = this.issuePair(user, family.id, family.current_rotation_id);
    return { ...pair, user: toPublicUser(user), tenant };
  }

  private issuePair(user: User, session_id: string, rotation_id: string): TokenPair {
    return {
      access_token: this.deps.signer.signAccess({
        sub: user.id,
        tenant_id: user.tenant_id,
        role: user.role,
        sid: session_id
      }),
      refresh_token: this.deps.signer.signRefresh({
        sub: user.id,
        tenant_id: user.tenant_id,
        sid: session_id,
        jti: rotation_id
      }),
      token_type: "Bearer",
      expires_in: this.deps.signer.accessTokenTtlSeconds
    };
  }

  private async fail(
    error: AuthenticationError,
    entry: { tenant_id: string; actor_id: string; event: string; detail?: Record<string, unknown> }
  ): Promise<never> {
    recordAuthFailure(error.code);
    await this.deps.audit.append({
      tenant_id: entry.tenant_id,
      actor_id: entry.actor_id,
      event: entry.event,
      target_type: "user",
      target_id: entry.actor_id === "anonymous" ? null : entry.actor_id,
      outcome: "denied",
      reason: error.code,
      ...(entry.detail ? { detail: entry.detail } : {})
    });
    logWarn("auth.failed", { context: { tenant_id: entry.tenant_id }, data: { code: error.code, ...entry.detail } });
    throw error;
  }
}
