import { nanoid } from "nanoid";
import type { AuthRole } from "../auth/types.js";
import { GoneError, NotFoundError } from "../domain/errors.js";
import type { Invitation } from "../domain/types.js";
import { JsonCollection } from "../persistence/jsonStore.js";
import { resolveDataRoot } from "../persistence/paths.js";
import type { TenantContext } from "../tenancy/context.js";
import { normalizeEmail } from "../users/store.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export class InvitationStore {
  private readonly invitations: JsonCollection<Invitation>;

  constructor(dataRoot = resolveDataRoot()) {
    this.invitations = new JsonCollection<Invitation>(dataRoot, "invitations");
  }

  async create(
    context: TenantContext,
    input: { email: string; role: AuthRole; ttlDays: number; now?: Date }
  ): Promise<Invitation> {
    const now = input.now ?? new Date();
    return this.invitations.mutate((rows) => {
      const invitation: Invitation = {
        id: `inv_${nanoid(12)}`,
        token: nanoid(32),
        tenant_id: context.tenant_id,
        email: normalizeEmail(input.email),
        role: input.role,
        invited_by: context.actor_id,
        expires_at: new Date(now.getTime() + input.ttlDays * DAY_MS).toISOString(),
        consumed_at: null,
        consumed_by: null,
        created_at: now.toISOString()
      };
      rows.push(invitation);
      return invitation;
    });
  }

  async list(context: TenantContext): Promise<Invitation[]> {
    const rows = await this.invitations.readAll();
    return rows.filter((row) => row.tenant_id === context.tenant_id);
  }

  async hasPending(context: TenantContext, email: string, now = new Date()): Promise<boolean> {
    const needle = normalizeEmail(email);
    const rows = await this.list(context);
    return rows.some((row) => row.email === needle && row.consumed_at === null && Date.parse(row.expires_at) > now.getTime());
  }

  /**
   * Marks the invitation consumed and hands it to `onConsume` inside the same
   * critical section, so two acceptances of one token cannot both succeed.
   * If `onConsume` throws, the invitation stays unconsumed.
   */
  async consume<R>(token: string, now: Date, onConsume: (invitation: Invitation) => Promise<{ result: R; consumed_by: string }>): Promise<R> {
    return this.invitations.mutate(async (rows) => {
      const invitation = rows.find((row) => row.token === token);
      if (!invitation) throw new NotFoundError("Invitation not found", "INVITATION_NOT_FOUND");
      if (invitation.consumed_at !== null) {
        throw new GoneError("INVITATION_CONSUMED", "Invitation has already been used");
      }
      if (Date.parse(invitation.expires_at) <= now.getTime()) {
        throw new GoneError("INVITATION_EXPIRED", "Invitation has expired");
      }

      const { result, consumed_by } = await onConsume(invitation);
      invitation.consumed_at = now.toISOString();
      invitation.consumed_by = consumed_by;
      return result;
    });
  }
}
