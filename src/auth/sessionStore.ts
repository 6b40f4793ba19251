import { nanoid } from "nanoid";
import type { SessionFamily } from "../domain/types.js";
import { JsonCollection } from "../persistence/jsonStore.js";
import { resolveDataRoot } from "../persistence/paths.js";

export type RotationOutcome =
  | { kind: "rotated"; family: SessionFamily; rotation_id: string }
  | { kind: "reused"; family: SessionFamily }
  | { kind: "revoked" }
  | { kind: "unknown" };

/** Refresh-token rotation state. Only the session issuer writes here. */
export class SessionStore {
  private readonly families: JsonCollection<SessionFamily>;

  constructor(dataRoot = resolveDataRoot()) {
    this.families = new JsonCollection<SessionFamily>(dataRoot, "sessions");
  }

  async open(input: { tenant_id: string; user_id: string; now: Date }): Promise<SessionFamily> {
    return this.families.mutate((rows) => {
      const at = input.now.toISOString();
      const family: SessionFamily = {
        id: `ses_${nanoid(16)}`,
        tenant_id: input.tenant_id,
        user_id: input.user_id,
        current_rotation_id: nanoid(21),
        consumed_rotation_ids: [],
        created_at: at,
        rotated_at: at,
        revoked_at: null,
        revoked_reason: null
      };
      rows.push(family);
      return family;
    });
  }

  /**
   * Consumes `rotation_id` and hands out its successor. Presenting an
   * already consumed identifier revokes the whole family.
   */
  async rotate(input: { family_id: string; tenant_id: string; rotation_id: string; now: Date }): Promise<RotationOutcome> {
    return this.families.mutate((rows): RotationOutcome => {
      const family = rows.find((row) => row.id === input.family_id && row.tenant_id === input.tenant_id);
      if (!family) return { kind: "unknown" };
      if (family.revoked_at !== null) return { kind: "revoked" };

      if (family.consumed_rotation_ids.includes(input.rotation_id)) {
        family.revoked_at = input.now.toISOString();
        family.revoked_reason = "refresh_token_reuse";
        return { kind: "reused", family };
      }
      if (family.current_rotation_id !== input.rotation_id) return { kind: "unknown" };

      const next = nanoid(21);
      family.consumed_rotation_ids.push(family.current_rotation_id);
      family.current_rotation_id = next;
      family.rotated_at = input.now.toISOString();
      return { kind: "rotated", family, rotation_id: next };
    });
  }

  async revoke(input: { family_id: string; tenant_id: string; reason: string; now: Date }): Promise<boolean> {
    return this.families.mutate((rows) => {
      const family = rows.find((row) => row.id === input.family_id && row.tenant_id === input.tenant_id);
      if (!family || family.revoked_at !== null) return false;
      family.revoked_at = input.now.toISOString();
      family.revoked_reason = input.reason;
      return true;
    });
  }

  async isActive(family_id: string, tenant_id: string): Promise<boolean> {
    const rows = await this.families.readAll();
    const family = rows.find((row) => row.id === family_id && row.tenant_id === tenant_id);
    return family !== undefined && family.revoked_at === null;
  }
}
