// ── Tenant store ────────────────────────────────────────────────────────────
//
// Partner organizations and the centers inside them. Partner ids are
// human-assigned codes (e.g. "DSE201"); center ids are UUIDs.
//
import crypto from "node:crypto";
import type Database from "better-sqlite3";
import { nowIso } from "./database.js";
import type { Center, Partner } from "./types.js";

type PartnerRow = {
  partner_id: string;
  name: string;
  country: string | null;
  active: number;
  created_at: string;
};

type CenterRow = {
  id: string;
  partner_id: string;
  name: string;
  location: string | null;
  created_at: string;
};

export type CreatePartnerInput = {
  partnerId: string;
  name: string;
  country?: string | null;
};

export type CreateCenterInput = {
  partnerId: string;
  name: string;
  location?: string | null;
};

function toPartner(row: PartnerRow): Partner {
  return {
    partnerId: row.partner_id,
    name: row.name,
    country: row.country,
    active: row.active === 1,
    createdAt: row.created_at,
  };
}

function toCenter(row: CenterRow): Center {
  return {
    id: row.id,
    partnerId: row.partner_id,
    name: row.name,
    location: row.location,
    createdAt: row.created_at,
  };
}

export class TenantStore {
  constructor(private readonly db: Database.Database) {}

  createPartner(input: CreatePartnerInput): Partner {
    const partnerId = input.partnerId.trim();
    this.db
      .prepare("INSERT INTO partners (partner_id, name, country, active, created_at) VALUES (?, ?, ?, 1, ?)")
      .run(partnerId, input.name.trim(), input.country ?? null, nowIso());
    const created = this.findPartner(partnerId);
    if (!created) throw new Error(`Partner ${partnerId} vanished after insert`);
    return created;
  }

  findPartner(partnerId: string): Partner | null {
    const row = this.db.prepare("SELECT * FROM partners WHERE partner_id = ?").get(partnerId) as PartnerRow | undefined;
    return row ? toPartner(row) : null;
  }

  createCenter(input: CreateCenterInput): Center {
    const id = crypto.randomUUID();
    this.db
      .prepare("INSERT INTO centers (id, partner_id, name, location, created_at) VALUES (?, ?, ?, ?, ?)")
      .run(id, input.partnerId, input.name.trim(), input.location ?? null, nowIso());
    const created = this.findCenter(id);
    if (!created) throw new Error(`Center ${id} vanished after insert`);
    return created;
  }

  findCenter(id: string): Center | null {
    const row = this.db.prepare("SELECT * FROM centers WHERE id = ?").get(id) as CenterRow | undefined;
    return row ? toCenter(row) : null;
  }

  /** A center only resolves through the partner that owns it. */
  findCenterOfPartner(partnerId: string, centerId: string): Center | null {
    const row = this.db
      .prepare("SELECT * FROM centers WHERE id = ? AND partner_id = ?")
      .get(centerId, partnerId) as CenterRow | undefined;
    return row ? toCenter(row) : null;
  }

  listCenters(partnerId: string): Center[] {
    const rows = this.db
      .prepare("SELECT * FROM centers WHERE partner_id = ? ORDER BY name ASC")
      .all(partnerId) as CenterRow[];
    return rows.map(toCenter);
  }
}
