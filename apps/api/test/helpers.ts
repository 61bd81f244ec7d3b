// Shared fixtures for engine and route tests. Each fixture owns a fresh
// SQLite file in its own temporary directory.
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { signJwt } from "@meplatform/core";
import { openDatabase } from "../src/engine/database.js";
import type { CreateUserInput } from "../src/engine/userStore.js";
import { toActor, type Actor, type Center, type Partner, type User } from "../src/engine/types.js";
import { createServices, type Services } from "../src/api/server.js";

export const TEST_PASSWORD_HASH = "not-a-real-hash";

export type Fixture = {
  tmpDir: string;
  dbPath: string;
  services: Services;
  close(): void;
};

export function createFixture(prefix = "meplatform-test-"): Fixture {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const dbPath = path.join(tmpDir, "meplatform.db");
  const services = createServices(openDatabase(dbPath));
  return {
    tmpDir,
    dbPath,
    services,
    close() {
      services.db.close();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    },
  };
}

export function seedUser(
  services: Services,
  email: string,
  overrides: Partial<Omit<CreateUserInput, "email">> = {},
): User {
  return services.users.create({
    email,
    firstName: "Test",
    lastName: email.split("@")[0] ?? "User",
    passwordHash: TEST_PASSWORD_HASH,
    ...overrides,
  });
}

export function actorOf(services: Services, userId: string): Actor {
  const user = services.users.findById(userId);
  if (!user) throw new Error(`No user ${userId}`);
  return toActor(user);
}

export type Tenancy = {
  partner: Partner;
  otherPartner: Partner;
  center: Center;
};

/** Partner DSE201 with center C1, plus a second partner KLA305 with center K1. */
export function seedTenancy(services: Services): Tenancy {
  const partner = services.tenants.createPartner({ partnerId: "DSE201", name: "Dar Skills Exchange", country: "Tanzania" });
  const center = services.tenants.createCenter({ partnerId: "DSE201", name: "C1", location: "Kariakoo" });
  const otherPartner = services.tenants.createPartner({ partnerId: "KLA305", name: "Kampala Learning Alliance", country: "Uganda" });
  services.tenants.createCenter({ partnerId: "KLA305", name: "K1" });
  return { partner, otherPartner, center };
}

export async function bearer(user: Pick<User, "id" | "email">): Promise<string> {
  const token = await signJwt({ sub: user.id, email: user.email });
  return `Bearer ${token}`;
}

export function useTestJwtEnv(): void {
  process.env.JWT_SECRET = "test-secret";
  process.env.AUTH_ISSUER = "test-issuer";
  process.env.AUTH_AUDIENCE = "test-audience";
}
