import { and, eq, ne } from "drizzle-orm";
import type { Db } from "../index.js";
import { credentials, principals, type PrincipalRow } from "../schema.js";
import { guard } from "./guard.js";
import type { Principal, PrincipalRepository } from "../../shared/types/api.js";

export class SqlitePrincipalRepository implements PrincipalRepository {
  constructor(private db: Db) {}

  async get(principalId: number): Promise<Principal | null> {
    return guard("principals.get", async () => {
      const row = await this.db.query.principals.findFirst({
        where: eq(principals.id, principalId),
      });
      return row ? toPrincipal(row) : null;
    });
  }

  async findByEmail(email: string): Promise<Principal | null> {
    return guard("principals.findByEmail", async () => {
      const row = await this.db.query.principals.findFirst({
        where: eq(principals.email, email),
      });
      return row ? toPrincipal(row) : null;
    });
  }

  /**
   * Create the principal for a mailbox address, or reactivate the existing one.
   */
  async upsertByEmail(email: string, displayName?: string | null): Promise<Principal> {
    return guard("principals.upsertByEmail", async () => {
      const [row] = await this.db
        .insert(principals)
        .values({ email, displayName: displayName ?? null, isActive: true })
        .onConflictDoUpdate({
          target: principals.email,
          set: displayName ? { isActive: true, displayName } : { isActive: true },
        })
        .returning();

      return toPrincipal(row);
    });
  }

  async listSyncable(): Promise<Principal[]> {
    return guard("principals.listSyncable", async () => {
      const rows = await this.db
        .select({
          id: principals.id,
          email: principals.email,
          displayName: principals.displayName,
          isActive: principals.isActive,
        })
        .from(principals)
        .innerJoin(credentials, eq(credentials.principalId, principals.id))
        .where(and(eq(principals.isActive, true), ne(credentials.status, "NEEDS_REAUTH")))
        .orderBy(principals.id);

      return rows;
    });
  }
}

function toPrincipal(row: PrincipalRow): Principal {
  return {
    id: row.id,
    email: row.email,
    displayName: row.displayName,
    isActive: row.isActive,
  };
}
