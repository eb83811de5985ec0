import { and, eq, sql } from "drizzle-orm";
import type { Db } from "../index.js";
import { credentials, type CredentialRow } from "../schema.js";
import { guard } from "./guard.js";
import { plainTokenCipher, type TokenCipher } from "../../lib/encryption.js";
import type {
  Credential,
  CredentialRepository,
  CredentialState,
} from "../../shared/types/api.js";

/**
 * Credential store backed by SQLite.
 * Tokens are sealed with the configured cipher before they reach the table.
 */
export class SqliteCredentialRepository implements CredentialRepository {
  constructor(
    private db: Db,
    private cipher: TokenCipher = plainTokenCipher
  ) {}

  async get(principalId: number): Promise<Credential | null> {
    return guard("credentials.get", async () => {
      const row = await this.db.query.credentials.findFirst({
        where: eq(credentials.principalId, principalId),
      });
      return row ? this.toCredential(row) : null;
    });
  }

  async compareAndSwap(
    principalId: number,
    expectedVersion: number,
    next: CredentialState
  ): Promise<boolean> {
    return guard("credentials.compareAndSwap", async () => {
      const updated = await this.db
        .update(credentials)
        .set({
          ...this.toColumns(next),
          version: expectedVersion + 1,
          updatedAt: new Date().toISOString(),
        })
        .where(
          and(
            eq(credentials.principalId, principalId),
            eq(credentials.version, expectedVersion)
          )
        )
        .returning({ version: credentials.version });

      return updated.length === 1;
    });
  }

  async saveGrant(principalId: number, state: CredentialState): Promise<Credential> {
    return guard("credentials.saveGrant", async () => {
      const columns = this.toColumns(state);
      const now = new Date().toISOString();

      const [row] = await this.db
        .insert(credentials)
        .values({ principalId, ...columns, version: 0, updatedAt: now })
        .onConflictDoUpdate({
          target: credentials.principalId,
          set: {
            ...columns,
            version: sql`${credentials.version} + 1`,
            updatedAt: now,
          },
        })
        .returning();

      return this.toCredential(row);
    });
  }

  private toColumns(state: CredentialState) {
    return {
      accessToken: this.cipher.seal(state.accessToken),
      refreshToken: state.refreshToken === null ? null : this.cipher.seal(state.refreshToken),
      expiresAt: state.expiresAt.toISOString(),
      status: state.status,
      refreshStartedAt: state.refreshStartedAt ? state.refreshStartedAt.toISOString() : null,
      scope: state.scope,
    };
  }

  private toCredential(row: CredentialRow): Credential {
    return {
      principalId: row.principalId,
      accessToken: this.cipher.open(row.accessToken),
      refreshToken: row.refreshToken === null ? null : this.cipher.open(row.refreshToken),
      expiresAt: new Date(row.expiresAt),
      status: row.status,
      version: row.version,
      refreshStartedAt: row.refreshStartedAt ? new Date(row.refreshStartedAt) : null,
      scope: row.scope,
    };
  }
}
