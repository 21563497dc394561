import { and, eq, asc, max, count } from 'drizzle-orm';
import type { Database } from '../db.js';
import { associations, identities, entries } from '../schema/index.js';
import type { AssociationRepository, AssociationFilter } from '../../interfaces/index.js';
import type {
  Association,
  AuthorRole,
  CreditedName,
  CreditedTitle,
  Id,
} from '@archivist/protocol';

export class PgAssociationRepository implements AssociationRepository {
  constructor(private db: Database) {}

  async create(association: Association): Promise<Association> {
    const [row] = await this.db.insert(associations).values(association).returning();
    return row;
  }

  async find(entryId: Id, identityId: Id, role: AuthorRole): Promise<Association | null> {
    const [row] = await this.db
      .select()
      .from(associations)
      .where(
        and(
          eq(associations.entryId, entryId),
          eq(associations.identityId, identityId),
          eq(associations.role, role)
        )
      );
    return row ?? null;
  }

  async findAt(entryId: Id, role: AuthorRole, index: number): Promise<Association | null> {
    const [row] = await this.db
      .select()
      .from(associations)
      .where(
        and(
          eq(associations.entryId, entryId),
          eq(associations.role, role),
          eq(associations.index, index)
        )
      );
    return row ?? null;
  }

  async maxIndex(entryId: Id, role: AuthorRole): Promise<number | null> {
    const [row] = await this.db
      .select({ value: max(associations.index) })
      .from(associations)
      .where(and(eq(associations.entryId, entryId), eq(associations.role, role)));
    return row?.value ?? null;
  }

  async listByEntry(entryId: Id): Promise<CreditedName[]> {
    // Enum columns sort in declaration order, which is the canonical role order
    const rows = await this.db
      .select({
        entryId: associations.entryId,
        identityId: associations.identityId,
        role: associations.role,
        index: associations.index,
        name: identities.name,
      })
      .from(associations)
      .innerJoin(identities, eq(identities.id, associations.identityId))
      .where(eq(associations.entryId, entryId))
      .orderBy(asc(associations.role), asc(associations.index));

    return rows;
  }

  async countByEntry(entryId: Id, role?: AuthorRole): Promise<number> {
    const condition = role
      ? and(eq(associations.entryId, entryId), eq(associations.role, role))
      : eq(associations.entryId, entryId);

    const [row] = await this.db
      .select({ value: count() })
      .from(associations)
      .where(condition);
    return row?.value ?? 0;
  }

  async listTitlesByIdentity(identityId: Id): Promise<CreditedTitle[]> {
    const rows = await this.db
      .select({
        entryId: associations.entryId,
        title: entries.title,
        role: associations.role,
      })
      .from(associations)
      .innerJoin(entries, eq(entries.id, associations.entryId))
      .where(eq(associations.identityId, identityId))
      .orderBy(asc(entries.title), asc(associations.entryId), asc(associations.role));

    return rows;
  }

  async delete(filter: AssociationFilter): Promise<number> {
    const conditions = [eq(associations.entryId, filter.entryId)];

    if (filter.identityId !== undefined) {
      conditions.push(eq(associations.identityId, filter.identityId));
    }

    if (filter.role !== undefined) {
      conditions.push(eq(associations.role, filter.role));
    }

    const rows = await this.db
      .delete(associations)
      .where(and(...conditions))
      .returning({ entryId: associations.entryId });
    return rows.length;
  }
}
