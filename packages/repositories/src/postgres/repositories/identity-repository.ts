import { eq, asc, ilike, inArray } from 'drizzle-orm';
import type { Database } from '../db.js';
import { identities, associations } from '../schema/index.js';
import type {
  IdentityRepository,
  CreateIdentityRecord,
  UpdateIdentityRecord,
} from '../../interfaces/index.js';
import {
  foldDiacritics,
  type Id,
  type Identity,
  type IdentityMatch,
  type SearchOptions,
} from '@archivist/protocol';
import { foldedText } from './fold.js';

export class PgIdentityRepository implements IdentityRepository {
  constructor(private db: Database) {}

  async create(input: CreateIdentityRecord): Promise<Identity> {
    const [row] = await this.db
      .insert(identities)
      .values({
        id: input.id,
        name: input.name,
        aliasOfId: input.aliasOfId ?? null,
      })
      .returning();

    return row;
  }

  async get(id: Id): Promise<Identity | null> {
    const [row] = await this.db.select().from(identities).where(eq(identities.id, id));
    return row ?? null;
  }

  async getByName(name: string): Promise<Identity | null> {
    const [row] = await this.db
      .select()
      .from(identities)
      .where(eq(identities.name, name))
      .orderBy(asc(identities.id))
      .limit(1);
    return row ?? null;
  }

  async listAliasesOf(targetIds: Id[]): Promise<Identity[]> {
    if (targetIds.length === 0) return [];

    const rows = await this.db
      .select()
      .from(identities)
      .where(inArray(identities.aliasOfId, targetIds))
      .orderBy(asc(identities.id));

    return rows;
  }

  async update(id: Id, input: UpdateIdentityRecord): Promise<Identity | null> {
    if (input.name === undefined && input.aliasOfId === undefined) return this.get(id);

    const [row] = await this.db
      .update(identities)
      .set(input)
      .where(eq(identities.id, id))
      .returning();

    return row ?? null;
  }

  async search(pattern: string, options: SearchOptions = {}): Promise<IdentityMatch[]> {
    const condition = options.ignoreDiacritics
      ? ilike(foldedText(identities.name), foldDiacritics(pattern))
      : ilike(identities.name, pattern);

    // Left join so identities without credits still appear once
    const rows = await this.db
      .selectDistinct({
        identityId: identities.id,
        name: identities.name,
        aliasOfId: identities.aliasOfId,
        role: associations.role,
      })
      .from(identities)
      .leftJoin(associations, eq(associations.identityId, identities.id))
      .where(condition)
      .orderBy(asc(identities.name), asc(identities.id), asc(associations.role));

    return rows;
  }
}
