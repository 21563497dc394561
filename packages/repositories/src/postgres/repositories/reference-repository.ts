import { eq, asc } from 'drizzle-orm';
import type { Database } from '../db.js';
import { languages, typeCategories, publicationCategories } from '../schema/index.js';
import type { ReferenceRepository, CreateCategoryRecord } from '../../interfaces/index.js';
import type { Id, Language, PublicationCategory, TypeCategory } from '@archivist/protocol';

export class PgReferenceRepository implements ReferenceRepository {
  constructor(private db: Database) {}

  // Languages

  async addLanguage(language: Language): Promise<Language> {
    const [row] = await this.db.insert(languages).values(language).returning();
    return row;
  }

  async getLanguage(code: string): Promise<Language | null> {
    const [row] = await this.db.select().from(languages).where(eq(languages.code, code));
    return row ?? null;
  }

  async updateLanguage(code: string, description: string): Promise<Language | null> {
    const [row] = await this.db
      .update(languages)
      .set({ description })
      .where(eq(languages.code, code))
      .returning();
    return row ?? null;
  }

  async deleteLanguage(code: string): Promise<boolean> {
    const rows = await this.db
      .delete(languages)
      .where(eq(languages.code, code))
      .returning({ code: languages.code });
    return rows.length > 0;
  }

  async listLanguages(): Promise<Language[]> {
    const rows = await this.db.select().from(languages).orderBy(asc(languages.description));
    return rows;
  }

  // Program types

  async addTypeCategory(input: CreateCategoryRecord): Promise<TypeCategory> {
    const [row] = await this.db.insert(typeCategories).values(input).returning();
    return row;
  }

  async getTypeCategory(id: Id): Promise<TypeCategory | null> {
    const [row] = await this.db.select().from(typeCategories).where(eq(typeCategories.id, id));
    return row ?? null;
  }

  async getTypeCategoryByDescription(description: string): Promise<TypeCategory | null> {
    const [row] = await this.db
      .select()
      .from(typeCategories)
      .where(eq(typeCategories.description, description));
    return row ?? null;
  }

  async listTypeCategories(): Promise<TypeCategory[]> {
    const rows = await this.db.select().from(typeCategories).orderBy(asc(typeCategories.id));
    return rows;
  }

  // Publication types

  async addPublicationCategory(input: CreateCategoryRecord): Promise<PublicationCategory> {
    const [row] = await this.db.insert(publicationCategories).values(input).returning();
    return row;
  }

  async getPublicationCategory(id: Id): Promise<PublicationCategory | null> {
    const [row] = await this.db
      .select()
      .from(publicationCategories)
      .where(eq(publicationCategories.id, id));
    return row ?? null;
  }

  async getPublicationCategoryByDescription(
    description: string
  ): Promise<PublicationCategory | null> {
    const [row] = await this.db
      .select()
      .from(publicationCategories)
      .where(eq(publicationCategories.description, description));
    return row ?? null;
  }

  async listPublicationCategories(): Promise<PublicationCategory[]> {
    const rows = await this.db
      .select()
      .from(publicationCategories)
      .orderBy(asc(publicationCategories.id));
    return rows;
  }
}
