import type { Id, Language, TypeCategory, PublicationCategory } from '@archivist/protocol';

/**
 * Input for creating a category; the store assigns an id when none is given
 */
export type CreateCategoryRecord = {
  id?: Id;
  description: string;
};

/**
 * Repository interface for the lookup tables: languages, program types and
 * publication types.
 */
export interface ReferenceRepository {
  // --- Languages ---

  addLanguage(language: Language): Promise<Language>;

  getLanguage(code: string): Promise<Language | null>;

  /**
   * Change a language's description
   * @returns The updated language, or null if the code is unknown
   */
  updateLanguage(code: string, description: string): Promise<Language | null>;

  deleteLanguage(code: string): Promise<boolean>;

  /**
   * All languages ordered by description
   */
  listLanguages(): Promise<Language[]>;

  // --- Program types ---

  addTypeCategory(input: CreateCategoryRecord): Promise<TypeCategory>;

  getTypeCategory(id: Id): Promise<TypeCategory | null>;

  getTypeCategoryByDescription(description: string): Promise<TypeCategory | null>;

  listTypeCategories(): Promise<TypeCategory[]>;

  // --- Publication types ---

  addPublicationCategory(input: CreateCategoryRecord): Promise<PublicationCategory>;

  getPublicationCategory(id: Id): Promise<PublicationCategory | null>;

  getPublicationCategoryByDescription(description: string): Promise<PublicationCategory | null>;

  listPublicationCategories(): Promise<PublicationCategory[]>;
}
