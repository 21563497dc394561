// Write-input schemas
//
// Shapes accepted by the catalog write boundary. Text fields are trimmed and
// an empty string becomes null, so null is the only representation of an
// absent value once an input has been parsed.

import { z } from 'zod';
import { AUTHOR_ROLES } from '../types/associations.js';

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .transform((value) => (value === '' ? null : value))
    .nullable()
    .optional();

const optionalId = z.number().int().positive().nullable().optional();

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a date in YYYY-MM-DD form')
  .refine((value) => {
    const time = Date.parse(`${value}T00:00:00Z`);
    return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
  }, 'invalid date');

/**
 * Descriptive entry fields; every field is optional.
 */
export const entryFieldsSchema = z.object({
  fileSize: z.number().int().nonnegative().nullable().optional(),
  title: optionalText(255),
  originalTitle: optionalText(255),
  company: optionalText(255),
  year: z.number().int().min(1000).max(9999).nullable().optional(),
  languages: z.array(z.string()).optional(),
  typeId: optionalId,
  subtype: optionalText(255),
  titleScreen: optionalText(50),
  cheatMode: optionalText(50),
  protected: optionalText(50),
  problems: optionalText(255),
  uploadDate: isoDateSchema.nullable().optional(),
  uploader: optionalText(255),
  comments: optionalText(1000),
  publicationTypeId: optionalId,
  publisherCode: optionalText(16),
  barcode: optionalText(13),
  dlCode: optionalText(26),
  memoryRequired: z.number().int().nonnegative().nullable().optional(),
  protection: optionalText(255),
  runCommand: optionalText(1000),
});

export type EntryFieldsInput = z.input<typeof entryFieldsSchema>;
export type ParsedEntryFields = z.output<typeof entryFieldsSchema>;

/**
 * A credit supplied by ingestion: the identity is referenced by name and
 * created on first reference.
 */
export const creditInputSchema = z.object({
  identityName: z.string().trim().min(1).max(255),
  role: z.enum(AUTHOR_ROLES),
  index: z.number().int().nonnegative().optional(),
});

export type CreditInput = z.input<typeof creditInputSchema>;

/**
 * A new entry, with the title aliases and credits written in the same change.
 */
export const createEntryInputSchema = entryFieldsSchema
  .extend({
    id: z.number().int().positive().optional(),
    path: z.string().trim().min(1).max(260),
    titleAliases: z.array(z.string().trim().min(1).max(255)).optional(),
    credits: z.array(creditInputSchema).optional(),
  })
  .strict();

export type CreateEntryInput = z.input<typeof createEntryInputSchema>;

/**
 * Changes to an existing entry. The path cannot be changed.
 */
export const updateEntryInputSchema = entryFieldsSchema.strict();

export type UpdateEntryInput = z.input<typeof updateEntryInputSchema>;

/**
 * A credit on an existing entry, by identity name or id.
 */
export const addCreditInputSchema = z
  .object({
    entryId: z.number().int().positive(),
    identityName: z.string().trim().min(1).max(255).optional(),
    identityId: z.number().int().positive().optional(),
    role: z.enum(AUTHOR_ROLES),
    index: z.number().int().nonnegative().optional(),
  })
  .refine((input) => (input.identityName === undefined) !== (input.identityId === undefined), {
    message: 'exactly one of identityName and identityId is required',
    path: ['identityName'],
  });

export type AddCreditInput = z.input<typeof addCreditInputSchema>;

export const titleAliasSchema = z.string().trim().min(1).max(255);

export const identityNameSchema = z.string().trim().min(1).max(255);

export const createIdentityInputSchema = z
  .object({
    id: z.number().int().positive().optional(),
    name: identityNameSchema,
    aliasOfId: z.number().int().positive().nullable().optional(),
  })
  .strict();

export type CreateIdentityInput = z.input<typeof createIdentityInputSchema>;

export const languageInputSchema = z
  .object({
    code: z.string().trim().min(1).max(5),
    description: z.string().trim().min(1).max(30),
  })
  .strict();

export type LanguageInput = z.input<typeof languageInputSchema>;

export const categoryInputSchema = z
  .object({
    id: z.number().int().positive().optional(),
    description: z.string().trim().min(1).max(255),
  })
  .strict();

export type CategoryInput = z.input<typeof categoryInputSchema>;

/**
 * Search pattern: `_` matches one character, `%` any run, `\` escapes.
 */
export const searchPatternSchema = z.string().min(1).max(260);
