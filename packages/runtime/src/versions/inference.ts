// Version Inference
//
// Works out which file_id.diz schema version an entry's data needs. Version
// 2.00 is the base; 3.00 added credits, aliases and the publication fields;
// 3.10 added designers, barcodes and DL codes. The legacy COMPANY and
// PROTECTED fields only exist in 2.00, so combining them with anything newer
// is inconsistent.

import {
  isPresent,
  isSet,
  type EntryFields,
  type InferredVersion,
  type ManifestVersion,
} from '@archivist/protocol';

/**
 * Facts about an entry that live outside its own row.
 */
export type VersionFacts = {
  hasTitleAliases: boolean;
  hasAssociations: boolean;
  hasDesigner: boolean;
};

/**
 * The entry fields that take part in inference.
 */
export type VersionedFields = Pick<
  EntryFields,
  | 'originalTitle'
  | 'publicationTypeId'
  | 'publisherCode'
  | 'memoryRequired'
  | 'protection'
  | 'runCommand'
  | 'barcode'
  | 'dlCode'
  | 'company'
  | 'protected'
>;

export const NO_VERSION_FACTS: VersionFacts = {
  hasTitleAliases: false,
  hasAssociations: false,
  hasDesigner: false,
};

/**
 * Infer the manifest version an entry requires.
 *
 * Empty strings count as absent, so unnormalized input infers the same as
 * its normalized form.
 */
export function inferVersion(entry: VersionedFields, facts: VersionFacts): InferredVersion {
  let version: ManifestVersion = '2.00';

  if (
    facts.hasTitleAliases ||
    facts.hasAssociations ||
    isPresent(entry.originalTitle) ||
    isSet(entry.publicationTypeId) ||
    isPresent(entry.publisherCode) ||
    isSet(entry.memoryRequired) ||
    isPresent(entry.protection) ||
    isPresent(entry.runCommand)
  ) {
    version = '3.00';
  }

  // Checked on its own: a 3.10 field implies 3.10 whatever else is set
  if (facts.hasDesigner || isPresent(entry.barcode) || isPresent(entry.dlCode)) {
    version = '3.10';
  }

  if (version !== '2.00' && (isPresent(entry.company) || isPresent(entry.protected))) {
    return 'INCONSISTENT';
  }

  return version;
}

/**
 * Version implied by an entry's own fields and title aliases, leaving its
 * credits out. A credit can only be added once this reaches 3.00.
 */
export function fieldVersion(entry: VersionedFields, hasTitleAliases: boolean): InferredVersion {
  return inferVersion(entry, { ...NO_VERSION_FACTS, hasTitleAliases });
}
