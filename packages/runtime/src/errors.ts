// Catalog error types

import type { CatalogResourceType, Id } from '@archivist/protocol';

/**
 * Base class for all catalog errors.
 * Provides structured error information for debugging and logging.
 */
export class CatalogError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'CatalogError';
    this.code = code;
  }
}

/**
 * Rules a write can break. Each names the check that refused it.
 */
export type ValidationRule =
  | 'INVALID_INPUT'
  | 'INCONSISTENT_VERSION'
  | 'CHEAT_MODE_NOT_CRACK'
  | 'INVALID_MEMORY'
  | 'INVALID_LANGUAGE'
  | 'VERSION_TOO_LOW'
  | 'DUPLICATE_PATH'
  | 'DUPLICATE_ENTRY_ID'
  | 'DUPLICATE_TITLE_ALIAS'
  | 'DUPLICATE_CREDIT'
  | 'DUPLICATE_INDEX'
  | 'DUPLICATE_IDENTITY'
  | 'DUPLICATE_LANGUAGE'
  | 'DUPLICATE_CATEGORY'
  | 'LANGUAGE_IN_USE';

/**
 * A write that would leave the catalog in a state its rules forbid.
 */
export class ValidationError extends CatalogError {
  readonly rule: ValidationRule;
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    rule: ValidationRule,
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.rule = rule;
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * An alias-of link that would close a loop, or a walk that exceeded the
 * configured hop limit.
 */
export class CycleError extends CatalogError {
  readonly identityId: Id;
  readonly targetId: Id;

  constructor(identityId: Id, targetId: Id, message?: string) {
    super(
      'ALIAS_CYCLE',
      message ?? `Making identity ${identityId} an alias of ${targetId} would create a cycle`
    );
    this.name = 'CycleError';
    this.identityId = identityId;
    this.targetId = targetId;
  }
}

/**
 * A referenced record does not exist.
 */
export class NotFoundError extends CatalogError {
  readonly resource: CatalogResourceType;
  readonly key: Id | string;

  constructor(resource: CatalogResourceType, key: Id | string) {
    super('NOT_FOUND', `${resource} not found: ${key}`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.key = key;
  }
}

/**
 * The manifest cannot be produced for an entry.
 */
export class RenderError extends CatalogError {
  readonly entryId: Id;

  constructor(entryId: Id, reason: string) {
    super('RENDER_ERROR', `Cannot render manifest for entry ${entryId}: ${reason}`);
    this.name = 'RenderError';
    this.entryId = entryId;
  }
}
