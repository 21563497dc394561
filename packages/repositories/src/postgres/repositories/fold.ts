import { sql, type SQL, type SQLWrapper } from 'drizzle-orm';
import { LIGATURE_FOLDS, latin1LetterFolds } from '@archivist/protocol';

const LETTER_FOLDS = latin1LetterFolds();

/**
 * SQL expression for a text column folded to ASCII the way foldDiacritics()
 * folds a search pattern, for Latin-1 text.
 */
export function foldedText(column: SQLWrapper): SQL {
  let expression = sql`translate(${column}, ${LETTER_FOLDS.from}, ${LETTER_FOLDS.to})`;
  for (const [letter, spelling] of LIGATURE_FOLDS) {
    expression = sql`replace(${expression}, ${letter}, ${spelling})`;
  }
  return expression;
}
