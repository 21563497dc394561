// ASCII folding for accent-insensitive search
//
// Letters are decomposed and their combining marks dropped ('é' → 'e').
// Latin-1 letters without a decomposition are spelled out ('Ø' → 'O',
// 'ß' → 'ss').

const COMBINING_MARKS = /[\u0300-\u036f]/g;

const LETTER_FOLDS: ReadonlyArray<readonly [string, string]> = [
  ['Ø', 'O'],
  ['ø', 'o'],
  ['Ð', 'D'],
  ['ð', 'd'],
];

/**
 * Letters that fold to two ASCII letters.
 */
export const LIGATURE_FOLDS: ReadonlyArray<readonly [string, string]> = [
  ['Æ', 'AE'],
  ['æ', 'ae'],
  ['ß', 'ss'],
  ['Þ', 'TH'],
  ['þ', 'th'],
];

export function foldDiacritics(text: string): string {
  let folded = text.normalize('NFD').replace(COMBINING_MARKS, '');
  for (const [letter, spelling] of [...LETTER_FOLDS, ...LIGATURE_FOLDS]) {
    folded = folded.replaceAll(letter, spelling);
  }
  return folded;
}

/**
 * The Latin-1 letters that fold to a single letter, paired position by
 * position, in the form SQL translate() takes.
 */
export function latin1LetterFolds(): { from: string; to: string } {
  let from = '';
  let to = '';
  for (let code = 0xc0; code <= 0xff; code++) {
    const letter = String.fromCharCode(code);
    const folded = foldDiacritics(letter);
    if (folded !== letter && folded.length === 1) {
      from += letter;
      to += folded;
    }
  }
  return { from, to };
}
