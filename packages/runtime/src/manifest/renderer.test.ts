// Tests for the manifest renderer

import { describe, it, expect } from 'vitest';
import {
  emptyEntryFields,
  type AuthorRole,
  type CreditedName,
  type Entry,
  type ResolvedEntry,
} from '@archivist/protocol';
import { renderManifest, platformFor, formatUploaded, DEFAULT_RENDER_OPTIONS } from './renderer.js';
import { RenderError } from '../errors.js';

const RULE_71 = '-'.repeat(71);
const RULE_79 = '-'.repeat(79);

function createMockEntry(overrides: Partial<Entry> = {}): Entry {
  return { ...emptyEntryFields(), id: 1, path: 'games/arcade/test.zip', ...overrides };
}

function credits(...items: [AuthorRole, string][]): CreditedName[] {
  const next = new Map<AuthorRole, number>();
  return items.map(([role, name], i) => {
    const index = next.get(role) ?? 0;
    next.set(role, index + 1);
    return { entryId: 1, identityId: i + 1, role, index, name };
  });
}

function resolved(overrides: Partial<ResolvedEntry> & { entry: Entry }): ResolvedEntry {
  return {
    version: '3.00',
    titleAliases: [],
    credits: [],
    languageNames: [],
    typeName: null,
    publicationName: null,
    ...overrides,
  };
}

describe('renderManifest', () => {
  it('renders a 3.00 entry in the extended layout', () => {
    const entry = createMockEntry({
      path: 'games/arcade/rolanrop.zip',
      title: 'Roland on the Ropes',
      year: 1984,
      languages: ['en'],
      typeId: 1,
      titleScreen: 'Yes',
      cheatMode: 'Yes',
      uploadDate: '2002-10-14',
      uploader: 'Nicholas Campbell',
      publicationTypeId: 2,
      memoryRequired: 64,
      runCommand: 'RUN"ROLANDRO"',
    });

    const text = renderManifest(
      resolved({
        entry,
        version: '3.00',
        credits: credits(
          ['PUBLISHER', 'Amsoft'],
          ['CRACKER', 'Nich'],
          ['DEVELOPER', 'Indescomp'],
          ['AUTHOR', 'Ana Ruiz'],
          ['AUTHOR', 'Bert Cole'],
          ['AUTHOR', 'Carla Diaz'],
          ['AUTHOR', 'Dev Patel']
        ),
        languageNames: ['English'],
        typeName: 'Arcade game',
        publicationName: 'Crack',
      })
    );

    expect(text).toBe(
      '    ** AMSTRAD CPC SOFTWARE AT FTP.NVG.NTNU.NO : file_id.diz FILE V 3.00 **\n' +
      `${RULE_79}\n` +
      'TITLE:           Roland on the Ropes\n' +
      'YEAR:            1984\n' +
      'PUBLISHER:       Amsoft\n' +
      'PUBLICATION:     Crack\n' +
      'CRACKER:         Nich\n' +
      'DEVELOPER:       Indescomp\n' +
      'AUTHOR:          Ana Ruiz, Bert Cole, Carla Diaz, Dev Patel\n' +
      'LANGUAGE:        English\n' +
      'MEMORY REQUIRED: 64K\n' +
      'TYPE:            Arcade game\n' +
      'TITLE SCREEN:    Yes\n' +
      'CHEAT MODE:      Yes\n' +
      'RUN COMMAND:     RUN"ROLANDRO"\n' +
      'UPLOADED:        14/10/2002 by Nicholas Campbell\n' +
      `${RULE_79}\n`
    );
  });

  it('renders a 2.00 entry with placeholders for absent values', () => {
    const entry = createMockEntry({
      path: 'pcw/games/caverun.zip',
      title: 'Cave Runner',
      company: 'Softsmith',
      languages: ['en'],
    });

    const text = renderManifest(resolved({ entry, version: '2.00', languageNames: ['English'] }));

    expect(text).toBe(
      '** AMSTRAD PCW SOFTWARE AT FTP.NVG.NTNU.NO : file_id.diz FILE V 2.00 **\n' +
      `${RULE_71}\n` +
      'TITLE:        Cave Runner\n' +
      'COMPANY:      Softsmith\n' +
      'YEAR:         ?\n' +
      'LANGUAGE:     English\n' +
      'TYPE:         ?\n' +
      'SUBTYPE:      -\n' +
      'TITLE SCREEN: -\n' +
      'CHEAT MODE:   -\n' +
      'PROTECTED:    -\n' +
      'PROBLEMS:     -\n' +
      'UPLOADED:     ? by ?\n' +
      'COMMENTS:     ?\n' +
      `${RULE_71}\n`
    );
  });

  it('renders 3.10 fields and joins title aliases', () => {
    const entry = createMockEntry({
      title: "Ghosts'n Goblins",
      originalTitle: 'Makaimura',
      uploadDate: '2003-02-01',
    });

    const text = renderManifest(
      resolved({
        entry,
        version: '3.10',
        titleAliases: ["Ghosts 'n' Goblins", 'Makaimura'],
        credits: credits(['DESIGNER', 'Kenji Mori']),
      })
    );

    expect(text).toBe(
      '    ** AMSTRAD CPC SOFTWARE AT FTP.NVG.NTNU.NO : file_id.diz FILE V 3.10 **\n' +
      `${RULE_79}\n` +
      'TITLE:           Ghosts\'n Goblins\n' +
      'ALSO KNOWN AS:   Ghosts \'n\' Goblins; Makaimura\n' +
      'ORIGINAL TITLE:  Makaimura\n' +
      'DESIGNER:        Kenji Mori\n' +
      'UPLOADED:        01/02/2003 by ?\n' +
      `${RULE_79}\n`
    );
  });

  it('ends every line with a newline', () => {
    const text = renderManifest(resolved({ entry: createMockEntry(), version: '2.00' }));
    expect(text.endsWith(`${RULE_71}\n`)).toBe(true);
    expect(text.split('\n')).toHaveLength(16);
  });

  it('names the configured archive host', () => {
    const text = renderManifest(resolved({ entry: createMockEntry(), version: '2.00' }), {
      ...DEFAULT_RENDER_OPTIONS,
      archiveHost: 'FTP.EXAMPLE.ORG',
    });
    expect(text.split('\n')[0]).toBe(
      '** AMSTRAD CPC SOFTWARE AT FTP.EXAMPLE.ORG : file_id.diz FILE V 2.00 **'
    );
  });

  it('refuses an inconsistent entry', () => {
    const entry = createMockEntry({ company: 'Amsoft', memoryRequired: 64 });
    expect(() => renderManifest(resolved({ entry, version: 'INCONSISTENT' }))).toThrow(RenderError);
  });
});

describe('platformFor', () => {
  it('chooses PCW for paths under pcw/', () => {
    expect(platformFor('pcw/games/a.zip')).toBe('PCW');
    expect(platformFor('games/pcw/a.zip')).toBe('CPC');
  });

  it('uses configured prefixes', () => {
    const options = {
      ...DEFAULT_RENDER_OPTIONS,
      platformPrefixes: [{ prefix: 'joyce/', platform: 'PCW' as const }],
    };
    expect(platformFor('joyce/a.zip', options)).toBe('PCW');
    expect(platformFor('pcw/a.zip', options)).toBe('CPC');
  });
});

describe('formatUploaded', () => {
  it('formats the date as DD/MM/YYYY', () => {
    expect(formatUploaded('2002-10-14', 'Nicholas Campbell')).toBe('14/10/2002 by Nicholas Campbell');
  });

  it('uses ? for each missing half', () => {
    expect(formatUploaded(null, 'Someone')).toBe('? by Someone');
    expect(formatUploaded('1999-01-05', null)).toBe('05/01/1999 by ?');
    expect(formatUploaded(null, null)).toBe('? by ?');
  });
});
