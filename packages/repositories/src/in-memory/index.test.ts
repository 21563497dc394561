// Tests for the in-memory repository context

import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryRepositoryContext, InMemoryConstraintError } from './index.js';
import type { InMemoryRepositoryContext } from './index.js';

describe('createInMemoryRepositoryContext', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  describe('entries', () => {
    it('assigns ids and fills absent fields with null', async () => {
      const first = await repos.entries.create({ path: 'games/a.zip', title: 'Alpha' });
      const second = await repos.entries.create({ path: 'games/b.zip' });

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(first.year).toBeNull();
      expect(first.languages).toEqual([]);
    });

    it('continues the sequence after an explicit id', async () => {
      await repos.entries.create({ id: 10, path: 'games/a.zip' });
      const next = await repos.entries.create({ path: 'games/b.zip' });
      expect(next.id).toBe(11);
    });

    it('rejects a duplicate path', async () => {
      await repos.entries.create({ path: 'games/a.zip' });
      await expect(repos.entries.create({ path: 'games/a.zip' })).rejects.toBeInstanceOf(
        InMemoryConstraintError
      );
    });

    it('keeps the path when updating', async () => {
      const entry = await repos.entries.create({ path: 'games/a.zip' });
      const updated = await repos.entries.update(entry.id, { title: 'Alpha', languages: ['fr', 'en'] });

      expect(updated?.path).toBe('games/a.zip');
      expect(updated?.title).toBe('Alpha');
      expect(updated?.languages).toEqual(['en', 'fr']);
    });

    it('returns null when updating a missing entry', async () => {
      expect(await repos.entries.update(99, { title: 'x' })).toBeNull();
    });

    it('cascades deletes to aliases and credits', async () => {
      const entry = await repos.entries.create({ path: 'games/a.zip' });
      const identity = await repos.identities.create({ name: 'Steve Wilcox' });
      await repos.titleAliases.add({ entryId: entry.id, title: 'Other' });
      await repos.associations.create({
        entryId: entry.id,
        identityId: identity.id,
        role: 'AUTHOR',
        index: 0,
      });

      expect(await repos.entries.delete(entry.id)).toBe(true);
      expect(await repos.titleAliases.countByEntry(entry.id)).toBe(0);
      expect(await repos.associations.countByEntry(entry.id)).toBe(0);
      expect(await repos.entries.delete(entry.id)).toBe(false);
    });

    it('searches paths case-insensitively in path order', async () => {
      await repos.entries.create({ path: 'pcw/games/b.zip' });
      await repos.entries.create({ path: 'games/c.zip' });
      await repos.entries.create({ path: 'PCW/games/a.zip' });

      const matches = await repos.entries.searchPaths('pcw/%');
      expect(matches.map((m) => m.path)).toEqual(['PCW/games/a.zip', 'pcw/games/b.zip']);
    });

    it('counts entries by language', async () => {
      await repos.entries.create({ path: 'a.zip', languages: ['en'] });
      await repos.entries.create({ path: 'b.zip', languages: ['en', 'es'] });
      await repos.entries.create({ path: 'c.zip' });

      expect(await repos.entries.countByLanguage('en')).toBe(2);
      expect(await repos.entries.countByLanguage('es')).toBe(1);
      expect(await repos.entries.countByLanguage('fr')).toBe(0);
    });
  });

  describe('title aliases', () => {
    it('lists aliases ordered by title', async () => {
      const entry = await repos.entries.create({ path: 'a.zip' });
      await repos.titleAliases.add({ entryId: entry.id, title: 'zeta' });
      await repos.titleAliases.add({ entryId: entry.id, title: 'Beta' });

      const aliases = await repos.titleAliases.listByEntry(entry.id);
      expect(aliases.map((a) => a.title)).toEqual(['Beta', 'zeta']);
    });

    it('rejects an alias for a missing entry', async () => {
      await expect(repos.titleAliases.add({ entryId: 5, title: 'x' })).rejects.toBeInstanceOf(
        InMemoryConstraintError
      );
    });

    it('matches accented aliases only when diacritics are ignored', async () => {
      const entry = await repos.entries.create({ path: 'a.zip' });
      await repos.titleAliases.add({ entryId: entry.id, title: 'Pánico en el Espacio' });

      expect(await repos.titleAliases.search('panico%')).toEqual([]);
      expect(await repos.titleAliases.search('panico%', { ignoreDiacritics: true })).toEqual([
        { entryId: entry.id, title: 'Pánico en el Espacio', isAlias: true },
      ]);
    });
  });

  describe('identities', () => {
    it('finds the lowest id for a repeated name', async () => {
      await repos.identities.create({ id: 4, name: 'Ocean' });
      await repos.identities.create({ id: 2, name: 'Ocean' });

      expect((await repos.identities.getByName('Ocean'))?.id).toBe(2);
    });

    it('lists direct aliases of a set of targets ordered by id', async () => {
      const root = await repos.identities.create({ name: 'Root' });
      const b = await repos.identities.create({ name: 'B', aliasOfId: root.id });
      const a = await repos.identities.create({ name: 'A', aliasOfId: root.id });
      await repos.identities.create({ name: 'C', aliasOfId: a.id });

      const aliases = await repos.identities.listAliasesOf([root.id]);
      expect(aliases.map((i) => i.id)).toEqual([b.id, a.id]);
    });

    it('clears an alias link when updated to null', async () => {
      const root = await repos.identities.create({ name: 'Root' });
      const alias = await repos.identities.create({ name: 'Alias', aliasOfId: root.id });

      const updated = await repos.identities.update(alias.id, { aliasOfId: null });
      expect(updated).toEqual({ id: alias.id, name: 'Alias', aliasOfId: null });
    });

    it('returns one search row per distinct role', async () => {
      const entry = await repos.entries.create({ path: 'a.zip' });
      const other = await repos.entries.create({ path: 'b.zip' });
      const jon = await repos.identities.create({ name: 'Jon' });
      await repos.identities.create({ name: 'Jonathan' });
      await repos.associations.create({ entryId: entry.id, identityId: jon.id, role: 'MUSICIAN', index: 0 });
      await repos.associations.create({ entryId: other.id, identityId: jon.id, role: 'MUSICIAN', index: 0 });
      await repos.associations.create({ entryId: entry.id, identityId: jon.id, role: 'AUTHOR', index: 0 });

      const rows = await repos.identities.search('jon%');
      expect(rows).toEqual([
        { identityId: 1, name: 'Jon', aliasOfId: null, role: 'AUTHOR' },
        { identityId: 1, name: 'Jon', aliasOfId: null, role: 'MUSICIAN' },
        { identityId: 2, name: 'Jonathan', aliasOfId: null, role: null },
      ]);
    });
  });

  describe('associations', () => {
    it('lists credits by role order then index', async () => {
      const entry = await repos.entries.create({ path: 'a.zip' });
      const x = await repos.identities.create({ name: 'X' });
      const y = await repos.identities.create({ name: 'Y' });
      await repos.associations.create({ entryId: entry.id, identityId: x.id, role: 'MUSICIAN', index: 0 });
      await repos.associations.create({ entryId: entry.id, identityId: y.id, role: 'PUBLISHER', index: 1 });
      await repos.associations.create({ entryId: entry.id, identityId: x.id, role: 'PUBLISHER', index: 0 });

      const credits = await repos.associations.listByEntry(entry.id);
      expect(credits.map((c) => `${c.role}:${c.index}:${c.name}`)).toEqual([
        'PUBLISHER:0:X',
        'PUBLISHER:1:Y',
        'MUSICIAN:0:X',
      ]);
    });

    it('reports the highest index or null', async () => {
      const entry = await repos.entries.create({ path: 'a.zip' });
      const x = await repos.identities.create({ name: 'X' });
      expect(await repos.associations.maxIndex(entry.id, 'AUTHOR')).toBeNull();

      await repos.associations.create({ entryId: entry.id, identityId: x.id, role: 'AUTHOR', index: 3 });
      expect(await repos.associations.maxIndex(entry.id, 'AUTHOR')).toBe(3);
    });

    it('rejects a second credit at the same index', async () => {
      const entry = await repos.entries.create({ path: 'a.zip' });
      const x = await repos.identities.create({ name: 'X' });
      const y = await repos.identities.create({ name: 'Y' });
      await repos.associations.create({ entryId: entry.id, identityId: x.id, role: 'AUTHOR', index: 0 });

      await expect(
        repos.associations.create({ entryId: entry.id, identityId: y.id, role: 'AUTHOR', index: 0 })
      ).rejects.toThrow('Duplicate credit index');
    });

    it('deletes credits matching a filter', async () => {
      const entry = await repos.entries.create({ path: 'a.zip' });
      const x = await repos.identities.create({ name: 'X' });
      const y = await repos.identities.create({ name: 'Y' });
      await repos.associations.create({ entryId: entry.id, identityId: x.id, role: 'AUTHOR', index: 0 });
      await repos.associations.create({ entryId: entry.id, identityId: x.id, role: 'ARTIST', index: 0 });
      await repos.associations.create({ entryId: entry.id, identityId: y.id, role: 'AUTHOR', index: 1 });

      expect(await repos.associations.delete({ entryId: entry.id, identityId: x.id })).toBe(2);
      expect(await repos.associations.countByEntry(entry.id)).toBe(1);
    });

    it('lists titles of an identity with untitled entries last', async () => {
      const untitled = await repos.entries.create({ path: 'a.zip' });
      const beta = await repos.entries.create({ path: 'b.zip', title: 'beta' });
      const alpha = await repos.entries.create({ path: 'c.zip', title: 'Alpha' });
      const x = await repos.identities.create({ name: 'X' });
      for (const entry of [untitled, beta, alpha]) {
        await repos.associations.create({ entryId: entry.id, identityId: x.id, role: 'AUTHOR', index: 0 });
      }

      const titles = await repos.associations.listTitlesByIdentity(x.id);
      expect(titles.map((t) => t.title)).toEqual(['Alpha', 'beta', null]);
    });
  });

  describe('reference tables', () => {
    it('orders languages by description', async () => {
      await repos.reference.addLanguage({ code: 'es', description: 'Spanish' });
      await repos.reference.addLanguage({ code: 'en', description: 'English' });

      const languages = await repos.reference.listLanguages();
      expect(languages.map((l) => l.code)).toEqual(['en', 'es']);
    });

    it('rejects a duplicate category description', async () => {
      await repos.reference.addTypeCategory({ description: 'Game' });
      await expect(repos.reference.addTypeCategory({ description: 'Game' })).rejects.toBeInstanceOf(
        InMemoryConstraintError
      );
    });

    it('looks categories up by description', async () => {
      const crack = await repos.reference.addPublicationCategory({ description: 'Crack' });
      expect(await repos.reference.getPublicationCategoryByDescription('Crack')).toEqual(crack);
      expect(await repos.reference.getPublicationCategoryByDescription('crack')).toBeNull();
    });
  });

  describe('transaction', () => {
    it('keeps writes when the callback resolves', async () => {
      const entry = await repos.transaction((tx) => tx.entries.create({ path: 'a.zip' }));
      expect(await repos.entries.get(entry.id)).not.toBeNull();
    });

    it('restores every store when the callback throws', async () => {
      const kept = await repos.entries.create({ path: 'kept.zip' });

      await expect(
        repos.transaction(async (tx) => {
          await tx.entries.create({ path: 'dropped.zip' });
          await tx.titleAliases.add({ entryId: kept.id, title: 'Dropped alias' });
          await tx.entries.delete(kept.id);
          throw new Error('abort');
        })
      ).rejects.toThrow('abort');

      expect(await repos.entries.getByPath('dropped.zip')).toBeNull();
      expect(await repos.entries.get(kept.id)).not.toBeNull();
      expect(await repos.titleAliases.countByEntry(kept.id)).toBe(0);
    });

    it('runs transactions one after another', async () => {
      const order: string[] = [];
      const first = repos.transaction(async () => {
        order.push('first:start');
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push('first:end');
      });
      const second = repos.transaction(async () => {
        order.push('second');
      });

      await Promise.all([first, second]);
      expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('keeps running after a failed transaction', async () => {
      await expect(
        repos.transaction(async () => {
          throw new Error('first fails');
        })
      ).rejects.toThrow('first fails');

      const entry = await repos.transaction((tx) => tx.entries.create({ path: 'a.zip' }));
      expect(entry.id).toBe(1);
    });
  });

  it('clear() empties every store and resets ids', async () => {
    await repos.entries.create({ path: 'a.zip' });
    await repos.identities.create({ name: 'X' });
    repos.clear();

    expect(repos._data.entries.size).toBe(0);
    expect(repos._data.identities.size).toBe(0);
    expect((await repos.entries.create({ path: 'b.zip' })).id).toBe(1);
  });
});
