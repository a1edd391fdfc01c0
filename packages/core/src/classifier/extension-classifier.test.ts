import { describe, expect, it } from 'vitest';
import { ExtensionClassifier, extensionOf, splitExtension } from './extension-classifier';
import { DEFAULT_CATEGORY_TABLE, parseCategoryTable } from '../categories/category-table';
import { ConfigError } from '../errors';

describe('extensionOf', () => {
  it('lowercases the last suffix and keeps the dot', () => {
    expect(extensionOf('report.PDF')).toBe('.pdf');
    expect(extensionOf('archive.tar.gz')).toBe('.gz');
  });

  it('returns an empty string when there is no extension', () => {
    expect(extensionOf('README')).toBe('');
    expect(extensionOf('.env')).toBe('');
    expect(extensionOf('notes.')).toBe('');
  });
});

describe('splitExtension', () => {
  it('splits at the last dot and preserves case', () => {
    expect(splitExtension('Archive.Tar.GZ')).toEqual({ stem: 'Archive.Tar', ext: '.GZ' });
    expect(splitExtension('Makefile')).toEqual({ stem: 'Makefile', ext: '' });
  });
});

describe('ExtensionClassifier', () => {
  const classifier = new ExtensionClassifier();

  it('maps known extensions to their category', () => {
    expect(classifier.classify('.pdf')).toBe('Documents');
    expect(classifier.classify('.jpg')).toBe('Images');
    expect(classifier.classify('.zip')).toBe('Archives');
    expect(classifier.classify('.py')).toBe('Code');
    expect(classifier.classify('.torrent')).toBe('Torrents');
  });

  it('is case-insensitive', () => {
    expect(classifier.classify('.PDF')).toBe(classifier.classify('.pdf'));
    expect(classifier.classifyFile('Photo.JPG')).toBe('Images');
  });

  it('falls back to Others for unknown or missing extensions', () => {
    expect(classifier.classify('.xyz')).toBe('Others');
    expect(classifier.classify('')).toBe('Others');
    expect(classifier.classifyFile('README')).toBe('Others');
  });

  it('agrees with the table for every listed extension', () => {
    // Under last-wins the owner is the last category listing the extension.
    const owner = new Map<string, string>();
    for (const { name, extensions } of DEFAULT_CATEGORY_TABLE) {
      for (const ext of extensions) owner.set(ext, name);
    }
    for (const [ext, category] of owner) {
      expect(classifier.classify(ext)).toBe(category);
    }
  });

  it('exposes categories in table order', () => {
    expect(classifier.categories).toHaveLength(12);
    expect(classifier.categories[0]).toBe('Documents');
    expect(classifier.categories[11]).toBe('Others');
  });

  describe('duplicate extensions', () => {
    it('lets the later category win by default', () => {
      expect(classifier.classify('.xls')).toBe('Spreadsheets');
      expect(classifier.classify('.xlsx')).toBe('Spreadsheets');
      expect(classifier.classify('.ppt')).toBe('Presentations');
      expect(classifier.classify('.pptx')).toBe('Presentations');
    });

    it('reports every overlap', () => {
      expect(classifier.conflicts.map((c) => c.extension)).toEqual(['.xls', '.xlsx', '.ppt', '.pptx']);
      expect(classifier.conflicts[0]).toEqual({
        extension: '.xls',
        categories: ['Documents', 'Spreadsheets'],
        winner: 'Spreadsheets',
      });
    });

    it('keeps the first category under first-wins', () => {
      const firstWins = new ExtensionClassifier(DEFAULT_CATEGORY_TABLE, { duplicates: 'first-wins' });
      expect(firstWins.classify('.xls')).toBe('Documents');
      expect(firstWins.classify('.pptx')).toBe('Documents');
      expect(firstWins.conflicts[0].winner).toBe('Documents');
    });

    it('rejects the table under the error policy', () => {
      expect(() => new ExtensionClassifier(DEFAULT_CATEGORY_TABLE, { duplicates: 'error' })).toThrow(ConfigError);
      expect(() => new ExtensionClassifier(DEFAULT_CATEGORY_TABLE, { duplicates: 'error' })).toThrow(
        'Extension .xls is listed under both "Documents" and "Spreadsheets"'
      );
    });

    it('ignores an extension repeated inside one category', () => {
      const table = parseCategoryTable({ Docs: ['.pdf', '.PDF'] });
      const strict = new ExtensionClassifier(table, { duplicates: 'error' });
      expect(strict.classify('.pdf')).toBe('Docs');
      expect(strict.conflicts).toEqual([]);
    });
  });
});
