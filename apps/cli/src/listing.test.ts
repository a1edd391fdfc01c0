import { describe, expect, it } from 'vitest';
import { formatDryRunBanner, formatListing } from './listing';

describe('formatListing', () => {
  it('prints non-empty categories and the total', () => {
    const lines = formatListing({
      root: '/data/Downloads',
      categories: [
        { category: 'Documents', files: ['notes.txt', 'report.pdf'] },
        { category: 'Images', files: [] },
        { category: 'Others', files: ['unknown.xyz'] },
      ],
      total: 3,
    });

    expect(lines).toEqual([
      '',
      'Files in /data/Downloads:',
      '-'.repeat(50),
      '',
      'Documents:',
      '  📄 notes.txt',
      '  📄 report.pdf',
      '',
      'Others:',
      '  📄 unknown.xyz',
      '',
      'Total files: 3',
    ]);
  });

  it('prints only the total for an empty listing', () => {
    expect(formatListing({ root: '/data', categories: [], total: 0 }).slice(-2)).toEqual(['', 'Total files: 0']);
  });
});

describe('formatDryRunBanner', () => {
  it('announces that nothing will move', () => {
    expect(formatDryRunBanner()).toEqual(['DRY RUN - No files will be moved', '='.repeat(50)]);
  });
});
