import { BANNER_WIDTH, type CategoryListing } from '@downsort/core';

export function formatDryRunBanner(): string[] {
  return ['DRY RUN - No files will be moved', '='.repeat(BANNER_WIDTH)];
}

/**
 * Renders a listing as printable lines. Empty categories are left out; the
 * total counts every listed file.
 */
export function formatListing(listing: CategoryListing): string[] {
  const lines = ['', `Files in ${listing.root}:`, '-'.repeat(BANNER_WIDTH)];

  for (const { category, files } of listing.categories) {
    if (files.length === 0) continue;
    lines.push('', `${category}:`);
    for (const file of files) {
      lines.push(`  📄 ${file}`);
    }
  }

  lines.push('', `Total files: ${listing.total}`);
  return lines;
}
