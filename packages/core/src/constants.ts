/**
 * Shared constants for the classifier, organizer and CLI.
 */

// ============================================================================
// CATEGORIES
// ============================================================================

/** Catch-all category for extensions no table entry claims. */
export const FALLBACK_CATEGORY = 'Others';

/** Folder organized when neither a path flag nor DOWNSORT_PATH is given (under the home dir). */
export const DEFAULT_ROOT_DIRNAME = 'Downloads';

// ============================================================================
// SCANNING & MOVING
// ============================================================================

/** Names starting with this prefix are never touched. */
export const HIDDEN_FILE_PREFIX = '.';

/** Inserted between stem and counter when a destination name is taken: report_1.pdf */
export const COLLISION_SEPARATOR = '_';

/** First counter tried during collision resolution. */
export const COLLISION_COUNTER_START = 1;

// ============================================================================
// OUTPUT
// ============================================================================

export const BANNER_WIDTH = 50;
