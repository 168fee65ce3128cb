const FALLBACK_SLUG = 'task';

/**
 * Turn a task heading into the slug used for plurb ids and branch names.
 *
 * "Add database migration!" → "add-database-migration"
 */
export function slugifyTaskName(name: string): string {
  const slug = name
    .toLowerCase()
    // Keep word characters, whitespace and hyphens only
    .replace(/[^\w\s-]+/g, '')
    .replace(/\s+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');

  return slug || FALLBACK_SLUG;
}
