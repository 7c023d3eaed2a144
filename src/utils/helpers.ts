/**
 * General utility helpers for Waypoint
 */

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

// ---------------------------------------------------------------------------
// Work item identifiers
// ---------------------------------------------------------------------------

const MAX_SLUG_LENGTH = 48

/**
 * Lower-case, dash-separated slug of a title.
 * Returns 'item' when nothing usable is left.
 */
export function slugify(title: string): string {
  const slug = title
    .normalize('NFKD')
    .replace(/[̀-ͯ]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, '')
  return slug === '' ? 'item' : slug
}

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

/**
 * UTC `YYYYMMDD-HHmmss` stamp used as the work item id prefix.
 */
export function formatIdTimestamp(date: Date): string {
  return (
    `${String(date.getUTCFullYear())}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  )
}

/**
 * Build a work item id `<YYYYMMDD-HHmmss>-<slug>`, appending `-2`, `-3`, …
 * until `exists` reports the id as free.
 */
export function createWorkItemId(
  slug: string,
  now: Date,
  exists: (id: string) => boolean
): string {
  const base = `${formatIdTimestamp(now)}-${slugify(slug)}`
  if (!exists(base)) return base
  let suffix = 2
  while (exists(`${base}-${String(suffix)}`)) {
    suffix++
  }
  return `${base}-${String(suffix)}`
}
