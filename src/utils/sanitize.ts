const DISALLOWED = /[^A-Za-z0-9_\-./]/g

/**
 * Replaces characters outside `[A-Za-z0-9_./-]` with `_`, trims underscores
 * from both ends and collapses underscore runs to a single `_`.
 */
export function sanitize(name: string): string {
  return name
    .replace(DISALLOWED, '_')
    .replace(/^_+|_+$/g, '')
    .replace(/_{2,}/g, '_')
}

export function sanitizeFileName(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]+/g, '_')
}
