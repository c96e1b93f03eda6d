const SUFFIX_RE = /^-\d+$/;

/**
 * Whether `name` already is the canonical `base` + `ext`, optionally carrying
 * a collision suffix (`base-3.ext`). Files that match are left alone, so a
 * second run never re-suffixes them.
 */
export function matchesTimestamp(name: string, base: string, ext: string): boolean {
	if (name === `${base}${ext}`) return true;
	if (name.length <= base.length + ext.length) return false;
	if (!name.startsWith(base) || !name.endsWith(ext)) return false;
	const middle = name.slice(base.length, name.length - ext.length);
	return SUFFIX_RE.test(middle);
}
