import path from 'node:path';

export type ExistsCheck = (p: string) => Promise<boolean>;

export function candidateName(base: string, ext: string, index: number): string {
	return index === 0 ? `${base}${ext}` : `${base}-${index}${ext}`;
}

/**
 * First path in `dir` that `exists` reports as free, trying `base.ext`,
 * `base-1.ext`, `base-2.ext`, ... in order.
 */
export async function findUniqueFilename(
	dir: string,
	base: string,
	ext: string,
	exists: ExistsCheck,
): Promise<string> {
	for (let n = 0; n <= Number.MAX_SAFE_INTEGER; n++) {
		const candidate = path.join(dir, candidateName(base, ext, n));
		if (!(await exists(candidate))) return candidate;
	}
	throw new Error(`No free file name left for ${base}${ext} in ${dir}`);
}
