import { DATE_SOURCES, type DateSource } from '../../types/index.js';
import { ConfigError, UnknownDateSourceError } from '../errors.js';

export function isDateSource(value: string): value is DateSource {
	return DATE_SOURCES.some((s) => s === value);
}

export function parseDateSource(tag: string): DateSource {
	const trimmed = tag.trim();
	if (!isDateSource(trimmed)) throw new UnknownDateSourceError(trimmed);
	return trimmed;
}

/**
 * Parse a priority list, either comma separated (`exif,file-name`) or
 * already split. Order is kept; duplicates and empty lists are rejected.
 */
export function parseDateSources(input: string | readonly string[]): DateSource[] {
	const tags = typeof input === 'string' ? input.split(',') : input;
	const sources: DateSource[] = [];
	for (const tag of tags) {
		if (tag.trim().length === 0) continue;
		const source = parseDateSource(tag);
		if (sources.includes(source)) {
			throw new ConfigError(`Date source listed more than once: ${source}`);
		}
		sources.push(source);
	}
	if (sources.length === 0) throw new ConfigError('At least one date source is required');
	return sources;
}
