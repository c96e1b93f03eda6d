import path from 'node:path';
import { format, isValid, parse } from 'date-fns';
import { ConfigError } from '../errors.js';

/**
 * Supported strftime directives and their date-fns equivalents:
 * - %Y → 2019      - %y → 19
 * - %m → 04        - %d → 17
 * - %H → 17        - %I → 05        - %p → PM
 * - %M → 45        - %S → 37
 * - %b → Apr       - %B → April
 * - %a → Wed       - %A → Wednesday
 * - %j → 107 (day of year)
 * - %% → literal %
 */
const DIRECTIVES: Record<string, string> = {
	Y: 'yyyy',
	y: 'yy',
	m: 'MM',
	d: 'dd',
	H: 'HH',
	I: 'hh',
	p: 'a',
	M: 'mm',
	S: 'ss',
	b: 'MMM',
	B: 'MMMM',
	a: 'EEE',
	A: 'EEEE',
	j: 'DDD',
};

const DATE_FNS_OPTIONS = { useAdditionalDayOfYearTokens: true } as const;

// strptime fills missing fields from 1900-01-01 00:00:00
const PARSE_REFERENCE = new Date(1900, 0, 1, 0, 0, 0);
// date-fns puts a two-digit year within 50 years of the reference year, so
// 2019 gives the POSIX split: 69-99 -> 19xx, 00-68 -> 20xx
const TWO_DIGIT_YEAR_REFERENCE = new Date(2019, 0, 1, 0, 0, 0);

const SAMPLE_TIMESTAMP = new Date(2001, 1, 3, 4, 5, 6);

function quote(literal: string): string {
	return `'${literal.replace(/'/g, "''")}'`;
}

/**
 * Translate a strftime-style pattern into a date-fns pattern. Literal runs
 * are quoted so letters in them are never read as tokens.
 */
export function toDateFnsPattern(pattern: string): string {
	let out = '';
	let literal = '';
	for (let i = 0; i < pattern.length; i++) {
		const ch = pattern.charAt(i);
		if (ch !== '%') {
			literal += ch;
			continue;
		}
		const directive = pattern.charAt(i + 1);
		if (directive === '') throw new ConfigError(`Date pattern ends with a lone %: ${pattern}`);
		i++;
		if (directive === '%') {
			literal += '%';
			continue;
		}
		const token = DIRECTIVES[directive];
		if (token === undefined) {
			throw new ConfigError(`Unsupported directive %${directive} in date pattern: ${pattern}`);
		}
		if (literal) {
			out += quote(literal);
			literal = '';
		}
		out += token;
	}
	if (literal) out += quote(literal);
	return out;
}

export function formatTimestamp(d: Date, pattern: string): string {
	return format(d, toDateFnsPattern(pattern), DATE_FNS_OPTIONS);
}

/**
 * Parse a whole string against a strftime-style pattern. Returns null when
 * the string does not match completely.
 */
export function parseTimestamp(text: string, pattern: string): Date | null {
	const reference = hasDirective(pattern, 'y') ? TWO_DIGIT_YEAR_REFERENCE : PARSE_REFERENCE;
	const parsed = parse(text, toDateFnsPattern(pattern), reference, DATE_FNS_OPTIONS);
	return isValid(parsed) ? parsed : null;
}

/**
 * Throw a ConfigError for a pattern date-fns cannot parse with, such as %H
 * together with %p, or %j together with %m.
 */
export function assertParsable(pattern: string): void {
	try {
		parseTimestamp(formatTimestamp(SAMPLE_TIMESTAMP, pattern), pattern);
	} catch (err) {
		if (err instanceof RangeError) {
			throw new ConfigError(`Date pattern cannot be parsed (${err.message}): ${pattern}`);
		}
		throw err;
	}
}

function hasDirective(pattern: string, directive: string): boolean {
	for (let i = 0; i < pattern.length - 1; i++) {
		if (pattern.charAt(i) !== '%') continue;
		if (pattern.charAt(i + 1) === directive) return true;
		i++;
	}
	return false;
}

/** Extension with its leading dot, lower-cased; empty when there is none. */
export function getExt(p: string): string {
	return path.extname(p).toLowerCase();
}

export const DEFAULT_DATE_FORMAT = '%Y%m%d_%H%M%S';
