import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors.js';
import {
	assertParsable,
	formatTimestamp,
	getExt,
	parseTimestamp,
	toDateFnsPattern,
} from './NameTemplate.js';

const awake = new Date(2019, 3, 17, 17, 45, 37);

describe('toDateFnsPattern', () => {
	it('maps directives and quotes literals', () => {
		expect(toDateFnsPattern('%Y%m%d_%H%M%S')).toBe("yyyyMMdd'_'HHmmss");
		expect(toDateFnsPattern('%Y%m%d_%H%M%S.jpg')).toBe("yyyyMMdd'_'HHmmss'.jpg'");
	});

	it('escapes single quotes and %%', () => {
		expect(toDateFnsPattern("it's %Y")).toBe("'it''s 'yyyy");
		expect(toDateFnsPattern('100%% %Y')).toBe("'100% 'yyyy");
	});

	it('rejects unsupported or dangling directives', () => {
		expect(() => toDateFnsPattern('%Q')).toThrow(ConfigError);
		expect(() => toDateFnsPattern('%Y%')).toThrow('Date pattern ends with a lone %: %Y%');
	});
});

describe('formatTimestamp', () => {
	it('formats the default pattern', () => {
		expect(formatTimestamp(awake, '%Y%m%d_%H%M%S')).toBe('20190417_174537');
	});

	it('formats twelve-hour clocks, names and day of year', () => {
		expect(formatTimestamp(awake, '%Y-%m-%d %I.%M %p')).toBe('2019-04-17 05.45 PM');
		expect(formatTimestamp(awake, '%a %A %b %B')).toBe('Wed Wednesday Apr April');
		expect(formatTimestamp(awake, '%y-%j')).toBe('19-107');
	});

	it('keeps letters in literals verbatim', () => {
		expect(formatTimestamp(awake, 'IMG_%Y')).toBe('IMG_2019');
	});
});

describe('parseTimestamp', () => {
	it('parses a file name that matches the whole pattern', () => {
		expect(parseTimestamp('20191027_121401.jpg', '%Y%m%d_%H%M%S.jpg')).toEqual(
			new Date(2019, 9, 27, 12, 14, 1),
		);
	});

	it('returns null for names that do not match', () => {
		expect(parseTimestamp('sammy_sleepy.jpg', '%Y%m%d_%H%M%S.jpg')).toBeNull();
		expect(parseTimestamp('20191027_121401-1.jpg', '%Y%m%d_%H%M%S.jpg')).toBeNull();
	});

	it('fills missing fields with midnight', () => {
		expect(parseTimestamp('2020-02-29', '%Y-%m-%d')).toEqual(new Date(2020, 1, 29, 0, 0, 0));
	});

	it('puts two-digit years 00-68 in the 2000s and 69-99 in the 1900s', () => {
		expect(parseTimestamp('190417_174537.jpg', '%y%m%d_%H%M%S.jpg')).toEqual(
			new Date(2019, 3, 17, 17, 45, 37),
		);
		expect(parseTimestamp('680101', '%y%m%d')).toEqual(new Date(2068, 0, 1, 0, 0, 0));
		expect(parseTimestamp('690101', '%y%m%d')).toEqual(new Date(1969, 0, 1, 0, 0, 0));
		expect(parseTimestamp('000229', '%y%m%d')).toEqual(new Date(2000, 1, 29, 0, 0, 0));
	});

	it('does not treat a literal %y as a two-digit year', () => {
		expect(parseTimestamp('%y 1901', '%%y %Y')).toEqual(new Date(1901, 0, 1, 0, 0, 0));
	});
});

describe('assertParsable', () => {
	it('accepts patterns date-fns can parse', () => {
		expect(() => assertParsable('IMG_%Y%m%d_%H%M%S.jpg')).not.toThrow();
		expect(() => assertParsable('%I.%M %p')).not.toThrow();
	});

	it('rejects an hour of the day next to AM/PM', () => {
		expect(() => assertParsable('%Y-%m-%d %H %p.jpg')).toThrow(ConfigError);
	});

	it('rejects a day of the year next to a month', () => {
		expect(() => assertParsable('%Y %j %m')).toThrow(ConfigError);
	});
});

describe('getExt', () => {
	it('lower-cases the extension and keeps the dot', () => {
		expect(getExt('/photos/IMG_0001.JPG')).toBe('.jpg');
		expect(getExt('/photos/README')).toBe('');
	});
});
