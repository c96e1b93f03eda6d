import { describe, expect, it } from 'vitest';
import { matchesTimestamp } from './NameMatcher.js';

const timestamp = '20191027_121401';
const ext = '.jpg';

describe('matchesTimestamp', () => {
	it('matches the exact canonical name', () => {
		expect(matchesTimestamp('20191027_121401.jpg', timestamp, ext)).toBe(true);
	});

	it.each([1, 2, 9, 10, 19, 123])('matches the collision suffix -%i', (i) => {
		expect(matchesTimestamp(`${timestamp}-${i}${ext}`, timestamp, ext)).toBe(true);
	});

	it.each([
		'20191027_121402.jpg',
		'20191027_121401-a.jpg',
		'20191027_121401--1.jpg',
		'20191027_121401-.jpg',
		'20191027_121401-1x.jpg',
		'20191027_121401_1.jpg',
		'20191027_121401.jpeg',
		'x20191027_121401.jpg',
	])('rejects %s', (name) => {
		expect(matchesTimestamp(name, timestamp, ext)).toBe(false);
	});

	it('compares the extension case-sensitively', () => {
		expect(matchesTimestamp('20191027_121401.JPG', timestamp, ext)).toBe(false);
	});

	it('handles files without extension', () => {
		expect(matchesTimestamp('20191027_121401', timestamp, '')).toBe(true);
		expect(matchesTimestamp('20191027_121401-4', timestamp, '')).toBe(true);
	});
});
