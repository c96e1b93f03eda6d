import { parse as parseExif } from 'exifr';
import type { ExifReadResult, IExifReader } from '../../types/index.js';
import { errorMessage } from '../errors.js';

// Only IFD0 (for the Exif pointer) and the Exif IFD are needed
const PARSE_OPTIONS = {
	ifd1: false,
	gps: false,
	interop: false,
	xmp: false,
	icc: false,
	iptc: false,
	reviveValues: false,
} as const;

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null;
}

/**
 * Reads DateTimeDigitized (0x9004, "CreateDate" in exifr's naming) with exifr.
 * Unreadable or malformed metadata is reported as a failed read, never thrown.
 */
export class ExifReader implements IExifReader {
	async readDigitized(filePath: string): Promise<ExifReadResult> {
		let output: unknown;
		try {
			output = await parseExif(filePath, PARSE_OPTIONS);
		} catch (err) {
			return { ok: false, reason: `unreadable EXIF data (${errorMessage(err)})` };
		}
		if (!isRecord(output) || Object.keys(output).length === 0) {
			return { ok: false, reason: 'no EXIF data' };
		}
		const raw = output.CreateDate ?? output.DateTimeDigitized;
		if (raw === undefined || raw === null) {
			return { ok: false, reason: 'no EXIF timestamp' };
		}
		if (typeof raw !== 'string') {
			return { ok: false, reason: `EXIF timestamp is not text (${typeof raw})` };
		}
		return { ok: true, value: raw.replace(/\0+$/, '').trim() };
	}
}
