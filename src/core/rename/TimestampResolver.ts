import fs from 'node:fs/promises';
import path from 'node:path';
import type {
	DateSource,
	IExifReader,
	ITimestampResolver,
	TimestampResult,
} from '../../types/index.js';
import { TimestampUnavailableError, UnknownDateSourceError, errorMessage } from '../errors.js';
import { parseTimestamp } from './NameTemplate.js';

const EXIF_TIMESTAMP_RE = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

type Attempt = { ok: true; timestamp: Date } | { ok: false; reason: string };

export interface TimestampResolverOptions {
	exifReader: IExifReader;
	/** Pattern the whole base name must match for the file-name source */
	sourceNameFormat?: string | null;
}

function toSeconds(d: Date): Date {
	return new Date(Math.floor(d.getTime() / 1000) * 1000);
}

/**
 * Parse `YYYY:MM:DD HH:MM:SS` as local time. Rejects impossible values such
 * as the `0000:00:00 00:00:00` some cameras write.
 */
export function parseExifTimestamp(text: string): Date | null {
	const m = EXIF_TIMESTAMP_RE.exec(text);
	if (!m) return null;
	const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
	if (
		year === undefined ||
		month === undefined ||
		day === undefined ||
		hour === undefined ||
		minute === undefined ||
		second === undefined
	) {
		return null;
	}
	const d = new Date(year, month - 1, day, hour, minute, second);
	const roundTrips =
		d.getFullYear() === year &&
		d.getMonth() === month - 1 &&
		d.getDate() === day &&
		d.getHours() === hour &&
		d.getMinutes() === minute &&
		d.getSeconds() === second;
	return roundTrips ? d : null;
}

/**
 * Tries date sources in the given order and returns the first that yields a
 * timestamp. file-created and file-modified never fail for an existing
 * file, so anything listed after them is never consulted.
 */
export class TimestampResolver implements ITimestampResolver {
	private readonly exifReader: IExifReader;
	private readonly sourceNameFormat: string | null;

	constructor(opts: TimestampResolverOptions) {
		this.exifReader = opts.exifReader;
		this.sourceNameFormat = opts.sourceNameFormat ?? null;
	}

	async resolve(filePath: string, sources: readonly DateSource[]): Promise<TimestampResult> {
		const reasons: string[] = [];
		for (const source of sources) {
			const attempt = await this.attempt(filePath, source);
			if (attempt.ok) return { source, timestamp: toSeconds(attempt.timestamp) };
			reasons.push(`${source}: ${attempt.reason}`);
		}
		throw new TimestampUnavailableError(reasons);
	}

	private attempt(filePath: string, source: DateSource): Promise<Attempt> {
		switch (source) {
			case 'exif':
				return this.fromExif(filePath);
			case 'file-name':
				return Promise.resolve(this.fromFileName(filePath));
			case 'file-created':
				return this.fromStat(filePath, 'created');
			case 'file-modified':
				return this.fromStat(filePath, 'modified');
			default: {
				const unknown: never = source;
				throw new UnknownDateSourceError(String(unknown));
			}
		}
	}

	private async fromExif(filePath: string): Promise<Attempt> {
		const read = await this.exifReader.readDigitized(filePath);
		if (!read.ok) return read;
		const timestamp = parseExifTimestamp(read.value);
		if (!timestamp) return { ok: false, reason: `malformed EXIF timestamp "${read.value}"` };
		return { ok: true, timestamp };
	}

	private fromFileName(filePath: string): Attempt {
		if (!this.sourceNameFormat) return { ok: false, reason: 'no file name format configured' };
		const name = path.basename(filePath);
		const timestamp = parseTimestamp(name, this.sourceNameFormat);
		if (!timestamp) {
			return { ok: false, reason: `"${name}" does not match "${this.sourceNameFormat}"` };
		}
		return { ok: true, timestamp };
	}

	private async fromStat(filePath: string, which: 'created' | 'modified'): Promise<Attempt> {
		try {
			const st = await fs.stat(filePath);
			if (which === 'modified') return { ok: true, timestamp: st.mtime };
			// Inode change time: birth time is missing on many Linux filesystems
			return { ok: true, timestamp: st.ctime };
		} catch (err) {
			return { ok: false, reason: errorMessage(err) };
		}
	}
}
