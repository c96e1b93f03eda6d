import fs from 'node:fs/promises';
import path from 'node:path';
import type { ExifReadResult, IExifReader } from '../../types/index.js';

/**
 * Answers from tables keyed by file content or by resolved path. Keying by
 * content lets a file keep its "EXIF data" after it has been renamed.
 * Anything unknown has no EXIF data.
 */
export class ExifReaderFake implements IExifReader {
	private readonly byPath = new Map<string, ExifReadResult>();
	private readonly byContent = new Map<string, ExifReadResult>();
	readonly calls: string[] = [];

	async readDigitized(filePath: string): Promise<ExifReadResult> {
		this.calls.push(filePath);
		// a path that only exists inside a simulation has no content
		const content = await fs.readFile(filePath, 'utf8').catch(() => null);
		return (
			(content === null ? undefined : this.byContent.get(content)) ??
			this.byPath.get(path.resolve(filePath)) ?? { ok: false, reason: 'no EXIF data' }
		);
	}

	setDigitized(filePath: string, value: string) {
		this.byPath.set(path.resolve(filePath), { ok: true, value });
	}

	setDigitizedForContent(content: string, value: string) {
		this.byContent.set(content, { ok: true, value });
	}

	setReadError(filePath: string, reason: string) {
		this.byPath.set(path.resolve(filePath), { ok: false, reason });
	}
}
