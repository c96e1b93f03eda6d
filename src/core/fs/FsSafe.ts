import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';

export class FsSafe {
	/**
	 * Stat a path, following symlinks. Returns null if nothing is there.
	 */
	async statSafe(p: string): Promise<Stats | null> {
		try {
			return await fs.stat(p);
		} catch (err) {
			if (isMissingError(err)) return null;
			throw err;
		}
	}

	async exists(p: string): Promise<boolean> {
		return (await this.statSafe(p)) !== null;
	}

	/**
	 * Rename within the same directory, retrying briefly while the source is busy.
	 */
	async rename(from: string, to: string): Promise<void> {
		const maxAttempts = 10;
		for (let i = 0; i < maxAttempts; i++) {
			try {
				await fs.rename(from, to);
				return;
			} catch (err) {
				if (isBusyError(err) && i < maxAttempts - 1) {
					await delay(50 + Math.floor(Math.random() * 100));
					continue;
				}
				throw err;
			}
		}
	}
}

function delay(ms: number) {
	return new Promise((res) => setTimeout(res, ms));
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return typeof err === 'object' && err !== null && 'code' in err;
}

export function isBusyError(err: unknown): err is NodeJS.ErrnoException {
	return isNodeError(err) && err.code === 'EBUSY';
}

export function isMissingError(err: unknown): err is NodeJS.ErrnoException {
	return isNodeError(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
