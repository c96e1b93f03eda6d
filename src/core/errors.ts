/**
 * Every configured date source failed for a file. Recovered per file.
 */
export class TimestampUnavailableError extends Error {
	readonly reasons: readonly string[];

	constructor(reasons: readonly string[]) {
		super(reasons.join('\n'));
		this.name = 'TimestampUnavailableError';
		this.reasons = [...reasons];
	}
}

/**
 * A date source tag nobody knows how to resolve. Aborts the run.
 */
export class UnknownDateSourceError extends Error {
	readonly tag: string;

	constructor(tag: string) {
		super(`Unknown date source: ${tag}`);
		this.name = 'UnknownDateSourceError';
		this.tag = tag;
	}
}

/**
 * Invalid option value or unreadable config file.
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
