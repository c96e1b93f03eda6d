// Shared types and interfaces

export interface IDispose {
	dispose(): void | Promise<void>;
}

export const DATE_SOURCES = ['exif', 'file-name', 'file-created', 'file-modified'] as const;

/** Where a file's reference timestamp is read from. */
export type DateSource = (typeof DATE_SOURCES)[number];

export type TimestampResult = {
	readonly source: DateSource;
	/** Local time, truncated to whole seconds */
	readonly timestamp: Date;
};

/**
 * Fully merged and validated options for one run.
 */
export interface RenameOptions {
	/** Priority order; the first source that yields a timestamp wins */
	dateSources: DateSource[];
	/** strftime-style pattern for the file-name source, required when it is listed */
	sourceNameFormat: string | null;
	/** strftime-style pattern for the new base name */
	dateFormat: string;
	/** External move command; source and destination are appended */
	moveCommand: string[] | null;
	simulate: boolean;
	pauseOnError: boolean;
}

/** Raw, unvalidated option values as they come from the command line or a config file. */
export type RawConfig = Partial<{
	dateSources: string | string[];
	sourceNameFormat: string | null;
	dateFormat: string;
	moveCommand: string | string[] | null;
	simulate: boolean;
	pauseOnError: boolean;
}>;

export interface IConfigStore {
	configFile(): string;
	load(overrides?: RawConfig): Promise<RenameOptions>;
}

export interface ILogger {
	info(msg: string, meta?: Record<string, unknown>): void;
	warn(msg: string, meta?: Record<string, unknown>): void;
	error(msg: string | Error, meta?: Record<string, unknown>): void;
	debug?(msg: string, meta?: Record<string, unknown>): void;
}

export type ExifReadResult = { ok: true; value: string } | { ok: false; reason: string };

export interface IExifReader {
	/** Raw "digitized" timestamp string (EXIF tag 0x9004) of an image file. */
	readDigitized(filePath: string): Promise<ExifReadResult>;
}

export interface ITimestampResolver {
	resolve(filePath: string, sources: readonly DateSource[]): Promise<TimestampResult>;
}

export interface IRenameStrategy {
	readonly kind: 'live' | 'simulated';
	exists(p: string): Promise<boolean>;
	rename(from: string, to: string): Promise<void>;
}

/** How renames are carried out; picked by the caller. */
export type StrategyChoice =
	| { kind: 'live'; moveCommand?: readonly string[] | null }
	| { kind: 'simulated' };
