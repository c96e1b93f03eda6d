import fs from 'node:fs/promises';
import path from 'node:path';
import type { IConfigStore, RawConfig, RenameOptions } from '../../types/index.js';
import { defaultConfigFile } from '../../utils/paths.js';
import { ConfigError, errorMessage } from '../errors.js';
import { isMissingError } from '../fs/FsSafe.js';
import { MoveCommand } from '../fs/MoveCommand.js';
import { parseDateSources } from '../rename/DateSource.js';
import { DEFAULT_DATE_FORMAT, assertParsable, toDateFnsPattern } from '../rename/NameTemplate.js';

export const DEFAULT_CONFIG: Readonly<RenameOptions> = {
	dateSources: ['exif'],
	sourceNameFormat: null,
	dateFormat: DEFAULT_DATE_FORMAT,
	moveCommand: null,
	simulate: false,
	pauseOnError: false,
};

function isStringArray(v: unknown): v is string[] {
	return Array.isArray(v) && v.every((x) => typeof x === 'string');
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function checkPattern(key: string, pattern: string, forParsing = false): string {
	try {
		toDateFnsPattern(pattern);
		if (forParsing) assertParsable(pattern);
	} catch (err) {
		throw new ConfigError(`${key}: ${errorMessage(err)}`);
	}
	return pattern;
}

/**
 * Turn merged raw values into run options. Throws ConfigError (or
 * UnknownDateSourceError) so bad settings stop the run before any file is
 * touched.
 */
export function validateConfig(input: RawConfig): RenameOptions {
	const dateSources = parseDateSources(input.dateSources ?? DEFAULT_CONFIG.dateSources);

	const sourceNameFormat = input.sourceNameFormat
		? checkPattern('sourceNameFormat', input.sourceNameFormat, true)
		: null;
	if (dateSources.includes('file-name') && !sourceNameFormat) {
		throw new ConfigError('The file-name date source requires a source name format');
	}

	const dateFormat = input.dateFormat ?? DEFAULT_CONFIG.dateFormat;
	if (dateFormat.length === 0) throw new ConfigError('dateFormat must not be empty');
	if (dateFormat.includes('/') || dateFormat.includes(path.sep)) {
		throw new ConfigError(`dateFormat must not contain a path separator: ${dateFormat}`);
	}
	checkPattern('dateFormat', dateFormat);

	let moveCommand: string[] | null = null;
	if (typeof input.moveCommand === 'string') {
		moveCommand = input.moveCommand.trim() ? MoveCommand.split(input.moveCommand) : null;
	} else if (Array.isArray(input.moveCommand) && input.moveCommand.length > 0) {
		moveCommand = [...input.moveCommand];
	}

	return {
		dateSources,
		sourceNameFormat,
		dateFormat,
		moveCommand,
		simulate: input.simulate ?? DEFAULT_CONFIG.simulate,
		pauseOnError: input.pauseOnError ?? DEFAULT_CONFIG.pauseOnError,
	};
}

/**
 * Check the shape of a parsed config file. Unknown keys are ignored; known
 * keys with the wrong type are an error.
 */
export function parseRawConfig(parsed: unknown, source: string): RawConfig {
	if (!isRecord(parsed)) throw new ConfigError(`${source}: expected a JSON object`);
	const raw: RawConfig = {};
	const wrongType = (key: string, expected: string) =>
		new ConfigError(`${source}: "${key}" must be ${expected}`);

	const { dateSources, sourceNameFormat, dateFormat, moveCommand, simulate, pauseOnError } = parsed;
	if (dateSources !== undefined) {
		if (typeof dateSources !== 'string' && !isStringArray(dateSources)) {
			throw wrongType('dateSources', 'a string or an array of strings');
		}
		raw.dateSources = dateSources;
	}
	if (sourceNameFormat !== undefined) {
		if (sourceNameFormat !== null && typeof sourceNameFormat !== 'string') {
			throw wrongType('sourceNameFormat', 'a string');
		}
		raw.sourceNameFormat = sourceNameFormat;
	}
	if (dateFormat !== undefined) {
		if (typeof dateFormat !== 'string') throw wrongType('dateFormat', 'a string');
		raw.dateFormat = dateFormat;
	}
	if (moveCommand !== undefined) {
		if (moveCommand !== null && typeof moveCommand !== 'string' && !isStringArray(moveCommand)) {
			throw wrongType('moveCommand', 'a string or an array of strings');
		}
		raw.moveCommand = moveCommand;
	}
	if (simulate !== undefined) {
		if (typeof simulate !== 'boolean') throw wrongType('simulate', 'true or false');
		raw.simulate = simulate;
	}
	if (pauseOnError !== undefined) {
		if (typeof pauseOnError !== 'boolean') throw wrongType('pauseOnError', 'true or false');
		raw.pauseOnError = pauseOnError;
	}
	return raw;
}

function definedOnly(overrides: RawConfig): RawConfig {
	const out: RawConfig = {};
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) Object.assign(out, { [key]: value });
	}
	return out;
}

/**
 * Reads the JSON config file and merges it: overrides > file > defaults.
 */
export class ConfigStore implements IConfigStore {
	private readonly file: string;
	private readonly explicit: boolean;

	constructor(opts: { file?: string } = {}) {
		const fallback = defaultConfigFile();
		this.file = opts.file ?? fallback.file;
		this.explicit = opts.file !== undefined || fallback.explicit;
	}

	configFile(): string {
		return this.file;
	}

	async readFile(): Promise<RawConfig> {
		let text: string;
		try {
			text = await fs.readFile(this.file, 'utf8');
		} catch (err) {
			// Only a file somebody asked for has to exist
			if (isMissingError(err) && !this.explicit) return {};
			throw new ConfigError(`Cannot read config file ${this.file}: ${errorMessage(err)}`);
		}
		let parsed: unknown;
		try {
			parsed = JSON.parse(text);
		} catch (err) {
			throw new ConfigError(`Invalid JSON in ${this.file}: ${errorMessage(err)}`);
		}
		return parseRawConfig(parsed, this.file);
	}

	async load(overrides: RawConfig = {}): Promise<RenameOptions> {
		const fromFile = await this.readFile();
		return validateConfig({ ...fromFile, ...definedOnly(overrides) });
	}
}
