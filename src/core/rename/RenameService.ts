import type { Stats } from 'node:fs';
import path from 'node:path';
import type {
	DateSource,
	ILogger,
	IRenameStrategy,
	ITimestampResolver,
	RenameOptions,
	TimestampResult,
} from '../../types/index.js';
import type { FileOutcome, RunSummary, ServiceEventMap, SkipReason } from '../../types/service.js';
import { TypedEmitter } from '../../utils/TypedEmitter.js';
import { TimestampUnavailableError, errorMessage } from '../errors.js';
import { FsSafe } from '../fs/FsSafe.js';
import { matchesTimestamp } from './NameMatcher.js';
import { formatTimestamp, getExt } from './NameTemplate.js';
import { findUniqueFilename } from './UniqueName.js';

export type RenameServiceOptions = Pick<RenameOptions, 'dateSources' | 'dateFormat'>;

/**
 * Renames a batch of files to their canonical timestamp names, one file at a
 * time, in input order. Whether anything changes on disk is up to the
 * strategy; every naming decision is the same either way.
 *
 * Emits a `file` event per input and a `summary` event when done.
 */
export class RenameService {
	private emitter = new TypedEmitter<ServiceEventMap>();
	private readonly fsSafe: FsSafe;
	private readonly dateSources: readonly DateSource[];
	private readonly dateFormat: string;

	constructor(
		private readonly deps: {
			logger: ILogger;
			resolver: ITimestampResolver;
			strategy: IRenameStrategy;
			fsSafe?: FsSafe;
		},
		options: RenameServiceOptions,
	) {
		this.fsSafe = deps.fsSafe ?? new FsSafe();
		this.dateSources = [...options.dateSources];
		this.dateFormat = options.dateFormat;
	}

	get strategy(): IRenameStrategy {
		return this.deps.strategy;
	}

	on<K extends keyof ServiceEventMap>(
		event: K,
		listener: (payload: ServiceEventMap[K]) => void,
	): () => void {
		return this.emitter.on(event, listener);
	}

	/**
	 * Process `files` in order. The signal is checked before each file; an
	 * abort leaves completed renames in place.
	 */
	async run(files: readonly string[], signal?: AbortSignal): Promise<RunSummary> {
		const summary: RunSummary = {
			outcomes: [],
			renamed: 0,
			planned: 0,
			unchanged: 0,
			skipped: 0,
			failed: 0,
			aborted: false,
		};
		for (const file of files) {
			if (signal?.aborted) {
				summary.aborted = true;
				this.deps.logger.warn('Interrupted, remaining files left as they are');
				break;
			}
			const outcome = await this.processFile(file);
			summary.outcomes.push(outcome);
			summary[outcome.kind]++;
			this.emitter.emit('file', outcome);
		}
		this.emitter.emit('summary', summary);
		return summary;
	}

	async processFile(file: string): Promise<FileOutcome> {
		const { logger } = this.deps;
		let st: Stats | null;
		try {
			st = await this.fsSafe.statSafe(file);
		} catch (err) {
			// ELOOP, EACCES, ENAMETOOLONG: unusable like a missing file
			return this.skip(file, 'missing', 'could not find file', [errorMessage(err)]);
		}
		if (st?.isDirectory()) {
			return this.skip(file, 'directory', 'is a directory');
		}
		// Existence goes through the strategy so a simulation sees its own renames
		if ((st && !st.isFile()) || !(await this.strategy.exists(file))) {
			return this.skip(file, 'missing', 'could not find file');
		}

		let resolved: TimestampResult;
		try {
			resolved = await this.deps.resolver.resolve(file, this.dateSources);
		} catch (err) {
			if (err instanceof TimestampUnavailableError) {
				return this.skip(file, 'no-date-source', 'no usable date source', err.reasons);
			}
			throw err;
		}

		const base = formatTimestamp(resolved.timestamp, this.dateFormat);
		const ext = getExt(file);
		if (matchesTimestamp(path.basename(file), base, ext)) {
			logger.debug?.(`${file}: unmodified (file name already matches)`, { source: resolved.source });
			return { kind: 'unchanged', file, source: resolved.source };
		}

		let target: string;
		try {
			target = await findUniqueFilename(path.dirname(file), base, ext, (p) => this.strategy.exists(p));
		} catch (err) {
			return this.fail(file, path.join(path.dirname(file), `${base}${ext}`), resolved.source, err);
		}
		logger.info(`${file} -(${resolved.source})-> ${target}`);
		try {
			await this.strategy.rename(file, target);
		} catch (err) {
			return this.fail(file, target, resolved.source, err);
		}
		const kind = this.strategy.kind === 'simulated' ? 'planned' : 'renamed';
		return { kind, file, target, source: resolved.source };
	}

	private fail(file: string, target: string, source: DateSource, err: unknown): FileOutcome {
		const message = errorMessage(err);
		this.deps.logger.error(`${file}: rename to ${target} failed: ${message}`);
		return { kind: 'failed', file, target, source, message };
	}

	private skip(
		file: string,
		reason: SkipReason,
		description: string,
		details: readonly string[] = [],
	): FileOutcome {
		const message = [`${file}: unmodified (${description})`, ...details].join('\n');
		this.deps.logger.warn(message, { reason });
		return { kind: 'skipped', file, reason, message };
	}
}
