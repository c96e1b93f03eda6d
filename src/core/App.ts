import { stdin as input, stdout as output } from 'node:process';
import { createInterface } from 'node:readline/promises';
import type { IConfigStore, IExifReader, ILogger, RawConfig, RenameOptions } from '../types/index.js';
import type { RunSummary } from '../types/service.js';
import { ConfigStore } from './config/ConfigStore.js';
import { ExifReader } from './exif/ExifReader.js';
import { FsSafe } from './fs/FsSafe.js';
import { RenameService } from './rename/RenameService.js';
import { createStrategy } from './rename/RenameStrategy.js';
import { TimestampResolver } from './rename/TimestampResolver.js';

export type PausePrompt = (question: string) => Promise<void>;

export interface AppDeps {
	logger: ILogger;
	configStore?: IConfigStore;
	exifReader?: IExifReader;
	fsSafe?: FsSafe;
	pause?: PausePrompt;
}

async function waitForEnter(question: string): Promise<void> {
	const rl = createInterface({ input, output });
	try {
		await rl.question(question);
	} finally {
		rl.close();
	}
}

export function describeSummary(summary: RunSummary): string {
	const changed = summary.planned > 0 ? `${summary.planned} planned` : `${summary.renamed} renamed`;
	return `${changed}, ${summary.unchanged} unchanged, ${summary.skipped} skipped, ${summary.failed} failed`;
}

/**
 * Wires config, resolver, strategy and service for one batch.
 */
export class ShotnameApp {
	private readonly configStore: IConfigStore;
	private readonly exifReader: IExifReader;
	private readonly fsSafe: FsSafe;
	private readonly pause: PausePrompt;
	private options: RenameOptions | null = null;

	constructor(private readonly deps: AppDeps) {
		this.configStore = deps.configStore ?? new ConfigStore();
		this.exifReader = deps.exifReader ?? new ExifReader();
		this.fsSafe = deps.fsSafe ?? new FsSafe();
		this.pause = deps.pause ?? waitForEnter;
	}

	/** Load and validate options. Throws before any file is touched. */
	async configure(overrides: RawConfig = {}): Promise<RenameOptions> {
		this.options = await this.configStore.load(overrides);
		this.deps.logger.debug?.(`Using config file ${this.configStore.configFile()}`, {
			dateSources: this.options.dateSources,
			dateFormat: this.options.dateFormat,
		});
		return this.options;
	}

	async run(files: readonly string[], signal?: AbortSignal): Promise<RunSummary> {
		const options = this.options ?? (await this.configure());
		const { logger } = this.deps;
		const resolver = new TimestampResolver({
			exifReader: this.exifReader,
			sourceNameFormat: options.sourceNameFormat,
		});
		const strategy = createStrategy(
			options.simulate ? { kind: 'simulated' } : { kind: 'live', moveCommand: options.moveCommand },
			this.fsSafe,
		);
		const service = new RenameService({ logger, resolver, strategy, fsSafe: this.fsSafe }, options);

		const summary = await service.run(files, signal);
		logger.debug?.(describeSummary(summary));

		if (options.pauseOnError && summary.skipped + summary.failed > 0) {
			await this.pause('Some files were not renamed. Press Enter to exit.');
		}
		return summary;
	}
}
