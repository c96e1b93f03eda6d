import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { ShotnameApp } from '../core/App.js';
import { ConfigStore } from '../core/config/ConfigStore.js';
import { ConfigError, UnknownDateSourceError } from '../core/errors.js';
import { Logger } from '../core/log/Logger.js';
import type { IDispose, IExifReader, ILogger, RawConfig } from '../types/index.js';
import { explanation } from './explain.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG = 2;
export const EXIT_INTERRUPTED = 130;

type CliOptions = {
	simulate?: boolean;
	dateSource?: string;
	sourceNameFormat?: string;
	dateFormat?: string;
	mvCmd?: string;
	pauseOnError?: boolean;
	config?: string;
	verbose?: boolean;
	logFile?: string;
};

export interface CliDeps {
	writeOut?: (str: string) => void;
	writeErr?: (str: string) => void;
	/** Used instead of a console Logger built from --verbose/--log-file */
	logger?: ILogger;
	exifReader?: IExifReader;
	pause?: (question: string) => Promise<void>;
	/** Replaces the SIGINT handler */
	signal?: AbortSignal;
}

function readVersion(): string {
	const require = createRequire(import.meta.url);
	const pkg: unknown = require('../../package.json');
	if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
		return pkg.version;
	}
	return '0.0.0';
}

function buildProgram(deps: CliDeps): Command {
	const writeOut = deps.writeOut ?? ((str: string) => process.stdout.write(str));
	const writeErr = deps.writeErr ?? ((str: string) => process.stderr.write(str));
	return new Command()
		.name('shotname')
		.description('Rename photos to a name built from their timestamp')
		.version(readVersion(), '--version', 'Print version')
		.argument('<files...>', 'Files to rename')
		.option('-s, --simulate', 'Print what would be renamed, change nothing')
		.option('--no-simulate', 'Rename even if the config file says simulate')
		.option('--date-source <list>', 'Comma separated date sources in priority order')
		.option('--source-name-format <pattern>', 'Pattern for reading a timestamp from the file name')
		.option('--date-format <pattern>', 'Pattern for the new file name')
		.option('--mv-cmd <command>', 'Command used instead of a plain rename, e.g. "git mv"')
		.option('--pause-on-error', 'Wait for Enter before exiting if any file was not renamed')
		.option('-c, --config <file>', 'Config file (default: $SHOTNAME_CONF or the user config directory)')
		.option('-v, --verbose', 'Show debug output')
		.option('--log-file <file>', 'Append a JSON log to this file')
		.addHelpText('after', explanation)
		.exitOverride()
		.configureOutput({ writeOut, writeErr });
}

function toOverrides(opts: CliOptions): RawConfig {
	return {
		dateSources: opts.dateSource,
		sourceNameFormat: opts.sourceNameFormat,
		dateFormat: opts.dateFormat,
		moveCommand: opts.mvCmd,
		simulate: opts.simulate,
		pauseOnError: opts.pauseOnError,
	};
}

function isDisposable(logger: ILogger): logger is ILogger & IDispose {
	return 'dispose' in logger && typeof logger.dispose === 'function';
}

/**
 * Parse `argv` (without the node and script entries), run the batch and
 * return the process exit code.
 */
export async function run(argv: string[] = process.argv.slice(2), deps: CliDeps = {}): Promise<number> {
	const program = buildProgram(deps);
	try {
		program.parse(argv, { from: 'user' });
	} catch (err) {
		if (err instanceof CommanderError) return err.exitCode;
		throw err;
	}
	const opts = program.opts<CliOptions>();
	const files = program.args;
	const writeErr = deps.writeErr ?? ((str: string) => process.stderr.write(str));

	const logger =
		deps.logger ?? new Logger({ level: opts.verbose ? 'debug' : 'info', logFile: opts.logFile ?? null });

	let signal = deps.signal;
	let onSigint: (() => void) | null = null;
	if (!signal) {
		const controller = new AbortController();
		onSigint = () => controller.abort();
		process.once('SIGINT', onSigint);
		signal = controller.signal;
	}

	try {
		const app = new ShotnameApp({
			logger,
			configStore: new ConfigStore({ file: opts.config }),
			exifReader: deps.exifReader,
			pause: deps.pause,
		});
		try {
			await app.configure(toOverrides(opts));
		} catch (err) {
			if (err instanceof ConfigError || err instanceof UnknownDateSourceError) {
				writeErr(`${err.message}\n`);
				return EXIT_CONFIG;
			}
			throw err;
		}
		const summary = await app.run(files, signal);
		if (summary.aborted) return EXIT_INTERRUPTED;
		return summary.failed > 0 ? EXIT_FAILED : EXIT_OK;
	} finally {
		if (onSigint) process.removeListener('SIGINT', onSigint);
		if (isDisposable(logger)) await logger.dispose();
	}
}
