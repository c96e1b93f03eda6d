import fs from 'node:fs';
import path from 'node:path';
import type { IDispose, ILogger } from '../../types/index.js';

export type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LoggerOptions = {
	/** Lowest level echoed to the console; the log file and ring get everything */
	level?: Level;
	/** Append JSON lines here when set */
	logFile?: string | null;
	/** Echo to stdout/stderr (default true) */
	console?: boolean;
	ringSize?: number;
};

export class Logger implements ILogger, IDispose {
	private stream: fs.WriteStream | null = null;
	private ring: string[] = [];
	private readonly max: number;
	private readonly threshold: number;
	private readonly echo: boolean;

	constructor(opts: LoggerOptions = {}) {
		this.threshold = LEVEL_ORDER[opts.level ?? 'info'];
		this.echo = opts.console ?? true;
		this.max = opts.ringSize ?? 500;
		if (opts.logFile) this.open(opts.logFile);
	}

	private open(logFile: string) {
		fs.mkdirSync(path.dirname(logFile), { recursive: true });
		const stream = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf8' });
		stream.on('error', (err) => {
			this.stream = null;
			console.error(`Log file disabled: ${err.message}`);
		});
		this.stream = stream;
	}

	private pushRing(line: string) {
		this.ring.push(line);
		if (this.ring.length > this.max) this.ring.shift();
	}

	private write(level: Level, msg: string, meta?: Record<string, unknown>) {
		const ts = new Date().toISOString();
		const rec = { ts, level, msg, ...(meta ? { meta } : {}) };
		const line = JSON.stringify(rec);
		this.pushRing(line);
		this.stream?.write(`${line}\n`);
		if (!this.echo || LEVEL_ORDER[level] < this.threshold) return;
		// Rename decisions are the tool's output, so info goes out bare
		if (level === 'error') console.error(`error: ${msg}`);
		else if (level === 'warn') console.warn(`warning: ${msg}`);
		else console.log(msg);
	}

	info(msg: string, meta?: Record<string, unknown>): void {
		this.write('info', msg, meta);
	}
	warn(msg: string, meta?: Record<string, unknown>): void {
		this.write('warn', msg, meta);
	}
	error(msg: string | Error, meta?: Record<string, unknown>): void {
		if (msg instanceof Error) this.write('error', msg.message, { stack: msg.stack, ...meta });
		else this.write('error', msg, meta);
	}
	debug(msg: string, meta?: Record<string, unknown>): void {
		this.write('debug', msg, meta);
	}

	getRing(): string[] {
		return [...this.ring];
	}

	dispose(): Promise<void> {
		const stream = this.stream;
		this.stream = null;
		if (!stream) return Promise.resolve();
		return new Promise<void>((resolve) => {
			stream.end(() => resolve());
		});
	}
}
