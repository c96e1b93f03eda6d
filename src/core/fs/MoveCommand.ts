import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';
import { parse as parseShellWords } from 'shell-quote';
import { ConfigError } from '../errors.js';

const execFile = promisify(execFileCb);

/**
 * Runs a user supplied command instead of the native rename, e.g.
 * `git mv` or `mv -n`. Source and destination are appended to the
 * template arguments. A non-zero exit rejects.
 */
export class MoveCommand {
	private readonly command: string;
	private readonly args: readonly string[];

	constructor(argv: readonly string[]) {
		const [command, ...args] = argv;
		if (command === undefined || command.length === 0) {
			throw new ConfigError('Move command is empty');
		}
		this.command = command;
		this.args = args;
	}

	async run(from: string, to: string): Promise<void> {
		await execFile(this.command, [...this.args, from, to]);
	}

	/**
	 * Split a command line into words with shell quoting rules. Operators,
	 * globs and comments are rejected since nothing runs through a shell.
	 */
	static split(template: string): string[] {
		const words: string[] = [];
		for (const entry of parseShellWords(template)) {
			if (typeof entry !== 'string') {
				throw new ConfigError(`Move command may only contain plain words: ${template}`);
			}
			words.push(entry);
		}
		if (words.length === 0) throw new ConfigError('Move command is empty');
		return words;
	}
}
