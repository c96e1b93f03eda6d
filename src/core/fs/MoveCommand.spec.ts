import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../errors.js';
import { MoveCommand } from './MoveCommand.js';

vi.mock('node:child_process', () => {
	const fn = vi.fn();
	return { execFile: fn };
});

import { execFile as execFileCb } from 'node:child_process';

const mockExecFile = vi.mocked(execFileCb);

type Cb = (...a: unknown[]) => void;

function mockExecFileSuccess() {
	mockExecFile.mockImplementation((_cmd: unknown, _args: unknown, cb: unknown) => {
		(cb as Cb)(null, { stdout: '', stderr: '' });
		return undefined as unknown as ReturnType<typeof execFileCb>;
	});
}

function mockExecFileFailure(message: string) {
	mockExecFile.mockImplementation((_cmd: unknown, _args: unknown, cb: unknown) => {
		(cb as Cb)(Object.assign(new Error(message), { code: 1 }));
		return undefined as unknown as ReturnType<typeof execFileCb>;
	});
}

beforeEach(() => {
	vi.clearAllMocks();
});

describe('MoveCommand', () => {
	describe('run', () => {
		it('appends source and destination to the template arguments', async () => {
			mockExecFileSuccess();
			const mover = new MoveCommand(['git', 'mv', '-k']);

			await mover.run('/photos/a.jpg', '/photos/20190417_174537.jpg');

			expect(mockExecFile).toHaveBeenCalledTimes(1);
			expect(mockExecFile.mock.calls[0]?.[0]).toBe('git');
			expect(mockExecFile.mock.calls[0]?.[1]).toEqual([
				'mv',
				'-k',
				'/photos/a.jpg',
				'/photos/20190417_174537.jpg',
			]);
		});

		it('rejects when the command exits non-zero', async () => {
			mockExecFileFailure('Command failed: mv');
			const mover = new MoveCommand(['mv']);

			await expect(mover.run('a.jpg', 'b.jpg')).rejects.toThrow('Command failed: mv');
		});
	});

	it('refuses an empty command', () => {
		expect(() => new MoveCommand([])).toThrow(ConfigError);
		expect(() => new MoveCommand([''])).toThrow('Move command is empty');
	});

	describe('split', () => {
		it('splits words and honours quotes', () => {
			expect(MoveCommand.split(`/usr/local/bin/mvlog '/opt/my scripts' "log file.txt"`)).toEqual([
				'/usr/local/bin/mvlog',
				'/opt/my scripts',
				'log file.txt',
			]);
		});

		it('rejects shell operators', () => {
			expect(() => MoveCommand.split('mv && rm')).toThrow(ConfigError);
		});

		it('rejects a blank template', () => {
			expect(() => MoveCommand.split('   ')).toThrow('Move command is empty');
		});
	});
});
