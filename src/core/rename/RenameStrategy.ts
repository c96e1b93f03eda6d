import path from 'node:path';
import type { IRenameStrategy, StrategyChoice } from '../../types/index.js';
import { FsSafe } from '../fs/FsSafe.js';
import { MoveCommand } from '../fs/MoveCommand.js';

/**
 * Touches the real filesystem: existence comes from `stat`, renames go
 * through `fs.rename` or the configured move command.
 */
export class LiveStrategy implements IRenameStrategy {
	readonly kind = 'live';

	constructor(
		private readonly fsSafe: FsSafe,
		private readonly mover: MoveCommand | null = null,
	) {}

	exists(p: string): Promise<boolean> {
		return this.fsSafe.exists(p);
	}

	async rename(from: string, to: string): Promise<void> {
		if (this.mover) {
			await this.mover.run(from, to);
			return;
		}
		await this.fsSafe.rename(from, to);
	}
}

/**
 * Records renames instead of performing them. A path exists under
 * simulation iff `(exists on disk ? 1 : 0) + added - removed > 0`, so later
 * files in the same run see the names freed and taken by earlier ones.
 */
export class SimulatedStrategy implements IRenameStrategy {
	readonly kind = 'simulated';
	private readonly addedCounts = new Map<string, number>();
	private readonly removedCounts = new Map<string, number>();

	constructor(private readonly fsSafe: FsSafe) {}

	async exists(p: string): Promise<boolean> {
		const key = path.resolve(p);
		const onDisk = (await this.fsSafe.exists(key)) ? 1 : 0;
		return onDisk + count(this.addedCounts, key) - count(this.removedCounts, key) > 0;
	}

	async rename(from: string, to: string): Promise<void> {
		if (!(await this.exists(from))) {
			throw new Error(`Cannot simulate renaming ${from}: it does not exist`);
		}
		const src = path.resolve(from);
		const dst = path.resolve(to);
		this.track(src);
		this.track(dst);
		this.addedCounts.set(dst, count(this.addedCounts, dst) + 1);
		this.removedCounts.set(src, count(this.removedCounts, src) + 1);
	}

	/** Paths the simulation has placed files at, with how many times. */
	added(): ReadonlyMap<string, number> {
		return new Map(this.addedCounts);
	}

	/** Paths the simulation has moved files away from, with how many times. */
	removed(): ReadonlyMap<string, number> {
		return new Map(this.removedCounts);
	}

	private track(key: string) {
		if (!this.addedCounts.has(key)) this.addedCounts.set(key, 0);
		if (!this.removedCounts.has(key)) this.removedCounts.set(key, 0);
	}
}

function count(counts: ReadonlyMap<string, number>, key: string): number {
	return counts.get(key) ?? 0;
}

export function createStrategy(choice: StrategyChoice, fsSafe = new FsSafe()): IRenameStrategy {
	switch (choice.kind) {
		case 'live': {
			const argv = choice.moveCommand;
			return new LiveStrategy(fsSafe, argv && argv.length > 0 ? new MoveCommand(argv) : null);
		}
		case 'simulated':
			return new SimulatedStrategy(fsSafe);
	}
}
