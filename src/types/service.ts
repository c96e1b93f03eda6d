import type { DateSource } from './index.js';

export type SkipReason = 'directory' | 'missing' | 'no-date-source';

/** Terminal state of one input file. */
export type FileOutcome =
	| { kind: 'skipped'; file: string; reason: SkipReason; message: string }
	| { kind: 'unchanged'; file: string; source: DateSource }
	| { kind: 'renamed'; file: string; target: string; source: DateSource }
	| { kind: 'planned'; file: string; target: string; source: DateSource }
	| { kind: 'failed'; file: string; target: string; source: DateSource; message: string };

export type RunSummary = {
	outcomes: FileOutcome[];
	renamed: number;
	planned: number;
	unchanged: number;
	skipped: number;
	failed: number;
	/** True when the run stopped before the last file because it was interrupted */
	aborted: boolean;
};

export type ServiceEventMap = {
	file: FileOutcome;
	summary: RunSummary;
};
