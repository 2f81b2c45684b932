import type { CommitResult } from '../types/commit.js';

export interface IVersionControl {
	/** Initializes a repository at `dir` unless one already exists. */
	ensureRepository(dir: string): Promise<void>;

	/** Stages every change under `dir` and records one commit. */
	commitAll(dir: string, message: string): Promise<CommitResult>;

	/** Runs an arbitrary subcommand scoped to `dir`; resolves with its exit status. */
	run(dir: string, args: readonly string[]): Promise<number>;
}
