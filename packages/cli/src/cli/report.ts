import { exitCodeFor } from '@keyward/core';
import type { CommitResult } from '@keyward/core';
import { dim, failMark, warnMark } from './theme.js';

/** Exit code for an invalid option combination. */
export const USAGE_EXIT_CODE = 2;

/**
 * Prints an error and sets the exit code for its category. A prompt aborted
 * with Ctrl+C is a cancellation, not a failure.
 */
export function reportError(error: unknown): void {
	if (error instanceof Error && error.name === 'ExitPromptError') {
		console.log(dim('\n  Cancelled.\n'));
		return;
	}
	const message = error instanceof Error ? error.message : 'Unknown error';
	console.error(`\n  ${failMark(message)}\n`);
	process.exitCode = exitCodeFor(error);
}

export function reportUsage(message: string): void {
	console.error(`\n  ${failMark(message)}\n`);
	process.exitCode = USAGE_EXIT_CODE;
}

/** Commits are bookkeeping: a failure is shown but the change stays on disk. */
export function reportCommit(commit: CommitResult): void {
	if (commit.committed) {
		console.log(`  ${dim(`git: ${commit.message}`)}\n`);
		return;
	}
	console.error(`  ${warnMark(`Changes saved but not committed: ${commit.reason}`)}\n`);
}
