import { execFileSync, spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { BackendUnavailableError } from '@keyward/core';
import type { CommitResult, IVersionControl } from '@keyward/core';
import { failureDiagnostic, isToolMissing } from './exec.js';

export interface GitVersionControlOptions {
	/** Binary to execute. Defaults to `git`. */
	readonly binary?: string;
}

/**
 * Git through its CLI, always scoped with `-C <dir>` so the caller's working
 * directory never matters.
 */
export class GitVersionControl implements IVersionControl {
	private readonly binary: string;

	constructor(options: GitVersionControlOptions = {}) {
		this.binary = options.binary ?? 'git';
	}

	async ensureRepository(dir: string): Promise<void> {
		if (existsSync(join(dir, '.git'))) return;
		try {
			this.exec(dir, ['init', '--quiet']);
		} catch (error: unknown) {
			if (isToolMissing(error)) throw new BackendUnavailableError(this.binary, { cause: error });
			throw new Error(`git init failed: ${failureDiagnostic(error)}`, { cause: error });
		}
	}

	async commitAll(dir: string, message: string): Promise<CommitResult> {
		try {
			this.exec(dir, ['add', '--all']);
			this.exec(dir, ['commit', '--quiet', '--message', message]);
			return { committed: true, message };
		} catch (error: unknown) {
			const reason = isToolMissing(error)
				? `${this.binary} is not installed or not executable`
				: failureDiagnostic(error);
			return { committed: false, message, reason };
		}
	}

	async run(dir: string, args: readonly string[]): Promise<number> {
		const result = spawnSync(this.binary, ['-C', dir, ...args], { stdio: 'inherit' });
		if (result.error) {
			if (isToolMissing(result.error)) {
				throw new BackendUnavailableError(this.binary, { cause: result.error });
			}
			throw result.error;
		}
		return result.status ?? 1;
	}

	private exec(dir: string, args: readonly string[]): void {
		execFileSync(this.binary, ['-C', dir, ...args], { stdio: ['ignore', 'pipe', 'pipe'] });
	}
}
