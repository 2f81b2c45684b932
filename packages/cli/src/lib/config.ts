import { resolveStoreRoot } from '@keyward/store';

export interface KeywardConfig {
	/** Absolute store root. */
	readonly storeDir: string;
	readonly gpgBinary: string;
	readonly gitBinary: string;
}

function optionalEnv(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
	return env[name] || fallback;
}

/**
 * Reads configuration from the environment. The store root is resolved
 * against `cwd`, so the same invocation directory always finds the same store.
 *
 * - `KEYWARD_STORE_DIR`: store location (default `.password-store`)
 * - `KEYWARD_GPG`: gpg binary (default `gpg`)
 * - `KEYWARD_GIT`: git binary (default `git`)
 */
export function loadConfig(
	env: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): KeywardConfig {
	return {
		storeDir: resolveStoreRoot(cwd, env.KEYWARD_STORE_DIR),
		gpgBinary: optionalEnv(env, 'KEYWARD_GPG', 'gpg'),
		gitBinary: optionalEnv(env, 'KEYWARD_GIT', 'git'),
	};
}
