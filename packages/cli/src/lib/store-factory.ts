import { GitVersionControl, GpgBackend, StoreManager, SystemClipboard } from '@keyward/store';
import type { StoreManagerOptions } from '@keyward/store';
import { confirmPrompt } from '../cli/prompt.js';
import type { KeywardConfig } from './config.js';

/**
 * Create a StoreManager wired to gpg, git, the system clipboard and
 * interactive confirmations.
 */
export function createStoreManager(
	config: KeywardConfig,
	hooks: Pick<StoreManagerOptions, 'onRotateEntry'> = {},
): StoreManager {
	return new StoreManager({
		root: config.storeDir,
		encryption: new GpgBackend({ binary: config.gpgBinary }),
		vcs: new GitVersionControl({ binary: config.gitBinary }),
		clipboard: new SystemClipboard(),
		confirm: confirmPrompt,
		onRotateEntry: hooks.onRotateEntry,
	});
}
