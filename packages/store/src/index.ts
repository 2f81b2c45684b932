// Classes
export { StoreManager, CLIPBOARD_CLEAR_SECONDS } from './store-manager.js';
export { GpgBackend } from './gpg-backend.js';
export { GitVersionControl } from './git-adapter.js';
export { SystemClipboard, buildClearCommand, detectClipboardTool } from './clipboard.js';

// Functions (store-tree)
export {
	ENTRY_SUFFIX,
	KEY_BINDING_FILE,
	STORE_DIR_NAME,
	filePathToLogicalPath,
	logicalPathToFilePath,
	readKeyBinding,
	resolveStoreRoot,
	validateLogicalPath,
	validateRecipient,
	walkEntries,
} from './store-tree.js';

// Types
export type { InsertOptions, StoreManagerOptions } from './store-manager.js';
export type { GpgBackendOptions } from './gpg-backend.js';
export type { GitVersionControlOptions } from './git-adapter.js';
export type { ClipboardTool, SystemClipboardOptions } from './clipboard.js';
