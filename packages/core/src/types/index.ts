export type { CommitResult } from './commit.js';
export type { KeyBinding } from './key-binding.js';
export type {
	EntryInfo,
	GetResult,
	InitResult,
	InsertResult,
	RemoveResult,
	StoreInfo,
} from './results.js';
