import type { ClipboardMode } from '../enums/clipboard-mode.js';
import type { CommitResult } from './commit.js';

export type InitResult =
	| { readonly status: 'created'; readonly recipient: string; readonly commit: CommitResult }
	| {
			readonly status: 'rotated';
			readonly recipient: string;
			readonly previousRecipient: string;
			readonly reencrypted: number;
			readonly commit: CommitResult;
	  }
	| { readonly status: 'skipped'; readonly recipient: string };

export type InsertResult =
	| {
			readonly status: 'inserted';
			readonly path: string;
			readonly overwritten: boolean;
			readonly commit: CommitResult;
	  }
	| { readonly status: 'declined'; readonly path: string };

export type GetResult =
	| { readonly status: 'shown'; readonly path: string; readonly plaintext: Buffer }
	| {
			readonly status: 'copied';
			readonly path: string;
			readonly mode: ClipboardMode.FIRST_LINE | ClipboardMode.FULL;
			readonly clearAfterSeconds: number;
	  };

export type RemoveResult =
	| { readonly status: 'removed'; readonly path: string; readonly commit: CommitResult }
	| { readonly status: 'declined'; readonly path: string };

export interface StoreInfo {
	readonly root: string;
	readonly recipient: string | null;
	readonly entryCount: number;
	readonly hasRepository: boolean;
}

export interface EntryInfo {
	readonly path: string;
	readonly file: string;
	readonly size: number;
	readonly modifiedAt: Date;
}
