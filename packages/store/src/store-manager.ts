import { existsSync, mkdirSync, readFileSync, statSync, unlinkSync } from 'node:fs';
import { dirname, join } from 'node:path';
import {
	ClipboardMode,
	DecryptionFailedError,
	EntryNotFoundError,
	InvalidPathError,
	KeywardError,
	NotInitializedError,
	ReencryptionFailedError,
} from '@keyward/core';
import type {
	CommitResult,
	EntryInfo,
	GetResult,
	IClipboardSink,
	IConfirmer,
	IEncryptionBackend,
	ISecretInputResolver,
	IVersionControl,
	InitResult,
	InsertResult,
	KeyBinding,
	RemoveResult,
	StoreInfo,
} from '@keyward/core';
import {
	filePathToLogicalPath,
	isEntryFile,
	logicalPathToFilePath,
	pruneEmptyDirs,
	readKeyBinding,
	validateRecipient,
	walkEntries,
	walkEntryFiles,
	writeFileAtomic,
	writeKeyBinding,
} from './store-tree.js';

/** Clipboard copies always clear themselves after this many seconds. */
export const CLIPBOARD_CLEAR_SECONDS = 45;

export interface StoreManagerOptions {
	readonly root: string;
	readonly encryption: IEncryptionBackend;
	readonly vcs: IVersionControl;
	readonly clipboard: IClipboardSink;
	readonly confirm: IConfirmer;
	/** Called before each entry is re-encrypted during a rotation. */
	readonly onRotateEntry?: (path: string, index: number, total: number) => void;
}

export interface InsertOptions {
	readonly force?: boolean;
}

interface PendingWrite {
	readonly path: string;
	readonly file: string;
	readonly ciphertext: Buffer;
}

/**
 * Orchestrates every entry and key-binding mutation of a store. Each completed
 * mutation produces exactly one commit; declined confirmations produce none.
 */
export class StoreManager {
	readonly root: string;
	private readonly encryption: IEncryptionBackend;
	private readonly vcs: IVersionControl;
	private readonly clipboard: IClipboardSink;
	private readonly confirm: IConfirmer;
	private readonly onRotateEntry?: (path: string, index: number, total: number) => void;

	constructor(options: StoreManagerOptions) {
		this.root = options.root;
		this.encryption = options.encryption;
		this.vcs = options.vcs;
		this.clipboard = options.clipboard;
		this.confirm = options.confirm;
		this.onRotateEntry = options.onRotateEntry;
	}

	// -----------------------------------------------------------------------
	// State
	// -----------------------------------------------------------------------

	exists(): boolean {
		return existsSync(this.root);
	}

	isInitialized(): boolean {
		return readKeyBinding(this.root) !== null;
	}

	loadKeyBinding(): KeyBinding {
		const recipient = readKeyBinding(this.root);
		if (!recipient) throw new NotInitializedError(this.root);
		return { recipient };
	}

	// -----------------------------------------------------------------------
	// Init / rotate
	// -----------------------------------------------------------------------

	async init(recipientInput: string): Promise<InitResult> {
		const recipient = validateRecipient(recipientInput);
		const previous = this.exists() ? readKeyBinding(this.root) : null;

		// No prior binding means nothing to rotate from: bind directly.
		if (previous === null) {
			mkdirSync(this.root, { recursive: true, mode: 0o700 });
			await this.vcs.ensureRepository(this.root);
			writeKeyBinding(this.root, recipient);
			const commit = await this.commit(`Initialize store for ${recipient}`);
			return { status: 'created', recipient, commit };
		}

		const confirmed = await this.confirm(`Re-encrypt all entries for ${recipient}?`);
		if (!confirmed) {
			return { status: 'skipped', recipient };
		}

		const pending = await this.reencryptAll(recipient);

		for (const write of pending) {
			writeFileAtomic(write.file, write.ciphertext);
		}
		writeKeyBinding(this.root, recipient);

		await this.vcs.ensureRepository(this.root);
		const commit = await this.commit(`Re-encrypt store for ${recipient}`);
		return {
			status: 'rotated',
			recipient,
			previousRecipient: previous,
			reencrypted: pending.length,
			commit,
		};
	}

	/**
	 * Decrypts and re-encrypts every entry into memory. Nothing touches the disk
	 * until all entries have succeeded.
	 */
	private async reencryptAll(recipient: string): Promise<PendingWrite[]> {
		const files = [...walkEntryFiles(this.root)];
		const pending: PendingWrite[] = [];

		for (const [index, file] of files.entries()) {
			const path = filePathToLogicalPath(this.root, file);
			this.onRotateEntry?.(path, index, files.length);

			let plaintext: Buffer | undefined;
			try {
				plaintext = await this.decryptFile(path, file);
				const ciphertext = await this.encryption.encrypt(plaintext, recipient);
				pending.push({ path, file, ciphertext });
			} catch (error: unknown) {
				if (error instanceof KeywardError) {
					throw new ReencryptionFailedError(path, error);
				}
				throw error;
			} finally {
				plaintext?.fill(0);
			}
		}

		return pending;
	}

	// -----------------------------------------------------------------------
	// Insert
	// -----------------------------------------------------------------------

	async insert(
		path: string,
		source: ISecretInputResolver,
		options: InsertOptions = {},
	): Promise<InsertResult> {
		const file = logicalPathToFilePath(this.root, path);
		const { recipient } = this.loadKeyBinding();

		const existing = statSync(file, { throwIfNoEntry: false });
		if (existing?.isDirectory()) {
			throw new InvalidPathError(path, 'a folder already occupies its file name');
		}
		const overwritten = existing !== undefined;
		if (overwritten && !options.force) {
			const confirmed = await this.confirm(`An entry already exists for ${path}. Overwrite it?`);
			if (!confirmed) return { status: 'declined', path };
		}

		const plaintext = await source.resolve();
		let ciphertext: Buffer;
		try {
			ciphertext = await this.encryption.encrypt(plaintext, recipient);
		} finally {
			plaintext.fill(0);
		}

		writeFileAtomic(file, ciphertext);

		const commit = await this.commit(
			overwritten ? `Update ${path} in store` : `Add ${path} to store`,
		);
		return { status: 'inserted', path, overwritten, commit };
	}

	// -----------------------------------------------------------------------
	// Get
	// -----------------------------------------------------------------------

	async get(path: string, mode: ClipboardMode = ClipboardMode.NONE): Promise<GetResult> {
		const file = this.requireEntry(path);

		const plaintext = await this.decryptFile(path, file);

		// Bytes go out untouched; not every secret is UTF-8.
		if (mode === ClipboardMode.NONE) {
			return { status: 'shown', path, plaintext };
		}

		try {
			const value = mode === ClipboardMode.FIRST_LINE ? firstLine(plaintext) : plaintext;
			await this.clipboard.copy(value, CLIPBOARD_CLEAR_SECONDS);
		} finally {
			plaintext.fill(0);
		}
		return { status: 'copied', path, mode, clearAfterSeconds: CLIPBOARD_CLEAR_SECONDS };
	}

	// -----------------------------------------------------------------------
	// Remove
	// -----------------------------------------------------------------------

	async remove(path: string): Promise<RemoveResult> {
		const file = this.requireEntry(path);

		const confirmed = await this.confirm(`Remove ${path}?`);
		if (!confirmed) return { status: 'declined', path };

		unlinkSync(file);
		pruneEmptyDirs(this.root, dirname(file));

		const commit = await this.commit(`Remove ${path} from store`);
		return { status: 'removed', path, commit };
	}

	// -----------------------------------------------------------------------
	// List / info
	// -----------------------------------------------------------------------

	list(): Iterable<string> {
		this.requireStore();
		return walkEntries(this.root);
	}

	info(): StoreInfo;
	info(path: string): EntryInfo;
	info(path?: string): StoreInfo | EntryInfo {
		if (path === undefined) {
			this.requireStore();
			return {
				root: this.root,
				recipient: readKeyBinding(this.root),
				entryCount: [...walkEntryFiles(this.root)].length,
				hasRepository: existsSync(join(this.root, '.git')),
			};
		}

		const file = this.requireEntry(path);
		const stats = statSync(file);
		return { path, file, size: stats.size, modifiedAt: stats.mtime };
	}

	// -----------------------------------------------------------------------
	// Version control pass-through
	// -----------------------------------------------------------------------

	async git(args: readonly string[]): Promise<number> {
		this.requireStore();
		return this.vcs.run(this.root, args);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private requireStore(): void {
		if (!this.exists()) throw new NotInitializedError(this.root);
	}

	private requireEntry(path: string): string {
		const file = logicalPathToFilePath(this.root, path);
		this.requireStore();
		if (!isEntryFile(file)) throw new EntryNotFoundError(path);
		return file;
	}

	private async decryptFile(path: string, file: string): Promise<Buffer> {
		const result = await this.encryption.decrypt(readFileSync(file));
		if (!result.ok) throw new DecryptionFailedError(path, result.diagnostic);
		return result.plaintext;
	}

	private commit(message: string): Promise<CommitResult> {
		return this.vcs.commitAll(this.root, message);
	}
}

const LF = 0x0a;
const CR = 0x0d;

function firstLine(data: Buffer): Buffer {
	const newline = data.indexOf(LF);
	if (newline === -1) return data;
	const end = newline > 0 && data[newline - 1] === CR ? newline - 1 : newline;
	return data.subarray(0, end);
}
