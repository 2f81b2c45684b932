import {
	existsSync,
	mkdirSync,
	readFileSync,
	readdirSync,
	renameSync,
	rmSync,
	rmdirSync,
	statSync,
	writeFileSync,
} from 'node:fs';
import { dirname, join, relative, resolve, sep } from 'node:path';
import { InvalidPathError, InvalidRecipientError } from '@keyward/core';

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

export const STORE_DIR_NAME = '.password-store';
export const KEY_BINDING_FILE = '.gpg-id';
export const ENTRY_SUFFIX = '.gpg';

const TMP_SUFFIX = '.tmp';

export function resolveStoreRoot(cwd: string, override?: string): string {
	return resolve(cwd, override && override.length > 0 ? override : STORE_DIR_NAME);
}

export function keyBindingPath(root: string): string {
	return join(root, KEY_BINDING_FILE);
}

// ---------------------------------------------------------------------------
// Logical path <-> file path
// ---------------------------------------------------------------------------

/**
 * Splits a slash-delimited logical path into its segments, rejecting anything
 * that would not map back to the same path or could escape the store root.
 */
export function validateLogicalPath(path: string): string[] {
	if (path.length === 0) throw new InvalidPathError(path, 'path is empty');
	if (path.includes('\0')) throw new InvalidPathError(path, 'contains a NUL byte');
	if (path.includes('\\')) throw new InvalidPathError(path, 'use "/" to separate segments');
	if (path.startsWith('/')) throw new InvalidPathError(path, 'must be relative to the store');
	if (path.endsWith('/')) throw new InvalidPathError(path, 'must name an entry, not a folder');

	const segments = path.split('/');
	for (const [index, segment] of segments.entries()) {
		if (segment === '') throw new InvalidPathError(path, 'contains an empty segment');
		if (segment === '.' || segment === '..') {
			throw new InvalidPathError(path, `"${segment}" segments are not allowed`);
		}
		if (segment.startsWith('.git')) {
			throw new InvalidPathError(path, 'segments may not start with ".git"');
		}
		// A folder named `x.gpg` would shadow the entry `x`.
		if (index < segments.length - 1 && segment.endsWith(ENTRY_SUFFIX)) {
			throw new InvalidPathError(path, `folder segments may not end with "${ENTRY_SUFFIX}"`);
		}
	}
	return segments;
}

export function logicalPathToFilePath(root: string, path: string): string {
	const segments = validateLogicalPath(path);
	return `${join(root, ...segments)}${ENTRY_SUFFIX}`;
}

export function filePathToLogicalPath(root: string, file: string): string {
	const rel = relative(root, file);
	const withoutSuffix = rel.endsWith(ENTRY_SUFFIX) ? rel.slice(0, -ENTRY_SUFFIX.length) : rel;
	return withoutSuffix.split(sep).join('/');
}

// ---------------------------------------------------------------------------
// Walk
// ---------------------------------------------------------------------------

/**
 * Yields the file path of every entry under `root`, depth-first with each
 * directory's children in name order. Skips exactly the folders that
 * {@link validateLogicalPath} refuses to address (`.git*`).
 */
export function* walkEntryFiles(root: string): Generator<string> {
	const children = readdirSync(root, { withFileTypes: true }).sort((a, b) =>
		a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
	);

	for (const child of children) {
		const full = join(root, child.name);
		if (child.isDirectory()) {
			if (child.name.startsWith('.git')) continue;
			yield* walkEntryFiles(full);
		} else if (
			child.isFile() &&
			child.name.endsWith(ENTRY_SUFFIX) &&
			child.name.length > ENTRY_SUFFIX.length
		) {
			yield full;
		}
	}
}

/** True only for a regular file; a folder at the same name is not an entry. */
export function isEntryFile(file: string): boolean {
	return statSync(file, { throwIfNoEntry: false })?.isFile() === true;
}

export function* walkEntries(root: string): Generator<string> {
	for (const file of walkEntryFiles(root)) {
		yield filePathToLogicalPath(root, file);
	}
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/**
 * Write to a sibling temp file with restrictive permissions, then rename over
 * the target. The original is never truncated in place.
 */
export function writeFileAtomic(file: string, data: Buffer | string): void {
	mkdirSync(dirname(file), { recursive: true, mode: 0o700 });
	const tmpPath = `${file}${TMP_SUFFIX}`;
	writeFileSync(tmpPath, data, { mode: 0o600 });
	try {
		renameSync(tmpPath, file);
	} catch (error: unknown) {
		rmSync(tmpPath, { force: true });
		throw error;
	}
}

/** Removes empty directories from `dir` upwards, stopping at `root`. */
export function pruneEmptyDirs(root: string, dir: string): void {
	let current = dir;
	while (current !== root && current.startsWith(root + sep)) {
		if (readdirSync(current).length > 0) return;
		rmdirSync(current);
		current = dirname(current);
	}
}

// ---------------------------------------------------------------------------
// Key binding
// ---------------------------------------------------------------------------

/** The binding file holds one line, so a recipient may not span several. */
export function validateRecipient(recipient: string): string {
	const trimmed = recipient.trim();
	if (trimmed.length === 0 || /[\r\n\0]/.test(trimmed)) {
		throw new InvalidRecipientError(recipient);
	}
	return trimmed;
}

export function readKeyBinding(root: string): string | null {
	const p = keyBindingPath(root);
	if (!existsSync(p)) return null;
	return readFileSync(p, 'utf-8').trim() || null;
}

export function writeKeyBinding(root: string, recipient: string): void {
	writeFileAtomic(keyBindingPath(root), `${recipient}\n`);
}
