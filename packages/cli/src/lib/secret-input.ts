import { stdin } from 'node:process';
import type { Readable } from 'node:stream';
import { SecretSourceKind } from '@keyward/core';
import type { ISecretInputResolver } from '@keyward/core';
import { promptSecretTwice, readMultiline } from '../cli/prompt.js';
import { generateSecret } from './generator.js';
import type { InsertMode } from './options.js';

export interface SecretInputOptions {
	/** Stream read in multiline mode. Defaults to stdin. */
	readonly input?: Readable;
	/** Called right before input is read, after any overwrite confirmation. */
	readonly onPrompt?: () => void;
}

/**
 * Builds the plaintext source for `insert`. Nothing is read until the store
 * manager asks for it.
 */
export function createSecretInput(
	path: string,
	mode: Pick<InsertMode, 'source' | 'symbols' | 'length'>,
	options: SecretInputOptions = {},
): ISecretInputResolver {
	switch (mode.source) {
		case SecretSourceKind.MULTILINE:
			return {
				kind: mode.source,
				resolve: async () => {
					options.onPrompt?.();
					return Buffer.from(await readMultiline(options.input ?? stdin), 'utf-8');
				},
			};
		case SecretSourceKind.GENERATE:
			return {
				kind: mode.source,
				resolve: async () =>
					Buffer.from(generateSecret({ length: mode.length, symbols: mode.symbols }), 'utf-8'),
			};
		case SecretSourceKind.PROMPT:
			return {
				kind: mode.source,
				resolve: async () => {
					options.onPrompt?.();
					return Buffer.from(await promptSecretTwice(path), 'utf-8');
				},
			};
	}
}
