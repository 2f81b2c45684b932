import { execFileSync } from 'node:child_process';
import { BackendUnavailableError, EncryptionFailedError } from '@keyward/core';
import type { DecryptResult, IEncryptionBackend } from '@keyward/core';
import { failureDiagnostic, isToolMissing } from './exec.js';

// ---------------------------------------------------------------------------
// GnuPG via the `gpg` CLI
//
// Plaintext and ciphertext travel over stdin/stdout only; nothing is written
// to a temp file. `--batch` keeps gpg from opening its own prompts except the
// pinentry for the private key passphrase on decrypt.
// ---------------------------------------------------------------------------

const BASE_ARGS = ['--batch', '--quiet', '--yes'];

export interface GpgBackendOptions {
	/** Binary to execute. Defaults to `gpg`. */
	readonly binary?: string;
}

export class GpgBackend implements IEncryptionBackend {
	readonly name = 'gpg';
	private readonly binary: string;

	constructor(options: GpgBackendOptions = {}) {
		this.binary = options.binary ?? 'gpg';
	}

	async encrypt(plaintext: Buffer, recipient: string): Promise<Buffer> {
		try {
			return execFileSync(
				this.binary,
				[
					...BASE_ARGS,
					'--trust-model',
					'always',
					'--encrypt',
					'--recipient',
					recipient,
					'--output',
					'-',
				],
				{ input: plaintext, encoding: 'buffer', stdio: ['pipe', 'pipe', 'pipe'] },
			);
		} catch (error: unknown) {
			if (isToolMissing(error)) throw new BackendUnavailableError(this.binary, { cause: error });
			throw new EncryptionFailedError(recipient, failureDiagnostic(error));
		}
	}

	async decrypt(ciphertext: Buffer): Promise<DecryptResult> {
		try {
			const plaintext = execFileSync(this.binary, [...BASE_ARGS, '--decrypt'], {
				input: ciphertext,
				encoding: 'buffer',
				stdio: ['pipe', 'pipe', 'pipe'],
			});
			return { ok: true, plaintext };
		} catch (error: unknown) {
			if (isToolMissing(error)) throw new BackendUnavailableError(this.binary, { cause: error });
			return { ok: false, diagnostic: failureDiagnostic(error) };
		}
	}
}
