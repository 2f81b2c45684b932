import { execFileSync } from 'node:child_process';
import { BackendUnavailableError, EncryptionFailedError } from '@keyward/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { GpgBackend } from '../gpg-backend.js';

vi.mock('node:child_process', () => ({ execFileSync: vi.fn() }));

const execMock = vi.mocked(execFileSync);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function exitFailure(stderr: string): Error {
	return Object.assign(new Error('Command failed: gpg'), { status: 2, stderr: Buffer.from(stderr) });
}

function spawnFailure(code: string): Error {
	return Object.assign(new Error(`spawnSync gpg ${code}`), { code });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('GpgBackend', () => {
	beforeEach(() => {
		execMock.mockReset();
	});

	describe('encrypt', () => {
		it('pipes plaintext to gpg for the recipient and returns stdout', async () => {
			execMock.mockReturnValue(Buffer.from('ciphertext'));
			const plaintext = Buffer.from('hunter2');

			const result = await new GpgBackend().encrypt(plaintext, 'a@b.com');

			expect(result.toString()).toBe('ciphertext');
			expect(execMock).toHaveBeenCalledWith(
				'gpg',
				[
					'--batch',
					'--quiet',
					'--yes',
					'--trust-model',
					'always',
					'--encrypt',
					'--recipient',
					'a@b.com',
					'--output',
					'-',
				],
				{ input: plaintext, encoding: 'buffer', stdio: ['pipe', 'pipe', 'pipe'] },
			);
		});

		it('uses the configured binary', async () => {
			execMock.mockReturnValue(Buffer.from('ciphertext'));

			await new GpgBackend({ binary: 'gpg2' }).encrypt(Buffer.from('x'), 'a@b.com');

			expect(execMock.mock.calls[0]?.[0]).toBe('gpg2');
		});

		it('reports gpg diagnostics as an encryption failure', async () => {
			execMock.mockImplementation(() => {
				throw exitFailure('gpg: a@b.com: skipped: No public key\n');
			});

			const attempt = new GpgBackend().encrypt(Buffer.from('x'), 'a@b.com');

			await expect(attempt).rejects.toThrow(EncryptionFailedError);
			await expect(attempt).rejects.toThrow(
				'Failed to encrypt for a@b.com. gpg: a@b.com: skipped: No public key',
			);
		});

		it('reports a missing binary as unavailable', async () => {
			execMock.mockImplementation(() => {
				throw spawnFailure('ENOENT');
			});

			const attempt = new GpgBackend().encrypt(Buffer.from('x'), 'a@b.com');

			await expect(attempt).rejects.toThrow(BackendUnavailableError);
			await expect(attempt).rejects.toThrow('gpg is not installed or not executable');
		});
	});

	describe('decrypt', () => {
		it('returns plaintext on success', async () => {
			execMock.mockReturnValue(Buffer.from('hunter2'));
			const ciphertext = Buffer.from('ciphertext');

			const result = await new GpgBackend().decrypt(ciphertext);

			expect(result).toEqual({ ok: true, plaintext: Buffer.from('hunter2') });
			expect(execMock).toHaveBeenCalledWith('gpg', ['--batch', '--quiet', '--yes', '--decrypt'], {
				input: ciphertext,
				encoding: 'buffer',
				stdio: ['pipe', 'pipe', 'pipe'],
			});
		});

		it('returns a diagnostic instead of throwing when gpg rejects the ciphertext', async () => {
			execMock.mockImplementation(() => {
				throw exitFailure('gpg: decryption failed: No secret key\n');
			});

			const result = await new GpgBackend().decrypt(Buffer.from('ciphertext'));

			expect(result).toEqual({ ok: false, diagnostic: 'gpg: decryption failed: No secret key' });
		});

		it('falls back to the error message when stderr is empty', async () => {
			execMock.mockImplementation(() => {
				throw exitFailure('');
			});

			const result = await new GpgBackend().decrypt(Buffer.from('ciphertext'));

			expect(result).toEqual({ ok: false, diagnostic: 'Command failed: gpg' });
		});

		it('reports a non-executable binary as unavailable', async () => {
			execMock.mockImplementation(() => {
				throw spawnFailure('EACCES');
			});

			await expect(new GpgBackend().decrypt(Buffer.from('c'))).rejects.toThrow(BackendUnavailableError);
		});
	});
});
