import { PassThrough } from 'node:stream';
import { SecretSourceKind } from '@keyward/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { promptSecretTwice } from '../cli/prompt.js';
import { createSecretInput } from '../lib/secret-input.js';

vi.mock('../cli/prompt.js', async (importOriginal) => ({
	...(await importOriginal<typeof import('../cli/prompt.js')>()),
	promptSecretTwice: vi.fn(async () => 'test-secret'),
}));

describe('createSecretInput', () => {
	beforeEach(() => {
		vi.mocked(promptSecretTwice).mockClear();
	});

	it('prompts only when resolved', async () => {
		const onPrompt = vi.fn();
		const source = createSecretInput(
			'email/work',
			{ source: SecretSourceKind.PROMPT, symbols: true, length: 24 },
			{ onPrompt },
		);

		expect(source.kind).toBe(SecretSourceKind.PROMPT);
		expect(promptSecretTwice).not.toHaveBeenCalled();

		const secret = await source.resolve();
		expect(secret.toString('utf-8')).toBe('test-secret');
		expect(promptSecretTwice).toHaveBeenCalledWith('email/work');
		expect(onPrompt).toHaveBeenCalledOnce();
	});

	it('reads multiline input from the given stream', async () => {
		const input = new PassThrough();
		const source = createSecretInput(
			'notes',
			{ source: SecretSourceKind.MULTILINE, symbols: true, length: 24 },
			{ input },
		);

		const pending = source.resolve();
		input.end('first\nsecond\n');
		expect((await pending).toString('utf-8')).toBe('first\nsecond');
	});

	it('generates without prompting', async () => {
		const onPrompt = vi.fn();
		const source = createSecretInput(
			'web/site',
			{ source: SecretSourceKind.GENERATE, symbols: false, length: 40 },
			{ onPrompt },
		);

		const secret = (await source.resolve()).toString('utf-8');
		expect(secret).toMatch(/^[A-Za-z0-9]{40}$/);
		expect(onPrompt).not.toHaveBeenCalled();
		expect(promptSecretTwice).not.toHaveBeenCalled();
	});
});
