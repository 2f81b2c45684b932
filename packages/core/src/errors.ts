import { ErrorCode } from './enums/error-code.js';

// ---------------------------------------------------------------------------
// Exit codes, one per error category
// ---------------------------------------------------------------------------

export const EXIT_CODES: Readonly<Record<ErrorCode, number>> = {
	[ErrorCode.INVALID_PATH]: 2,
	[ErrorCode.INVALID_RECIPIENT]: 2,
	[ErrorCode.INPUT_MISMATCH]: 2,
	[ErrorCode.NOT_INITIALIZED]: 3,
	[ErrorCode.NOT_FOUND]: 4,
	[ErrorCode.DECRYPTION_FAILED]: 5,
	[ErrorCode.ENCRYPTION_FAILED]: 6,
	[ErrorCode.REENCRYPTION_FAILED]: 6,
	[ErrorCode.BACKEND_UNAVAILABLE]: 7,
};

/** Exit code for anything that is not a {@link KeywardError}. */
export const UNEXPECTED_EXIT_CODE = 1;

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export class KeywardError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = 'KeywardError';
	}

	get exitCode(): number {
		return EXIT_CODES[this.code];
	}
}

// ---------------------------------------------------------------------------
// Store state
// ---------------------------------------------------------------------------

export class NotInitializedError extends KeywardError {
	constructor(public readonly root: string) {
		super(ErrorCode.NOT_INITIALIZED, `Store not initialized at ${root}. Run \`keyward init <key-id>\` first.`);
		this.name = 'NotInitializedError';
	}
}

export class EntryNotFoundError extends KeywardError {
	constructor(public readonly path: string) {
		super(ErrorCode.NOT_FOUND, `${path} is not in the store`);
		this.name = 'EntryNotFoundError';
	}
}

export class InvalidPathError extends KeywardError {
	constructor(
		public readonly path: string,
		reason: string,
	) {
		super(ErrorCode.INVALID_PATH, `Invalid entry path "${path}": ${reason}`);
		this.name = 'InvalidPathError';
	}
}

export class InvalidRecipientError extends KeywardError {
	constructor(public readonly recipient: string) {
		super(
			ErrorCode.INVALID_RECIPIENT,
			`Invalid recipient key id "${recipient}": must be a single non-empty line`,
		);
		this.name = 'InvalidRecipientError';
	}
}

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

export class DecryptionFailedError extends KeywardError {
	constructor(
		public readonly path: string,
		public readonly diagnostic: string,
	) {
		super(ErrorCode.DECRYPTION_FAILED, `Failed to decrypt ${path}. ${diagnostic}`.trim());
		this.name = 'DecryptionFailedError';
	}
}

export class EncryptionFailedError extends KeywardError {
	constructor(
		public readonly recipient: string,
		public readonly diagnostic: string,
	) {
		super(ErrorCode.ENCRYPTION_FAILED, `Failed to encrypt for ${recipient}. ${diagnostic}`.trim());
		this.name = 'EncryptionFailedError';
	}
}

export class BackendUnavailableError extends KeywardError {
	constructor(
		public readonly tool: string,
		options?: { cause?: unknown },
	) {
		super(ErrorCode.BACKEND_UNAVAILABLE, `${tool} is not installed or not executable`, options);
		this.name = 'BackendUnavailableError';
	}
}

/** Fatal to a whole rotation: the key binding and every entry are left as they were. */
export class ReencryptionFailedError extends KeywardError {
	constructor(
		public readonly path: string,
		cause: KeywardError,
	) {
		super(
			ErrorCode.REENCRYPTION_FAILED,
			`Re-encryption aborted at ${path}; no entry or key binding was changed. ${cause.message}`,
			{ cause },
		);
		this.name = 'ReencryptionFailedError';
	}
}

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export class InputMismatchError extends KeywardError {
	constructor() {
		super(ErrorCode.INPUT_MISMATCH, 'The entered secrets do not match');
		this.name = 'InputMismatchError';
	}
}

export function exitCodeFor(error: unknown): number {
	return error instanceof KeywardError ? error.exitCode : UNEXPECTED_EXIT_CODE;
}
