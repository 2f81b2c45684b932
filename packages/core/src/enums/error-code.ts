export enum ErrorCode {
	NOT_INITIALIZED = 'not_initialized',
	NOT_FOUND = 'not_found',
	DECRYPTION_FAILED = 'decryption_failed',
	ENCRYPTION_FAILED = 'encryption_failed',
	REENCRYPTION_FAILED = 'reencryption_failed',
	INPUT_MISMATCH = 'input_mismatch',
	INVALID_PATH = 'invalid_path',
	INVALID_RECIPIENT = 'invalid_recipient',
	BACKEND_UNAVAILABLE = 'backend_unavailable',
}
