// Enums
export { ClipboardMode, ErrorCode, SecretSourceKind } from './enums/index.js';

// Errors
export {
	BackendUnavailableError,
	DecryptionFailedError,
	EncryptionFailedError,
	EntryNotFoundError,
	EXIT_CODES,
	InputMismatchError,
	InvalidPathError,
	InvalidRecipientError,
	KeywardError,
	NotInitializedError,
	ReencryptionFailedError,
	UNEXPECTED_EXIT_CODE,
	exitCodeFor,
} from './errors.js';

// Types
export type {
	CommitResult,
	EntryInfo,
	GetResult,
	InitResult,
	InsertResult,
	KeyBinding,
	RemoveResult,
	StoreInfo,
} from './types/index.js';

// Interfaces
export type {
	DecryptResult,
	IClipboardSink,
	IConfirmer,
	IEncryptionBackend,
	ISecretInputResolver,
	IVersionControl,
} from './interfaces/index.js';
