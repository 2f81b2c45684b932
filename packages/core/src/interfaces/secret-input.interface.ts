import type { SecretSourceKind } from '../enums/secret-source-kind.js';

export interface ISecretInputResolver {
	readonly kind: SecretSourceKind;

	/** Throws `InputMismatchError` when two manual entries differ. */
	resolve(): Promise<Buffer>;
}
