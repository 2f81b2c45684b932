export type DecryptResult =
	| { readonly ok: true; readonly plaintext: Buffer }
	| { readonly ok: false; readonly diagnostic: string };

/**
 * Public-key encryption provider. Implementations orchestrate an external
 * engine; they never hold private key material themselves.
 */
export interface IEncryptionBackend {
	readonly name: string;

	/** Throws `EncryptionFailedError` when no ciphertext can be produced for `recipient`. */
	encrypt(plaintext: Buffer, recipient: string): Promise<Buffer>;

	decrypt(ciphertext: Buffer): Promise<DecryptResult>;
}
