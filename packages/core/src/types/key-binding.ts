export interface KeyBinding {
	/** Recipient key id every entry in the store is encrypted to. */
	readonly recipient: string;
}
