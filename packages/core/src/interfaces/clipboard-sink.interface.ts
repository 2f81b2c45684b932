export interface IClipboardSink {
	/**
	 * Places `data` on the clipboard and schedules a single clear after
	 * `clearAfterSeconds`. The clear must still happen if the caller exits first.
	 */
	copy(data: Buffer, clearAfterSeconds: number): Promise<void>;
}
