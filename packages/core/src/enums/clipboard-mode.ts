export enum ClipboardMode {
	NONE = 'none',
	FIRST_LINE = 'first-line',
	FULL = 'full',
}
