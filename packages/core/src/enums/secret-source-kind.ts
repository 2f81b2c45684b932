export enum SecretSourceKind {
	PROMPT = 'prompt',
	MULTILINE = 'multiline',
	GENERATE = 'generate',
}
