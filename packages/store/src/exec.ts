// ---------------------------------------------------------------------------
// Helpers for reading `execFileSync` / `spawnSync` failures.
//
// A spawn failure carries an errno `code` (ENOENT, EACCES); a non-zero exit
// carries `status` and the captured `stderr`.
// ---------------------------------------------------------------------------

const UNAVAILABLE_CODES = new Set(['ENOENT', 'EACCES']);

export function isToolMissing(error: unknown): boolean {
	return (
		error instanceof Error &&
		'code' in error &&
		typeof error.code === 'string' &&
		UNAVAILABLE_CODES.has(error.code)
	);
}

export function failureDiagnostic(error: unknown): string {
	if (error instanceof Error && 'stderr' in error) {
		const { stderr } = error;
		const text = Buffer.isBuffer(stderr) ? stderr.toString('utf-8') : String(stderr ?? '');
		if (text.trim().length > 0) return text.trim();
	}
	return error instanceof Error ? error.message : String(error);
}
