import { ClipboardMode, SecretSourceKind } from '@keyward/core';
import { z } from 'zod';
import { DEFAULT_SECRET_LENGTH } from './generator.js';

// ---------------------------------------------------------------------------
// Schemas for the raw option bags commander hands to each action
// ---------------------------------------------------------------------------

const insertOptionsSchema = z
	.object({
		multiline: z.boolean().default(false),
		generate: z.boolean().default(false),
		generateAlnum: z.boolean().default(false),
		length: z.coerce
			.number({ invalid_type_error: 'Length must be a number' })
			.int('Length must be a whole number')
			.min(8, 'Length must be at least 8')
			.max(256, 'Length must be at most 256')
			.default(DEFAULT_SECRET_LENGTH),
		force: z.boolean().default(false),
	})
	.refine(
		(o) => [o.multiline, o.generate, o.generateAlnum].filter(Boolean).length <= 1,
		'Use only one of --multiline, --generate and --generate-alnum',
	)
	.transform((o) => ({
		source: o.multiline
			? SecretSourceKind.MULTILINE
			: o.generate || o.generateAlnum
				? SecretSourceKind.GENERATE
				: SecretSourceKind.PROMPT,
		symbols: !o.generateAlnum,
		length: o.length,
		force: o.force,
	}));

const showOptionsSchema = z
	.object({
		clip: z.boolean().default(false),
		clipAll: z.boolean().default(false),
	})
	.refine((o) => !(o.clip && o.clipAll), 'Use only one of --clip and --clip-all')
	.transform((o) =>
		o.clipAll ? ClipboardMode.FULL : o.clip ? ClipboardMode.FIRST_LINE : ClipboardMode.NONE,
	);

export type InsertMode = z.output<typeof insertOptionsSchema>;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string };

function toResult<T>(
	parsed: { success: true; data: T } | { success: false; error: z.ZodError },
): ParseResult<T> {
	if (parsed.success) return { ok: true, value: parsed.data };
	return { ok: false, message: parsed.error.issues.map((issue) => issue.message).join('; ') };
}

export function parseInsertOptions(raw: unknown): ParseResult<InsertMode> {
	return toResult(insertOptionsSchema.safeParse(raw));
}

export function parseShowOptions(raw: unknown): ParseResult<ClipboardMode> {
	return toResult(showOptionsSchema.safeParse(raw));
}
