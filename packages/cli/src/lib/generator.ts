import { randomInt } from 'node:crypto';

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const SYMBOLS = '!#$%&()*+,-./:;<=>?@[]^_{|}~';

export const DEFAULT_SECRET_LENGTH = 24;

export interface GenerateOptions {
	readonly length: number;
	readonly symbols: boolean;
}

/** Uniformly random characters from the alphanumeric (and optionally symbol) set. */
export function generateSecret({ length, symbols }: GenerateOptions): string {
	if (!Number.isInteger(length) || length < 1) {
		throw new RangeError(`length must be a positive integer, got ${length}`);
	}
	const charset = symbols ? ALPHANUMERIC + SYMBOLS : ALPHANUMERIC;
	let out = '';
	for (let i = 0; i < length; i++) {
		out += charset[randomInt(charset.length)];
	}
	return out;
}
