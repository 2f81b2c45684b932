import { describe, expect, it } from 'vitest';
import { DEFAULT_SECRET_LENGTH, generateSecret } from '../lib/generator.js';

describe('generateSecret', () => {
	it('produces the requested length', () => {
		expect(generateSecret({ length: DEFAULT_SECRET_LENGTH, symbols: true })).toHaveLength(24);
		expect(generateSecret({ length: 8, symbols: false })).toHaveLength(8);
	});

	it('keeps to letters and digits without symbols', () => {
		for (let i = 0; i < 20; i++) {
			expect(generateSecret({ length: 64, symbols: false })).toMatch(/^[A-Za-z0-9]{64}$/);
		}
	});

	it('never emits whitespace or quotes with symbols', () => {
		for (let i = 0; i < 20; i++) {
			expect(generateSecret({ length: 64, symbols: true })).not.toMatch(/[\s'"`\\]/);
		}
	});

	it('rejects a non-positive or fractional length', () => {
		expect(() => generateSecret({ length: 0, symbols: true })).toThrow(RangeError);
		expect(() => generateSecret({ length: 2.5, symbols: true })).toThrow(
			'length must be a positive integer, got 2.5',
		);
	});
});
