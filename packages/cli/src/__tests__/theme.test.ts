import chalk from 'chalk';
import { beforeAll, describe, expect, it } from 'vitest';
import { renderTree } from '../cli/theme.js';

describe('renderTree', () => {
	beforeAll(() => {
		chalk.level = 0;
	});

	it('indents leaves under their folders', () => {
		expect(renderTree(['bank', 'email/personal', 'email/work', 'web/a/x', 'web/b'])).toEqual([
			'  bank',
			'  email/',
			'    personal',
			'    work',
			'  web/',
			'    a/',
			'      x',
			'    b',
		]);
	});

	it('returns to a parent folder without repeating it', () => {
		expect(renderTree(['a/b/c', 'a/c'])).toEqual(['  a/', '    b/', '      c', '    c']);
	});

	it('renders nothing for an empty store', () => {
		expect(renderTree([])).toEqual([]);
	});
});
