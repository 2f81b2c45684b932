import chalk, { type ChalkInstance } from 'chalk';

// ---------------------------------------------------------------------------
// Palette
//
// Monochrome by default: bold for emphasis, dim for secondary text.
// Color only where it carries meaning.
// ---------------------------------------------------------------------------

export const brand: ChalkInstance = chalk.bold;

export const success: ChalkInstance = chalk.hex('#22c55e');

/** Uncommitted changes, skipped steps. */
export const warn: ChalkInstance = chalk.hex('#f59e0b');

export const danger: ChalkInstance = chalk.hex('#ef4444');

/** Labels and secondary text. */
export const dim: ChalkInstance = chalk.dim;

export const bold: ChalkInstance = chalk.bold;

// ---------------------------------------------------------------------------
// Composite helpers
// ---------------------------------------------------------------------------

export function successMark(text: string): string {
	return `${success('✓')} ${text}`;
}

export function failMark(text: string): string {
	return `${danger('✕')} ${text}`;
}

export function warnMark(text: string): string {
	return `${warn('!')} ${text}`;
}

export const BRAND_BANNER = `${brand('▪')} ${bold('keyward')} ${dim('· encrypted secrets in a git-tracked folder')}`;

// ---------------------------------------------------------------------------
// Tree rendering for `list`
// ---------------------------------------------------------------------------

/**
 * Renders slash-delimited paths (already in walk order) as an indented tree.
 * Folder lines are emitted once, the first time a path enters them.
 */
export function renderTree(paths: Iterable<string>): string[] {
	const lines: string[] = [];
	let previous: string[] = [];

	for (const path of paths) {
		const segments = path.split('/');
		let shared = 0;
		while (
			shared < segments.length - 1 &&
			shared < previous.length - 1 &&
			segments[shared] === previous[shared]
		) {
			shared++;
		}
		for (let depth = shared; depth < segments.length; depth++) {
			const name = segments[depth] ?? '';
			const isLeaf = depth === segments.length - 1;
			lines.push(`${'  '.repeat(depth + 1)}${isLeaf ? name : bold(`${name}/`)}`);
		}
		previous = segments;
	}

	return lines;
}

// ---------------------------------------------------------------------------
// @inquirer/prompts theme
//
// Pass as `theme` option to confirm(), password()
// ---------------------------------------------------------------------------

export const promptTheme = {
	prefix: {
		idle: bold('?'),
		done: success('✓'),
	},
	style: {
		answer: (text: string) => bold(text),
		highlight: (text: string) => bold(text),
		key: (text: string) => bold(`<${text}>`),
		description: (text: string) => dim(text),
	},
};
