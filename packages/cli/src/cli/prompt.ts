import { stdin } from 'node:process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { confirm, password } from '@inquirer/prompts';
import { InputMismatchError } from '@keyward/core';
import type { IConfirmer } from '@keyward/core';
import { promptTheme } from './theme.js';

const BYTE_ORDER_MARK = '\uFEFF';

export function stripByteOrderMark(text: string): string {
	return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

/** Yes/no confirmation that defaults to "no". */
export const confirmPrompt: IConfirmer = (message) =>
	confirm({ message, default: false, theme: promptTheme });

/**
 * Masked prompt asked twice. Two different answers abort with
 * {@link InputMismatchError}.
 */
export async function promptSecretTwice(path: string): Promise<string> {
	const first = await password({ message: `Secret for ${path}`, mask: '*', theme: promptTheme });
	const second = await password({ message: `Retype secret for ${path}`, mask: '*', theme: promptTheme });
	if (first !== second) throw new InputMismatchError();
	return first;
}

/**
 * Reads lines until an empty line or end of input. A leading byte-order mark
 * (common when piping files saved on Windows) is dropped.
 */
export function readMultiline(input: Readable = stdin): Promise<string> {
	return new Promise((resolve, reject) => {
		const rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY, terminal: false });
		const lines: string[] = [];
		let done = false;

		const finish = () => {
			if (done) return;
			done = true;
			resolve(lines.join('\n'));
		};

		rl.on('line', (line) => {
			if (done) return;
			const text = lines.length === 0 ? stripByteOrderMark(line) : line;
			if (text === '') {
				finish();
				rl.close();
				return;
			}
			lines.push(text);
		});
		rl.once('close', finish);
		input.once('error', (error) => {
			if (done) return;
			done = true;
			rl.close();
			reject(error);
		});
	});
}
