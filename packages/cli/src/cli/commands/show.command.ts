import { ClipboardMode } from '@keyward/core';
import { Command } from 'commander';
import { loadConfig } from '../../lib/config.js';
import { parseShowOptions } from '../../lib/options.js';
import { createStoreManager } from '../../lib/store-factory.js';
import { reportError, reportUsage } from '../report.js';
import { bold, successMark } from '../theme.js';

export const showCommand = new Command('show')
	.description('Decrypt an entry and print it, or copy it to the clipboard')
	.argument('<path>', 'Entry path, e.g. email/work')
	.option('-c, --clip', 'Copy the first line to the clipboard instead of printing')
	.option('-C, --clip-all', 'Copy the whole entry to the clipboard instead of printing')
	.action(async (path: string, rawOptions: Record<string, unknown>) => {
		const parsed = parseShowOptions(rawOptions);
		if (!parsed.ok) {
			reportUsage(parsed.message);
			return;
		}

		try {
			const manager = createStoreManager(loadConfig());
			const result = await manager.get(path, parsed.value);

			if (result.status === 'shown') {
				// Raw bytes on stdout so the value can be piped.
				process.stdout.write(result.plaintext);
				if (result.plaintext.at(-1) !== 0x0a) process.stdout.write('\n');
				return;
			}

			const what = result.mode === ClipboardMode.FIRST_LINE ? 'first line of ' : '';
			console.log(
				`\n  ${successMark(`Copied ${what}${bold(path)} to the clipboard. Clears in ${result.clearAfterSeconds}s.`)}\n`,
			);
		} catch (error: unknown) {
			reportError(error);
		}
	});
