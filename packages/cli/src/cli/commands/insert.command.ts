import { stdin } from 'node:process';
import { SecretSourceKind } from '@keyward/core';
import { Command } from 'commander';
import { loadConfig } from '../../lib/config.js';
import { parseInsertOptions } from '../../lib/options.js';
import { createSecretInput } from '../../lib/secret-input.js';
import { createStoreManager } from '../../lib/store-factory.js';
import { reportCommit, reportError, reportUsage } from '../report.js';
import { bold, dim, successMark } from '../theme.js';

export const insertCommand = new Command('insert')
	.alias('add')
	.description('Encrypt a new secret into the store')
	.argument('<path>', 'Entry path, e.g. email/work')
	.option('-m, --multiline', 'Read lines until an empty line or end of input')
	.option('-g, --generate', 'Generate a random secret with symbols')
	.option('-G, --generate-alnum', 'Generate a random alphanumeric secret')
	.option('-l, --length <n>', 'Length of a generated secret (default: 24)')
	.option('-f, --force', 'Overwrite an existing entry without asking')
	.action(async (path: string, rawOptions: Record<string, unknown>) => {
		const parsed = parseInsertOptions(rawOptions);
		if (!parsed.ok) {
			reportUsage(parsed.message);
			return;
		}
		const mode = parsed.value;

		try {
			const manager = createStoreManager(loadConfig());
			const source = createSecretInput(path, mode, {
				onPrompt: () => {
					if (mode.source === SecretSourceKind.MULTILINE && stdin.isTTY) {
						console.log(dim(`  Enter contents of ${path}; finish with an empty line or Ctrl+D:`));
					}
				},
			});

			const result = await manager.insert(path, source, { force: mode.force });
			if (result.status === 'declined') {
				console.log(dim(`\n  Kept the existing ${path}.\n`));
				return;
			}

			const verb = result.overwritten ? 'Updated' : 'Added';
			const how = mode.source === SecretSourceKind.GENERATE ? ` ${dim(`(generated, ${mode.length} chars)`)}` : '';
			console.log(`\n  ${successMark(`${verb} ${bold(path)}`)}${how}`);
			reportCommit(result.commit);
		} catch (error: unknown) {
			reportError(error);
		}
	});
