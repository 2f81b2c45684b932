import { Command } from 'commander';
import ora from 'ora';
import { loadConfig } from '../../lib/config.js';
import { createStoreManager } from '../../lib/store-factory.js';
import { reportCommit, reportError } from '../report.js';
import { bold, dim, successMark } from '../theme.js';

export const initCommand = new Command('init')
	.description('Create the store, or re-encrypt every entry for a new key')
	.argument('<key-id>', 'GPG key id, fingerprint or email to encrypt to')
	.action(async (keyId: string) => {
		const spinner = ora({ indent: 2 });
		const manager = createStoreManager(loadConfig(), {
			onRotateEntry: (path, index, total) => {
				if (!spinner.isSpinning) spinner.start();
				spinner.text = `Re-encrypting ${path} ${dim(`(${index + 1}/${total})`)}`;
			},
		});

		try {
			const result = await manager.init(keyId);

			switch (result.status) {
				case 'created':
					console.log('');
					console.log(`  ${successMark(`Store initialized for ${bold(result.recipient)}`)}`);
					console.log(`    ${dim(manager.root)}`);
					console.log('');
					reportCommit(result.commit);
					break;
				case 'rotated': {
					const summary = `Re-encrypted ${result.reencrypted} entries for ${bold(result.recipient)} ${dim(`(was ${result.previousRecipient})`)}`;
					if (spinner.isSpinning) {
						spinner.succeed(summary);
					} else {
						console.log(`\n  ${successMark(summary)}`);
					}
					console.log('');
					reportCommit(result.commit);
					break;
				}
				case 'skipped':
					console.log(dim('\n  Re-encryption skipped. Nothing changed.\n'));
					break;
			}
		} catch (error: unknown) {
			if (spinner.isSpinning) spinner.fail('Re-encryption aborted');
			reportError(error);
		}
	});
