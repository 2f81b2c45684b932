import { Command } from 'commander';
import { loadConfig } from '../../lib/config.js';
import { createStoreManager } from '../../lib/store-factory.js';
import { reportError } from '../report.js';
import { bold, brand, dim, warn } from '../theme.js';

export const infoCommand = new Command('info')
	.description('Show store details, or details of one entry')
	.argument('[path]', 'Entry path')
	.action(async (path: string | undefined) => {
		try {
			const manager = createStoreManager(loadConfig());

			console.log('');
			if (path === undefined) {
				const info = manager.info();
				console.log(`  ${brand('●')} ${bold('Store')}`);
				console.log('');
				console.log(`  ${dim('Root')}        ${info.root}`);
				console.log(`  ${dim('Key')}         ${info.recipient ?? warn('not bound; run `keyward init <key-id>`')}`);
				console.log(`  ${dim('Entries')}     ${info.entryCount}`);
				console.log(`  ${dim('Git')}         ${info.hasRepository ? 'yes' : warn('no repository')}`);
			} else {
				const info = manager.info(path);
				console.log(`  ${brand('●')} ${bold(info.path)}`);
				console.log('');
				console.log(`  ${dim('File')}        ${info.file}`);
				console.log(`  ${dim('Size')}        ${info.size} bytes`);
				console.log(`  ${dim('Modified')}    ${info.modifiedAt.toISOString()}`);
			}
			console.log('');
		} catch (error: unknown) {
			reportError(error);
		}
	});
