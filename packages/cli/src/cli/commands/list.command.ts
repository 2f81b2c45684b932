import { Command } from 'commander';
import { loadConfig } from '../../lib/config.js';
import { createStoreManager } from '../../lib/store-factory.js';
import { reportError } from '../report.js';
import { dim, renderTree } from '../theme.js';

export const listCommand = new Command('list')
	.alias('ls')
	.description('List every entry in the store')
	.option('--flat', 'One path per line, for scripts')
	.action(async (options: { flat?: boolean }) => {
		try {
			const manager = createStoreManager(loadConfig());
			const entries = manager.list();

			if (options.flat) {
				for (const path of entries) console.log(path);
				return;
			}

			const lines = renderTree(entries);
			console.log('');
			console.log(`  ${dim(manager.root)}`);
			console.log(lines.length > 0 ? lines.join('\n') : `  ${dim('(empty)')}`);
			console.log('');
		} catch (error: unknown) {
			reportError(error);
		}
	});
