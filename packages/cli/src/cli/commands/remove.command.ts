import { Command } from 'commander';
import { loadConfig } from '../../lib/config.js';
import { createStoreManager } from '../../lib/store-factory.js';
import { reportCommit, reportError } from '../report.js';
import { bold, dim, successMark } from '../theme.js';

export const removeCommand = new Command('remove')
	.alias('rm')
	.description('Delete an entry from the store')
	.argument('<path>', 'Entry path, e.g. email/work')
	.action(async (path: string) => {
		try {
			const manager = createStoreManager(loadConfig());
			const result = await manager.remove(path);
			if (result.status === 'declined') {
				console.log(dim(`\n  Kept ${path}.\n`));
				return;
			}
			console.log(`\n  ${successMark(`Removed ${bold(path)}`)}`);
			reportCommit(result.commit);
		} catch (error: unknown) {
			reportError(error);
		}
	});
