import { Command } from 'commander';
import { loadConfig } from '../../lib/config.js';
import { createStoreManager } from '../../lib/store-factory.js';
import { reportError } from '../report.js';

export const gitCommand = new Command('git')
	.description('Run a git command inside the store')
	.argument('[args...]', 'Arguments passed to git unchanged')
	.helpOption(false)
	.allowUnknownOption()
	.passThroughOptions()
	.action(async (args: string[]) => {
		try {
			const manager = createStoreManager(loadConfig());
			process.exitCode = await manager.git(args);
		} catch (error: unknown) {
			reportError(error);
		}
	});
