#!/usr/bin/env node

const args = process.argv.slice(2);

if (args.length === 0) {
	// No arguments → show help instead of an error about a missing path
	process.argv.push('--help');
}

const { runCli } = await import('./cli/index.js');
await runCli();
