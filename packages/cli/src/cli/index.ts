import { Command } from 'commander';
import { gitCommand } from './commands/git.command.js';
import { infoCommand } from './commands/info.command.js';
import { initCommand } from './commands/init.command.js';
import { insertCommand } from './commands/insert.command.js';
import { listCommand } from './commands/list.command.js';
import { removeCommand } from './commands/remove.command.js';
import { showCommand } from './commands/show.command.js';
import { BRAND_BANNER, dim } from './theme.js';

export function buildProgram(): Command {
	const program = new Command();

	program
		.name('keyward')
		.description(BRAND_BANNER)
		.version('0.1.0')
		.enablePositionalOptions()
		.addHelpText(
			'after',
			`
${dim('Getting started:')}
  $ keyward init you@example.com       Create a store in ./.password-store
  $ keyward insert email/work          Add a secret
  $ keyward email/work -c              Copy it to the clipboard for 45s
  $ keyward git log --oneline          Inspect the store history
`,
		);

	program.addCommand(initCommand);
	program.addCommand(insertCommand);
	// `keyward <path>` falls through to `show`.
	program.addCommand(showCommand, { isDefault: true });
	program.addCommand(removeCommand);
	program.addCommand(listCommand);
	program.addCommand(infoCommand);
	program.addCommand(gitCommand);

	return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
	await buildProgram().parseAsync([...argv]);
}
