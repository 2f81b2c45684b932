import { execFileSync, spawn } from 'node:child_process';
import { platform as osPlatform } from 'node:os';
import { BackendUnavailableError } from '@keyward/core';
import type { IClipboardSink } from '@keyward/core';
import { isToolMissing } from './exec.js';

// ---------------------------------------------------------------------------
// System clipboard via platform tools
//
// Same approach as the OS keychain helpers: shell out to the tool every
// desktop already ships (pbcopy, clip, wl-copy, xclip) instead of a native
// binding.
//
// The clear runs in a detached shell with no handle kept by this process, so
// it fires once after the delay even when the CLI has long exited. The child
// receives only the delay; the secret is never passed to it.
// ---------------------------------------------------------------------------

export interface ClipboardTool {
	readonly command: string;
	readonly args: readonly string[];
	/** Shell program that empties the clipboard. */
	readonly clear: readonly [string, ...string[]];
	/**
	 * The tool forks a child that keeps serving the selection. That child must
	 * not hold our stderr pipe open or the synchronous copy never returns.
	 */
	readonly servesSelection: boolean;
}

export function detectClipboardTool(
	platform: NodeJS.Platform,
	env: NodeJS.ProcessEnv,
): ClipboardTool {
	switch (platform) {
		case 'darwin':
			return {
				command: 'pbcopy',
				args: [],
				clear: ['sh', '-c', "printf '' | pbcopy"],
				servesSelection: false,
			};
		case 'win32':
			return {
				command: 'clip',
				args: [],
				clear: ['powershell.exe', '-NoProfile', '-Command', 'Set-Clipboard -Value $null'],
				servesSelection: false,
			};
		default:
			if (env.WAYLAND_DISPLAY) {
				return {
					command: 'wl-copy',
					args: [],
					clear: ['sh', '-c', 'wl-copy --clear'],
					servesSelection: true,
				};
			}
			return {
				command: 'xclip',
				args: ['-selection', 'clipboard'],
				clear: ['sh', '-c', "printf '' | xclip -selection clipboard"],
				servesSelection: true,
			};
	}
}

/** Prefixes the clear program with a sleep of `seconds`. */
export function buildClearCommand(
	tool: ClipboardTool,
	seconds: number,
): { command: string; args: string[] } {
	const [program, ...rest] = tool.clear;
	const script = rest[rest.length - 1] ?? '';
	const sleep = program === 'powershell.exe' ? `Start-Sleep -Seconds ${seconds}` : `sleep ${seconds}`;
	return { command: program, args: [...rest.slice(0, -1), `${sleep}; ${script}`] };
}

export interface SystemClipboardOptions {
	readonly platform?: NodeJS.Platform;
	readonly env?: NodeJS.ProcessEnv;
}

export class SystemClipboard implements IClipboardSink {
	private readonly tool: ClipboardTool;

	constructor(options: SystemClipboardOptions = {}) {
		this.tool = detectClipboardTool(options.platform ?? osPlatform(), options.env ?? process.env);
	}

	async copy(data: Buffer, clearAfterSeconds: number): Promise<void> {
		if (!Number.isInteger(clearAfterSeconds) || clearAfterSeconds <= 0) {
			throw new RangeError(`clearAfterSeconds must be a positive integer, got ${clearAfterSeconds}`);
		}

		try {
			execFileSync(this.tool.command, [...this.tool.args], {
				input: data,
				stdio: ['pipe', 'ignore', this.tool.servesSelection ? 'ignore' : 'pipe'],
			});
		} catch (error: unknown) {
			if (isToolMissing(error)) throw new BackendUnavailableError(this.tool.command, { cause: error });
			throw error;
		}

		this.scheduleClear(clearAfterSeconds);
	}

	private scheduleClear(seconds: number): void {
		const { command, args } = buildClearCommand(this.tool, seconds);
		const child = spawn(command, args, { detached: true, stdio: 'ignore', windowsHide: true });
		child.once('error', (error) => {
			process.emitWarning(`Clipboard will not be cleared automatically: ${error.message}`);
		});
		child.unref();
	}
}
