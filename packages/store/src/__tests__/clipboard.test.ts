import { ChildProcess, execFileSync, spawn } from 'node:child_process';
import { BackendUnavailableError } from '@keyward/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SystemClipboard, buildClearCommand, detectClipboardTool } from '../clipboard.js';

vi.mock('node:child_process', async (importOriginal) => {
	const actual = await importOriginal<typeof import('node:child_process')>();
	return { ...actual, execFileSync: vi.fn(), spawn: vi.fn() };
});

const execMock = vi.mocked(execFileSync);
const spawnMock = vi.mocked(spawn);

describe('clipboard', () => {
	let child: ChildProcess;

	beforeEach(() => {
		execMock.mockReset();
		spawnMock.mockReset();
		child = new ChildProcess();
		vi.spyOn(child, 'unref');
		spawnMock.mockReturnValue(child);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	// -----------------------------------------------------------------------
	// Tool detection
	// -----------------------------------------------------------------------

	describe('detectClipboardTool', () => {
		it('uses pbcopy on macOS', () => {
			expect(detectClipboardTool('darwin', {}).command).toBe('pbcopy');
		});

		it('prefers wl-copy under Wayland', () => {
			expect(detectClipboardTool('linux', { WAYLAND_DISPLAY: 'wayland-0' }).command).toBe('wl-copy');
		});

		it('falls back to xclip on the clipboard selection', () => {
			const tool = detectClipboardTool('linux', {});
			expect(tool.command).toBe('xclip');
			expect(tool.args).toEqual(['-selection', 'clipboard']);
		});
	});

	describe('buildClearCommand', () => {
		it('sleeps in a POSIX shell before clearing', () => {
			expect(buildClearCommand(detectClipboardTool('darwin', {}), 45)).toEqual({
				command: 'sh',
				args: ['-c', "sleep 45; printf '' | pbcopy"],
			});
		});

		it('sleeps in PowerShell on Windows', () => {
			expect(buildClearCommand(detectClipboardTool('win32', {}), 45)).toEqual({
				command: 'powershell.exe',
				args: ['-NoProfile', '-Command', 'Start-Sleep -Seconds 45; Set-Clipboard -Value $null'],
			});
		});
	});

	// -----------------------------------------------------------------------
	// copy
	// -----------------------------------------------------------------------

	describe('SystemClipboard.copy', () => {
		it('writes the text and schedules exactly one detached clear', async () => {
			const clipboard = new SystemClipboard({ platform: 'darwin', env: {} });

			await clipboard.copy(Buffer.from('hunter2'), 45);

			expect(execMock).toHaveBeenCalledWith('pbcopy', [], {
				input: Buffer.from('hunter2'),
				stdio: ['pipe', 'ignore', 'pipe'],
			});
			expect(spawnMock).toHaveBeenCalledTimes(1);
			expect(spawnMock).toHaveBeenCalledWith('sh', ['-c', "sleep 45; printf '' | pbcopy"], {
				detached: true,
				stdio: 'ignore',
				windowsHide: true,
			});
			expect(child.unref).toHaveBeenCalledTimes(1);
		});

		it.each([
			['xclip', {}],
			['wl-copy', { WAYLAND_DISPLAY: 'wayland-0' }],
		])('does not pipe stderr from %s', async (command, env) => {
			await new SystemClipboard({ platform: 'linux', env }).copy(Buffer.from('hunter2'), 45);

			expect(execMock).toHaveBeenCalledWith(command, expect.any(Array), {
				input: Buffer.from('hunter2'),
				stdio: ['pipe', 'ignore', 'ignore'],
			});
		});

		it('never hands the secret to the clearing process', async () => {
			await new SystemClipboard({ platform: 'linux', env: {} }).copy(Buffer.from('hunter2'), 45);

			const [, args] = spawnMock.mock.calls[0] ?? [];
			expect(JSON.stringify(args)).not.toContain('hunter2');
		});

		it('warns when the clearing process cannot start', async () => {
			const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
			await new SystemClipboard({ platform: 'darwin', env: {} }).copy(Buffer.from('hunter2'), 45);

			child.emit('error', new Error('spawn sh ENOENT'));

			expect(warn).toHaveBeenCalledWith('Clipboard will not be cleared automatically: spawn sh ENOENT');
		});

		it('reports a missing clipboard tool and schedules nothing', async () => {
			execMock.mockImplementation(() => {
				throw Object.assign(new Error('spawnSync xclip ENOENT'), { code: 'ENOENT' });
			});

			const attempt = new SystemClipboard({ platform: 'linux', env: {} }).copy(Buffer.from('hunter2'), 45);

			await expect(attempt).rejects.toThrow(BackendUnavailableError);
			await expect(attempt).rejects.toThrow('xclip is not installed or not executable');
			expect(spawnMock).not.toHaveBeenCalled();
		});

		it('rejects a non-positive delay', async () => {
			await expect(
				new SystemClipboard({ platform: 'darwin', env: {} }).copy(Buffer.from('hunter2'), 0),
			).rejects.toThrow(RangeError);
			expect(execMock).not.toHaveBeenCalled();
		});
	});
});
