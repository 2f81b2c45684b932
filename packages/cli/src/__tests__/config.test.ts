import { describe, expect, it } from 'vitest';
import { loadConfig } from '../lib/config.js';

describe('loadConfig', () => {
	it('defaults to .password-store in the working directory', () => {
		expect(loadConfig({}, '/work')).toEqual({
			storeDir: '/work/.password-store',
			gpgBinary: 'gpg',
			gitBinary: 'git',
		});
	});

	it('reads overrides from the environment', () => {
		const config = loadConfig(
			{ KEYWARD_STORE_DIR: 'vault', KEYWARD_GPG: 'gpg2', KEYWARD_GIT: '/usr/bin/git' },
			'/work',
		);
		expect(config).toEqual({ storeDir: '/work/vault', gpgBinary: 'gpg2', gitBinary: '/usr/bin/git' });
	});

	it('treats empty variables as unset', () => {
		expect(loadConfig({ KEYWARD_STORE_DIR: '', KEYWARD_GPG: '' }, '/work')).toEqual({
			storeDir: '/work/.password-store',
			gpgBinary: 'gpg',
			gitBinary: 'git',
		});
	});
});
