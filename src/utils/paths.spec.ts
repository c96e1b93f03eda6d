import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { configDir, defaultConfigFile } from './paths.js';

const ENV_KEYS = ['SHOTNAME_HOME', 'SHOTNAME_CONF', 'XDG_CONFIG_HOME'];
const originalEnv: Record<string, string | undefined> = {};

beforeEach(() => {
	for (const key of ENV_KEYS) {
		originalEnv[key] = process.env[key];
		delete process.env[key];
	}
});

afterEach(() => {
	for (const key of ENV_KEYS) {
		const value = originalEnv[key];
		if (value === undefined) {
			delete process.env[key];
		} else {
			process.env[key] = value;
		}
	}
});

describe('configDir', () => {
	it('falls back to default app name when input is blank', () => {
		process.env.XDG_CONFIG_HOME = '/tmp/config';
		expect(configDir('   ')).toBe(path.join('/tmp/config', 'shotname'));
	});

	it('trims surrounding whitespace from custom app names', () => {
		process.env.XDG_CONFIG_HOME = '/tmp/config';
		expect(configDir('  demo-app  ')).toBe(path.join('/tmp/config', 'demo-app'));
	});

	it('prefers SHOTNAME_HOME over XDG', () => {
		process.env.XDG_CONFIG_HOME = '/tmp/config';
		process.env.SHOTNAME_HOME = '/tmp/shotname-home';
		expect(configDir()).toBe('/tmp/shotname-home');
	});
});

describe('defaultConfigFile', () => {
	it('uses SHOTNAME_CONF as an explicit file', () => {
		process.env.SHOTNAME_CONF = '/tmp/elsewhere.json';
		expect(defaultConfigFile()).toEqual({ file: '/tmp/elsewhere.json', explicit: true });
	});

	it('looks for config.json in the config directory otherwise', () => {
		process.env.SHOTNAME_HOME = '/tmp/shotname-home';
		expect(defaultConfigFile()).toEqual({
			file: path.join('/tmp/shotname-home', 'config.json'),
			explicit: false,
		});
	});
});
