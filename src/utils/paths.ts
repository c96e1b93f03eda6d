import os from 'node:os';
import path from 'node:path';

const APP_NAME = 'shotname';

function appNameOrDefault(app: string) {
	const trimmed = app?.trim();
	return trimmed && trimmed.length > 0 ? trimmed : APP_NAME;
}

/**
 * Per-user config directory: `$SHOTNAME_HOME`, else XDG, else the platform
 * convention.
 */
export function configDir(app = APP_NAME) {
	const appName = appNameOrDefault(app);
	const override = process.env.SHOTNAME_HOME;
	if (override && override.length > 0) return override;
	const xdg = process.env.XDG_CONFIG_HOME;
	if (xdg && xdg.length > 0) return path.join(xdg, appName);
	const homeDir = os.homedir();
	if (process.platform === 'darwin') {
		return path.join(homeDir, 'Library', 'Application Support', appName);
	}
	return path.join(homeDir, '.config', appName);
}

/**
 * Config file to read: `$SHOTNAME_CONF` when set, else `config.json` in
 * {@link configDir}.
 */
export function defaultConfigFile(): { file: string; explicit: boolean } {
	const fromEnv = process.env.SHOTNAME_CONF;
	if (fromEnv && fromEnv.length > 0) return { file: fromEnv, explicit: true };
	return { file: path.join(configDir(), 'config.json'), explicit: false };
}
