import os from 'os';
import fs from 'fs';
import path from 'path';
import { Finality } from '@solana/web3.js';
import {
	DEFAULT_WINDOW_SECONDS,
	TpsConfig,
	TpsEnv,
	TpsError,
	configs,
	initialize,
	isTpsEnv,
} from '../sdk/src';

export class ConfigError extends TpsError {
	name = 'ConfigError';
}

export type FileConfig = {
	env?: string;
	url?: string;
	window?: string;
	commitment?: string;
};

export const FILE_CONFIG_KEYS: (keyof FileConfig)[] = [
	'env',
	'url',
	'window',
	'commitment',
];

export type CliFlags = {
	env?: string;
	url?: string;
	window?: string;
	commitment?: string;
	logLevel?: string;
};

export type TpsOptions = {
	env: TpsEnv;
	url: string;
	windowSeconds: number;
	commitment: Finality;
	logLevel: LogLevelName;
};

export type LogLevelName =
	| 'trace'
	| 'debug'
	| 'info'
	| 'warn'
	| 'error'
	| 'silent';

const LOG_LEVELS: LogLevelName[] = [
	'trace',
	'debug',
	'info',
	'warn',
	'error',
	'silent',
];

export function getConfigFileDir(
	env: NodeJS.ProcessEnv = process.env
): string {
	return env.SOLANA_TPS_CONFIG_DIR || `${os.homedir()}/.config/solana-tps`;
}

export function getConfigFilePath(
	env: NodeJS.ProcessEnv = process.env
): string {
	return path.join(getConfigFileDir(env), 'config.json');
}

export function readConfigFile(
	env: NodeJS.ProcessEnv = process.env
): FileConfig {
	const filePath = getConfigFilePath(env);
	if (!fs.existsSync(filePath)) {
		return {};
	}

	const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new ConfigError(`${filePath} must contain a JSON object`);
	}

	const config: FileConfig = {};
	for (const key of FILE_CONFIG_KEYS) {
		const value: unknown = Reflect.get(parsed, key);
		if (value !== undefined) {
			config[key] = String(value);
		}
	}
	return config;
}

export function writeConfigFile(
	config: FileConfig,
	env: NodeJS.ProcessEnv = process.env
): void {
	const dir = getConfigFileDir(env);
	if (!fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}
	fs.writeFileSync(getConfigFilePath(env), JSON.stringify(config, null, 4));
}

export function isFileConfigKey(key: string): key is keyof FileConfig {
	return (FILE_CONFIG_KEYS as string[]).includes(key);
}

export function initConfigFile(
	env: NodeJS.ProcessEnv = process.env
): FileConfig {
	const defaultConfig: FileConfig = {
		env: 'devnet',
		url: configs.devnet.RPC_URL,
		window: String(DEFAULT_WINDOW_SECONDS),
		commitment: configs.devnet.COMMITMENT,
	};
	writeConfigFile(defaultConfig, env);
	return defaultConfig;
}

export function setConfigValue(
	key: string,
	value: string,
	env: NodeJS.ProcessEnv = process.env
): FileConfig {
	if (!isFileConfigKey(key)) {
		throw new ConfigError(
			`Key must be one of ${FILE_CONFIG_KEYS.join(', ')}: ${key}`
		);
	}

	const config = { ...readConfigFile(env), [key]: value };
	// reject values the tps command would refuse to run with
	resolveOptions({}, {}, config);
	writeConfigFile(config, env);
	return config;
}

function parseEnv(value: string): TpsEnv {
	if (!isTpsEnv(value)) {
		throw new ConfigError(
			`Unknown env ${value}, expected devnet, testnet or mainnet-beta`
		);
	}
	return value;
}

function parseWindow(value: string): number {
	const windowSeconds = Number(value);
	if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(windowSeconds)) {
		throw new ConfigError(
			`Window must be a whole number of seconds: ${value}`
		);
	}
	if (windowSeconds <= 0) {
		throw new ConfigError(`Window must be positive: ${value}`);
	}
	return windowSeconds;
}

function parseCommitment(value: string): Finality {
	if (value !== 'confirmed' && value !== 'finalized') {
		throw new ConfigError(`Commitment must be confirmed or finalized: ${value}`);
	}
	return value;
}

function isLogLevelName(value: string): value is LogLevelName {
	return (LOG_LEVELS as string[]).includes(value);
}

function parseLogLevel(value: string): LogLevelName {
	const level = value.toLowerCase();
	if (!isLogLevelName(level)) {
		throw new ConfigError(
			`Log level must be one of ${LOG_LEVELS.join(', ')}: ${value}`
		);
	}
	return level;
}

/**
 * Flags win over environment variables, which win over the config file,
 * which wins over the cluster preset. The result is also installed as the
 * SDK's current config.
 */
export function resolveOptions(
	flags: CliFlags,
	env: NodeJS.ProcessEnv = process.env,
	fileConfig: FileConfig = {}
): TpsOptions {
	const tpsEnv = parseEnv(
		flags.env ?? env.SOLANA_ENV ?? fileConfig.env ?? 'devnet'
	);

	const url = flags.url ?? env.RPC_URL ?? fileConfig.url;
	const window = flags.window ?? env.TPS_WINDOW_SECONDS ?? fileConfig.window;
	const commitment =
		flags.commitment ?? env.TPS_COMMITMENT ?? fileConfig.commitment;
	const logLevel = parseLogLevel(flags.logLevel ?? env.LOG_LEVEL ?? 'info');

	const overrideEnv: Partial<TpsConfig> = {};
	if (url !== undefined) {
		overrideEnv.RPC_URL = url;
	}
	if (window !== undefined) {
		overrideEnv.WINDOW_SECONDS = parseWindow(window);
	}
	if (commitment !== undefined) {
		overrideEnv.COMMITMENT = parseCommitment(commitment);
	}

	const config = initialize({ env: tpsEnv, overrideEnv });

	return {
		env: config.ENV,
		url: config.RPC_URL,
		windowSeconds: config.WINDOW_SECONDS,
		commitment: config.COMMITMENT,
		logLevel,
	};
}
