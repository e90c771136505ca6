import { Finality } from '@solana/web3.js';

export type TpsConfig = {
	ENV: TpsEnv;
	RPC_URL: string;
	COMMITMENT: Finality;
	WINDOW_SECONDS: number;
};

export type TpsEnv = 'devnet' | 'testnet' | 'mainnet-beta';

export const TPS_ENVS: TpsEnv[] = ['devnet', 'testnet', 'mainnet-beta'];

export const DEFAULT_WINDOW_SECONDS = 60 * 5;

export const configs: { [key in TpsEnv]: TpsConfig } = {
	devnet: {
		ENV: 'devnet',
		RPC_URL: 'https://api.devnet.solana.com',
		COMMITMENT: 'finalized',
		WINDOW_SECONDS: DEFAULT_WINDOW_SECONDS,
	},
	testnet: {
		ENV: 'testnet',
		RPC_URL: 'https://api.testnet.solana.com',
		COMMITMENT: 'finalized',
		WINDOW_SECONDS: DEFAULT_WINDOW_SECONDS,
	},
	'mainnet-beta': {
		ENV: 'mainnet-beta',
		RPC_URL: 'https://api.mainnet-beta.solana.com',
		COMMITMENT: 'finalized',
		WINDOW_SECONDS: DEFAULT_WINDOW_SECONDS,
	},
};

let currentConfig: TpsConfig = configs.devnet;

export const getConfig = (): TpsConfig => currentConfig;

export function isTpsEnv(value: string): value is TpsEnv {
	return (TPS_ENVS as string[]).includes(value);
}

/**
 * Selects the cluster preset. Individual settings can be overridden with your own values.
 *
 * Defaults to devnet if you don't use this function.
 */
export const initialize = (props: {
	env: TpsEnv;
	overrideEnv?: Partial<TpsConfig>;
}): TpsConfig => {
	currentConfig = { ...configs[props.env], ...(props.overrideEnv ?? {}) };

	return currentConfig;
};
