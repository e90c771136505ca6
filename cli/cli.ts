#!/usr/bin/env node
import { Command } from 'commander';
import { red } from 'colors/safe';
import dotenv from 'dotenv';
import log from 'loglevel';
import {
	CliFlags,
	getConfigFilePath,
	initConfigFile,
	readConfigFile,
	resolveOptions,
	setConfigValue,
} from './config';
import { runTps } from './tps';

dotenv.config();
log.setLevel(log.levels.INFO);

function logError(msg: string) {
	log.error(red(msg));
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name('solana-tps')
		.description('Estimate user (non-vote) transactions per second');

	program
		.command('tps', { isDefault: true })
		.description('walk back from the tip over a trailing window')
		.option('-e, --env <env>', 'cluster e.g devnet, testnet, mainnet-beta')
		.option('-u, --url <url>', 'rpc url e.g. https://api.devnet.solana.com')
		.option('-w, --window <seconds>', 'trailing window in seconds')
		.option('-c, --commitment <commitment>', 'confirmed or finalized')
		.option('-l, --log-level <level>', 'trace, debug, info, warn or error')
		.action(async (flags: CliFlags) => {
			const options = resolveOptions(flags, process.env, readConfigFile());
			await runTps(options);
		});

	const config = program.command('config');
	config.command('init').action(() => {
		initConfigFile();
		log.info(`wrote ${getConfigFilePath()}`);
	});

	config
		.command('set')
		.argument('<key>', 'the config key e.g. env, url, window, commitment')
		.argument('<value>')
		.action((key: string, value: string) => {
			setConfigValue(key, value);
		});

	config.command('get').action(() => {
		console.log(JSON.stringify(readConfigFile(), null, 4));
	});

	return program;
}

if (require.main === module) {
	createProgram()
		.parseAsync(process.argv)
		.catch((err: unknown) => {
			logError(err instanceof Error ? err.message : String(err));
			process.exitCode = 1;
		});
}
