import { Connection } from '@solana/web3.js';
import log from 'loglevel';
import {
	BlockSource,
	ConnectionBlockSource,
	TpsCalculator,
	TpsLogger,
	TpsResult,
} from '../sdk/src';
import { TpsOptions } from './config';

export function blockSourceFromOptions(options: TpsOptions): BlockSource {
	const connection = new Connection(options.url, options.commitment);
	return new ConnectionBlockSource(connection, options.commitment);
}

export async function runTps(
	options: TpsOptions,
	blockSource: BlockSource = blockSourceFromOptions(options),
	logger: TpsLogger = log
): Promise<TpsResult> {
	log.setLevel(options.logLevel);

	logger.info('Solana count transactions per second!');
	logger.info(`env: ${options.env}`);
	logger.info(`url: ${options.url}`);
	logger.info(`window: ${options.windowSeconds} seconds`);

	const calculator = new TpsCalculator(blockSource, {
		windowSeconds: options.windowSeconds,
		logger,
	});

	await calculator.logNetworkVersion();
	return calculator.calculate();
}
