import log from 'loglevel';
import { BlockSource } from './blockSource/types';
import { calculateElapsedSeconds, calculateTps } from './math/throughput';
import { accumulateWindow } from './traversal/windowTraversal';
import { TpsLogger, TpsResult } from './types';

export type TpsCalculatorConfig = {
	/// trailing window to measure, in seconds
	windowSeconds: number;
	/// defaults to the loglevel root logger
	logger?: TpsLogger;
};

export class TpsCalculator {
	private windowSeconds: number;
	private logger: TpsLogger;

	public constructor(
		private blockSource: BlockSource,
		config: TpsCalculatorConfig
	) {
		this.windowSeconds = config.windowSeconds;
		this.logger = config.logger ?? log;
	}

	public async logNetworkVersion(): Promise<string> {
		const version = await this.blockSource.getNetworkVersion();
		this.logger.info(`Solana version: ${version}`);
		return version;
	}

	public async calculate(): Promise<TpsResult> {
		const calculationStart = Date.now();

		const window = await accumulateWindow(
			this.blockSource,
			this.windowSeconds,
			{ logger: this.logger }
		);

		const transactionsPerSecond = calculateTps(
			window.oldestTimestamp,
			window.newestTimestamp,
			window.userTransactionCount
		);

		const calculationMs = Date.now() - calculationStart;

		this.logger.info(
			`Calculation took: ${Math.floor(calculationMs / 1000)} seconds`
		);
		this.logger.info(
			`Total transactions per second over period: ${transactionsPerSecond}`
		);

		return {
			...window,
			transactionsPerSecond,
			elapsedSeconds: calculateElapsedSeconds(
				window.oldestTimestamp,
				window.newestTimestamp
			),
			calculationMs,
		};
	}
}
