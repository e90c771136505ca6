import log from 'loglevel';
import { BlockSource } from '../blockSource/types';
import { countUserTransactions } from '../classifier/transactionClassifier';
import { ArithmeticOverflowError } from '../errors';
import { Block, TpsLogger, TpsWindow } from '../types';
import { formatBlockTime } from '../util/blockTime';

export type WindowTraversalOptions = {
	logger?: TpsLogger;
};

export function subtractWindow(
	newestTimestamp: number,
	thresholdSeconds: number
): number {
	const timestampThreshold = newestTimestamp - thresholdSeconds;
	if (
		!Number.isSafeInteger(newestTimestamp) ||
		!Number.isSafeInteger(thresholdSeconds) ||
		!Number.isSafeInteger(timestampThreshold)
	) {
		throw new ArithmeticOverflowError(
			`Timestamp threshold underflow: ${newestTimestamp} - ${thresholdSeconds}`
		);
	}
	return timestampThreshold;
}

export function addCount(total: number, count: number): number {
	const sum = total + count;
	if (!Number.isSafeInteger(sum)) {
		throw new ArithmeticOverflowError(
			`Transaction count overflow: ${total} + ${count}`
		);
	}
	return sum;
}

/**
 * Walks parent links back from the tip, counting user transactions until a
 * parent's block time is at or before `newest - thresholdSeconds`, or the
 * parent is genesis.
 *
 * The block that stops the walk is never counted: only blocks strictly
 * newer than the boundary contribute. Any fetch or decode failure aborts
 * the whole walk.
 */
export async function accumulateWindow(
	blockSource: BlockSource,
	thresholdSeconds: number,
	options: WindowTraversalOptions = {}
): Promise<TpsWindow> {
	const logger = options.logger ?? log;

	const newestSlot = await blockSource.getTip();
	logger.debug(`Getting block number: ${newestSlot}`);
	let current: Block = await blockSource.getBlock(newestSlot);

	const newestTimestamp = current.blockTime;
	const timestampThreshold = subtractWindow(newestTimestamp, thresholdSeconds);

	let userTransactionCount = 0;
	let blocksCounted = 0;

	for (;;) {
		logger.debug(`Getting block number: ${current.parentSlot}`);
		const prev = await blockSource.getBlock(current.parentSlot);

		const transactionsCount = countUserTransactions(current, logger);
		logger.debug(`Block time: ${formatBlockTime(current.blockTime)}`);

		userTransactionCount = addCount(userTransactionCount, transactionsCount);
		blocksCounted++;

		if (prev.blockTime <= timestampThreshold || prev.blockHeight === 0) {
			return {
				oldestTimestamp: prev.blockTime,
				newestTimestamp,
				userTransactionCount,
				blocksCounted,
				newestSlot,
				boundarySlot: prev.slot,
			};
		}

		current = prev;
	}
}
