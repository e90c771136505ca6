/**
 * Transactions per second between two block times.
 *
 * Elapsed time saturates at zero, and a zero span yields 0 rather than NaN or
 * Infinity so callers only ever see finite rates.
 */
export function calculateTps(
	oldestTimestamp: number,
	newestTimestamp: number,
	transactionCount: number
): number {
	const elapsedSeconds = calculateElapsedSeconds(
		oldestTimestamp,
		newestTimestamp
	);

	const transactionsPerSecond = transactionCount / elapsedSeconds;
	if (!Number.isFinite(transactionsPerSecond)) {
		return 0;
	}

	return transactionsPerSecond;
}

export function calculateElapsedSeconds(
	oldestTimestamp: number,
	newestTimestamp: number
): number {
	return Math.max(0, newestTimestamp - oldestTimestamp);
}
