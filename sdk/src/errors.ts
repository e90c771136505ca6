export class TpsError extends Error {
	name = 'TpsError';

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}
}

export class BlockSourceUnavailableError extends TpsError {
	name = 'BlockSourceUnavailableError';
}

export class BlockNotFoundError extends TpsError {
	name = 'BlockNotFoundError';

	constructor(public slot: number) {
		super(`Block not available for slot ${slot}`);
	}
}

export class BlockDecodeError extends TpsError {
	name = 'BlockDecodeError';

	constructor(
		public slot: number,
		reason: string,
		options?: { cause?: unknown }
	) {
		super(`Failed to decode block ${slot}: ${reason}`, options);
	}
}

export class ArithmeticOverflowError extends TpsError {
	name = 'ArithmeticOverflowError';
}
