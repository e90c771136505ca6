import { PublicKey } from '@solana/web3.js';
import log from 'loglevel';

// # Blocks

export type CompiledInstructionRef = {
	// index into the owning transaction's static account keys
	programIdIndex: number;
};

export type BlockTransaction = {
	signature?: string;
	accountKeys: PublicKey[];
	instructions: CompiledInstructionRef[];
};

export type Block = {
	slot: number;
	parentSlot: number;
	blockHeight: number;
	/** unix seconds */
	blockTime: number;
	transactions: BlockTransaction[];
};

// # Classification

export type TransactionKind = 'vote' | 'user';

export type BlockClassification = {
	user: number;
	vote: number;
	total: number;
};

// # Window

export type TpsWindow = {
	oldestTimestamp: number;
	newestTimestamp: number;
	userTransactionCount: number;
	blocksCounted: number;
	newestSlot: number;
	/** slot of the first parent at or before the threshold, never counted */
	boundarySlot: number;
};

export type TpsResult = TpsWindow & {
	transactionsPerSecond: number;
	elapsedSeconds: number;
	calculationMs: number;
};

export type TpsLogger = Pick<log.Logger, 'debug' | 'info'>;
