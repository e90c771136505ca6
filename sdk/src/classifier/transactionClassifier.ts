import { PublicKey, VoteProgram } from '@solana/web3.js';
import log from 'loglevel';
import { BlockDecodeError } from '../errors';
import {
	Block,
	BlockClassification,
	BlockTransaction,
	TpsLogger,
	TransactionKind,
} from '../types';

export const VOTE_PROGRAM_ID = VoteProgram.programId;

function resolveProgramId(
	tx: BlockTransaction,
	programIdIndex: number,
	slot: number
): PublicKey {
	const programId = tx.accountKeys[programIdIndex];
	if (programId === undefined) {
		throw new BlockDecodeError(
			slot,
			`program id index ${programIdIndex} out of range for ${
				tx.accountKeys.length
			} account keys${tx.signature ? ` in ${tx.signature}` : ''}`
		);
	}
	return programId;
}

/**
 * A transaction is vote-only when every one of its instructions invokes the
 * vote program. Anything else, including a single vote instruction bundled
 * with other programs, is a user transaction.
 */
export function classifyTransaction(
	tx: BlockTransaction,
	slot: number,
	logger: TpsLogger = log
): TransactionKind {
	let voteInstructions = 0;
	for (const ix of tx.instructions) {
		const programId = resolveProgramId(tx, ix.programIdIndex, slot);
		if (programId.equals(VOTE_PROGRAM_ID)) {
			voteInstructions++;
			logger.debug('Vote instruction found');
		} else {
			logger.debug('User instruction found');
		}
	}

	if (voteInstructions === tx.instructions.length) {
		logger.debug("It's a vote transaction");
		return 'vote';
	}

	logger.debug("It's a user transaction");
	return 'user';
}

export function classifyBlock(
	block: Block,
	logger: TpsLogger = log
): BlockClassification {
	let user = 0;
	for (const tx of block.transactions) {
		if (classifyTransaction(tx, block.slot, logger) === 'user') {
			user++;
		}
	}

	const total = block.transactions.length;
	const vote = total - user;

	logger.debug(`Solana total txns: ${total}`);
	logger.debug(`Solana user txns: ${user}`);
	logger.debug(`Solana vote txns: ${vote}`);

	return { user, vote, total };
}

export function countUserTransactions(
	block: Block,
	logger: TpsLogger = log
): number {
	return classifyBlock(block, logger).user;
}
