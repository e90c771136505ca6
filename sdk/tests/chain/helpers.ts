import { Keypair, PublicKey, SystemProgram } from '@solana/web3.js';
import {
	Block,
	BlockNotFoundError,
	BlockSource,
	BlockTransaction,
	TpsLogger,
	VOTE_PROGRAM_ID,
} from '../../src';

const payer = Keypair.generate().publicKey;

export const silentLogger: TpsLogger = {
	debug: () => undefined,
	info: () => undefined,
};

export function voteTx(instructionCount = 1): BlockTransaction {
	return {
		accountKeys: [payer, VOTE_PROGRAM_ID],
		instructions: Array.from({ length: instructionCount }, () => ({
			programIdIndex: 1,
		})),
	};
}

export function userTx(
	programIds: PublicKey[] = [SystemProgram.programId]
): BlockTransaction {
	return {
		accountKeys: [payer, ...programIds],
		instructions: programIds.map((_, i) => ({ programIdIndex: i + 1 })),
	};
}

export type MockBlockSpec = {
	slot: number;
	blockTime: number;
	blockHeight: number;
	userTxs?: number;
	voteTxs?: number;
	transactions?: BlockTransaction[];
};

/**
 * Links specs newest first: each block's parent is the next spec.
 * The oldest block points at slot 0.
 */
export function buildChain(specs: MockBlockSpec[]): Block[] {
	return specs.map((spec, i) => ({
		slot: spec.slot,
		parentSlot: i + 1 < specs.length ? specs[i + 1].slot : 0,
		blockHeight: spec.blockHeight,
		blockTime: spec.blockTime,
		transactions: spec.transactions ?? [
			...Array.from({ length: spec.userTxs ?? 0 }, () => userTx()),
			...Array.from({ length: spec.voteTxs ?? 0 }, () => voteTx()),
		],
	}));
}

export class MockBlockSource implements BlockSource {
	public fetchedSlots: number[] = [];
	private blocks = new Map<number, Block>();

	constructor(
		blocks: Block[],
		private tip: number = blocks[0].slot,
		private version = '1.18.22'
	) {
		for (const block of blocks) {
			this.blocks.set(block.slot, block);
		}
	}

	public async getTip(): Promise<number> {
		return this.tip;
	}

	public async getBlock(slot: number): Promise<Block> {
		this.fetchedSlots.push(slot);
		const block = this.blocks.get(slot);
		if (!block) {
			throw new BlockNotFoundError(slot);
		}
		return block;
	}

	public async getNetworkVersion(): Promise<string> {
		return this.version;
	}
}
