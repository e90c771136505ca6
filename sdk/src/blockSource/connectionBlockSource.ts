import {
	Connection,
	Finality,
	SolanaJSONRPCError,
	SolanaJSONRPCErrorCode,
	VersionedBlockResponse,
} from '@solana/web3.js';
import {
	BlockDecodeError,
	BlockNotFoundError,
	BlockSourceUnavailableError,
} from '../errors';
import { Block, BlockTransaction } from '../types';
import { BlockSource } from './types';

const MISSING_BLOCK_CODES: unknown[] = [
	SolanaJSONRPCErrorCode.JSON_RPC_SERVER_ERROR_BLOCK_NOT_AVAILABLE,
	SolanaJSONRPCErrorCode.JSON_RPC_SERVER_ERROR_SLOT_SKIPPED,
	SolanaJSONRPCErrorCode.JSON_RPC_SERVER_ERROR_LONG_TERM_STORAGE_SLOT_SKIPPED,
];

/**
 * Reads blocks straight from an rpc node. Every call goes out exactly once;
 * timeouts are whatever the connection was built with.
 */
export class ConnectionBlockSource implements BlockSource {
	constructor(
		private connection: Connection,
		private commitment: Finality = 'finalized'
	) {}

	public async getTip(): Promise<number> {
		try {
			return await this.connection.getSlot(this.commitment);
		} catch (err) {
			throw new BlockSourceUnavailableError(
				`Failed to fetch current slot from ${this.connection.rpcEndpoint}`,
				{ cause: err }
			);
		}
	}

	public async getBlock(slot: number): Promise<Block> {
		let response: VersionedBlockResponse | null;
		try {
			response = await this.connection.getBlock(slot, {
				commitment: this.commitment,
				maxSupportedTransactionVersion: 0,
				rewards: false,
			});
		} catch (err) {
			if (
				err instanceof SolanaJSONRPCError &&
				MISSING_BLOCK_CODES.includes(err.code)
			) {
				throw new BlockNotFoundError(slot);
			}
			throw new BlockSourceUnavailableError(
				`Failed to fetch block ${slot} from ${this.connection.rpcEndpoint}`,
				{ cause: err }
			);
		}

		if (!response) {
			throw new BlockNotFoundError(slot);
		}

		return toBlock(slot, response);
	}

	public async getNetworkVersion(): Promise<string> {
		try {
			const version = await this.connection.getVersion();
			return version['solana-core'];
		} catch (err) {
			throw new BlockSourceUnavailableError(
				`Failed to fetch version from ${this.connection.rpcEndpoint}`,
				{ cause: err }
			);
		}
	}
}

export function toBlock(slot: number, response: VersionedBlockResponse): Block {
	if (response.blockTime === null || response.blockTime === undefined) {
		throw new BlockDecodeError(slot, 'missing block time');
	}
	if (response.blockHeight === null || response.blockHeight === undefined) {
		throw new BlockDecodeError(slot, 'missing block height');
	}

	let transactions: BlockTransaction[];
	try {
		transactions = response.transactions.map(({ transaction }) => ({
			signature: transaction.signatures[0],
			accountKeys: transaction.message.staticAccountKeys,
			instructions: transaction.message.compiledInstructions.map((ix) => ({
				programIdIndex: ix.programIdIndex,
			})),
		}));
	} catch (err) {
		throw new BlockDecodeError(slot, 'unreadable transaction message', {
			cause: err,
		});
	}

	return {
		slot,
		parentSlot: response.parentSlot,
		blockHeight: response.blockHeight,
		blockTime: response.blockTime,
		transactions,
	};
}
