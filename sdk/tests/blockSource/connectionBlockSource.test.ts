import { expect } from 'chai';
import sinon from 'sinon';
import {
	Connection,
	Keypair,
	Message,
	MessageV0,
	PublicKey,
	SolanaJSONRPCError,
	SystemProgram,
	VersionedBlockResponse,
} from '@solana/web3.js';
import {
	BlockDecodeError,
	BlockNotFoundError,
	BlockSourceUnavailableError,
	ConnectionBlockSource,
	VOTE_PROGRAM_ID,
	countUserTransactions,
} from '../../src';
import { silentLogger } from '../chain/helpers';

const payer = Keypair.generate().publicKey;

function mockBlockResponse(
	overrides: Partial<VersionedBlockResponse> = {}
): VersionedBlockResponse {
	const voteMessage = new Message({
		header: {
			numRequiredSignatures: 1,
			numReadonlySignedAccounts: 0,
			numReadonlyUnsignedAccounts: 1,
		},
		accountKeys: [payer, VOTE_PROGRAM_ID],
		recentBlockhash: PublicKey.default.toBase58(),
		instructions: [{ programIdIndex: 1, accounts: [0], data: '' }],
	});

	const userMessage = new MessageV0({
		header: {
			numRequiredSignatures: 1,
			numReadonlySignedAccounts: 0,
			numReadonlyUnsignedAccounts: 2,
		},
		staticAccountKeys: [payer, VOTE_PROGRAM_ID, SystemProgram.programId],
		recentBlockhash: PublicKey.default.toBase58(),
		compiledInstructions: [
			{ programIdIndex: 1, accountKeyIndexes: [0], data: new Uint8Array() },
			{ programIdIndex: 2, accountKeyIndexes: [0], data: new Uint8Array() },
		],
		addressTableLookups: [],
	});

	return {
		blockhash: 'mockedBlockhash',
		previousBlockhash: 'mockedPreviousBlockhash',
		parentSlot: 41,
		blockHeight: 39,
		blockTime: 1_700_000_000,
		transactions: [
			{
				meta: null,
				transaction: { message: voteMessage, signatures: ['voteSig'] },
				version: 'legacy',
			},
			{
				meta: null,
				transaction: { message: userMessage, signatures: ['userSig'] },
				version: 0,
			},
		],
		...overrides,
	};
}

describe('ConnectionBlockSource', () => {
	let connection: sinon.SinonStubbedInstance<Connection>;
	let getBlock: sinon.SinonStub;
	let blockSource: ConnectionBlockSource;

	beforeEach(() => {
		connection = sinon.createStubInstance(Connection);
		getBlock = connection.getBlock as sinon.SinonStub;
		blockSource = new ConnectionBlockSource(
			connection as unknown as Connection
		);
	});

	afterEach(() => {
		sinon.restore();
	});

	it('should fetch the tip at the configured commitment', async () => {
		connection.getSlot.resolves(42);

		expect(await blockSource.getTip()).to.equal(42);
		expect(connection.getSlot.calledOnceWith('finalized')).to.be.true;
	});

	it('should map legacy and v0 transactions into a block', async () => {
		getBlock.resolves(mockBlockResponse());

		const block = await blockSource.getBlock(42);

		expect(
			getBlock.calledOnceWith(42, {
				commitment: 'finalized',
				maxSupportedTransactionVersion: 0,
				rewards: false,
			})
		).to.be.true;
		expect(block.slot).to.equal(42);
		expect(block.parentSlot).to.equal(41);
		expect(block.blockHeight).to.equal(39);
		expect(block.blockTime).to.equal(1_700_000_000);
		expect(block.transactions.map((tx) => tx.signature)).to.deep.equal([
			'voteSig',
			'userSig',
		]);
		expect(block.transactions[1].instructions).to.deep.equal([
			{ programIdIndex: 1 },
			{ programIdIndex: 2 },
		]);
		expect(block.transactions[0].accountKeys[1].equals(VOTE_PROGRAM_ID)).to.be
			.true;
		expect(countUserTransactions(block, silentLogger)).to.equal(1);
	});

	it('should use the commitment it was built with', async () => {
		blockSource = new ConnectionBlockSource(
			connection as unknown as Connection,
			'confirmed'
		);
		getBlock.resolves(mockBlockResponse());

		await blockSource.getBlock(42);
		expect(getBlock.firstCall.args[1].commitment).to.equal('confirmed');
	});

	it('should throw BlockNotFoundError when no block is returned', async () => {
		getBlock.resolves(null);

		try {
			await blockSource.getBlock(7);
			expect.fail('Should have thrown an error');
		} catch (error) {
			if (!(error instanceof BlockNotFoundError)) throw error;
			expect(error.slot).to.equal(7);
			expect(error.message).to.equal('Block not available for slot 7');
		}
	});

	it('should throw BlockNotFoundError for a skipped slot', async () => {
		getBlock.rejects(
			new SolanaJSONRPCError({
				code: -32007,
				message: 'Slot 7 was skipped, or missing due to ledger jump',
			})
		);

		try {
			await blockSource.getBlock(7);
			expect.fail('Should have thrown an error');
		} catch (error) {
			if (!(error instanceof BlockNotFoundError)) throw error;
			expect(error.slot).to.equal(7);
		}
	});

	it('should throw BlockDecodeError when the block time is missing', async () => {
		getBlock.resolves(mockBlockResponse({ blockTime: null }));

		try {
			await blockSource.getBlock(42);
			expect.fail('Should have thrown an error');
		} catch (error) {
			if (!(error instanceof BlockDecodeError)) throw error;
			expect(error.message).to.equal(
				'Failed to decode block 42: missing block time'
			);
		}
	});

	it('should throw BlockDecodeError when the block height is missing', async () => {
		getBlock.resolves(mockBlockResponse({ blockHeight: null }));

		try {
			await blockSource.getBlock(42);
			expect.fail('Should have thrown an error');
		} catch (error) {
			if (!(error instanceof BlockDecodeError)) throw error;
			expect(error.message).to.equal(
				'Failed to decode block 42: missing block height'
			);
		}
	});

	it('should wrap transport failures without retrying', async () => {
		const networkError = new Error('Network error');
		getBlock.rejects(networkError);

		try {
			await blockSource.getBlock(42);
			expect.fail('Should have thrown an error');
		} catch (error) {
			if (!(error instanceof BlockSourceUnavailableError)) throw error;
			expect(error.cause).to.equal(networkError);
		}
		expect(getBlock.calledOnce).to.be.true;
	});

	it('should wrap a failed tip query', async () => {
		connection.getSlot.rejects(new Error('Network error'));

		try {
			await blockSource.getTip();
			expect.fail('Should have thrown an error');
		} catch (error) {
			if (!(error instanceof BlockSourceUnavailableError)) throw error;
		}
		expect(connection.getSlot.calledOnce).to.be.true;
	});

	it('should return the solana-core version', async () => {
		connection.getVersion.resolves({ 'solana-core': '1.18.22' });

		expect(await blockSource.getNetworkVersion()).to.equal('1.18.22');
	});
});
