import { Block } from './block';
import { NonceSearch, ProofOfWork } from './proofOfWork';
import { TransactionPool } from './transactionPool';
import {
	GENESIS_TRANSACTION,
	Transaction,
	createTransaction,
	validateTransaction,
} from './transaction';

const DEFAULT_DIFFICULTY = 4; // Leading hex zeros required in a block hash

const MAX_DIFFICULTY = 64; // A SHA-256 hex digest is 64 characters long

type Logger = Pick<Console, 'log' | 'error'>;

type SubmitResult =
	| { ok: true; transaction: Transaction }
	| { ok: false; error: 'invalid-transaction'; reason: string };

type MineResult =
	| { ok: true; block: Block }
	| { ok: false; error: 'nothing-to-mine' }
	| { ok: false; error: 'mining-aborted'; attempts: number };

type ValidationResult =
	| { valid: true }
	| {
			valid: false;
			error: 'tamper-detected';
			index: number;
			reason: 'hash-mismatch' | 'previous-hash-mismatch';
	  };

interface BlockchainOptions {
	difficulty?: number;
	proofOfWork?: ProofOfWork;
	now?: () => number;
	logger?: Logger;
}

class Blockchain {
	public readonly difficulty: number;

	private readonly chain: Block[] = [];
	private readonly pool = new TransactionPool();
	private readonly proofOfWork: ProofOfWork;
	private readonly now: () => number;
	private readonly logger: Logger;

	/**
	 * Create a new blockchain and mine its genesis block.
	 *
	 * @param difficulty Leading hex zeros required in every block hash, genesis included.
	 * @param proofOfWork Search used to seal blocks. Defaults to an unbounded nonce search.
	 * @param now Clock used for block timestamps.
	 * @param logger Where progress and rejections are reported.
	 *
	 * @throws {RangeError} If the difficulty is not an integer between 0 and 64.
	 * @throws {Error} If the proof of work gives up on the genesis block.
	 */
	constructor({
		difficulty = DEFAULT_DIFFICULTY,
		proofOfWork = new NonceSearch(),
		now = Date.now,
		logger = console,
	}: BlockchainOptions = {}) {
		if (!Number.isInteger(difficulty) || difficulty < 0 || difficulty > MAX_DIFFICULTY)
			throw new RangeError(`Invalid difficulty: ${difficulty}`);

		this.difficulty = difficulty;
		this.proofOfWork = proofOfWork;
		this.now = now;
		this.logger = logger;

		this.chain.push(this.createGenesisBlock());
	}

	/**
	 * Creates the genesis block: a single issuance transaction and a previous hash of '0'.
	 * It goes through the same proof of work as every other block.
	 */
	private createGenesisBlock(): Block {
		const genesisBlock = new Block({
			index: 0,
			transactions: [{ ...GENESIS_TRANSACTION }],
			timestamp: this.now(),
			previousHash: '0',
		});

		const result = this.proofOfWork.seal(genesisBlock, this.difficulty);

		if (!result.sealed)
			throw new Error(`Failed to mine genesis block after ${result.attempts} attempts`);

		return genesisBlock;
	}

	/**
	 * Retrieves the entire blockchain as an array of blocks.
	 *
	 * @returns A copy of the block sequence, genesis first.
	 */
	getBlockchain(): Block[] {
		return [...this.chain];
	}

	getLastBlock(): Block {
		return this.chain[this.chain.length - 1];
	}

	getBlock(index: number): Block | undefined {
		return this.chain[index];
	}

	getPendingTransactions(): Transaction[] {
		return this.pool.getTransactions();
	}

	/**
	 * Adds a transaction to the pending pool.
	 *
	 * @param sender Sender's name, must not be empty.
	 * @param receiver Receiver's name, must not be empty.
	 * @param amount Amount being transferred, must be greater than 0.
	 *
	 * @returns The accepted transaction, or the reason it was rejected. The pool is left
	 * untouched on rejection.
	 */
	submitTransaction({ sender, receiver, amount }: Transaction): SubmitResult {
		const reason = validateTransaction({ sender, receiver, amount });

		if (reason !== null) {
			this.logger.error(`\nInvalid transaction: ${reason}`);
			return { ok: false, error: 'invalid-transaction', reason };
		}

		const transaction = createTransaction({ sender, receiver, amount });
		this.pool.add(transaction);

		return { ok: true, transaction: { ...transaction } };
	}

	/**
	 * Mines a new block from the pending transactions and adds it to the blockchain.
	 *
	 * Either the sealed block is appended and the pool cleared, or nothing changes.
	 *
	 * @returns The new block, or why nothing was mined.
	 */
	minePendingTransactions(): MineResult {
		if (this.pool.size === 0) {
			this.logger.log('\nNo transactions to mine.');
			return { ok: false, error: 'nothing-to-mine' };
		}

		const block = new Block({
			index: this.chain.length,
			transactions: this.pool.getTransactions(),
			timestamp: this.now(),
			previousHash: this.getLastBlock().hash,
		});

		const result = this.proofOfWork.seal(block, this.difficulty);

		if (!result.sealed) {
			this.logger.error(
				`\nMining of block ${block.index} aborted after ${result.attempts} attempts`
			);
			return { ok: false, error: 'mining-aborted', attempts: result.attempts };
		}

		this.chain.push(block);
		this.pool.clear();
		this.logger.log(`\nBlock ${block.index} successfully mined!`);

		return { ok: true, block };
	}

	/**
	 * Validates the blockchain, stopping at the first broken block.
	 *
	 * Every block after the genesis block must hash to its stored hash and point at the hash
	 * of the block before it. The genesis block itself is not re-hashed.
	 *
	 * @returns valid, or the index of the first tampered block and what was wrong with it.
	 */
	validateChain(): ValidationResult {
		for (let i = 1; i < this.chain.length; i++) {
			const currentBlock = this.chain[i];
			const previousBlock = this.chain[i - 1];

			if (currentBlock.hash !== currentBlock.calculateHash()) {
				this.logger.error(`\nBlock ${i} has been tampered!`);
				return { valid: false, error: 'tamper-detected', index: i, reason: 'hash-mismatch' };
			}

			if (currentBlock.previousHash !== previousBlock.hash) {
				this.logger.error(`\nBlock ${i} has an invalid previous hash!`);
				return {
					valid: false,
					error: 'tamper-detected',
					index: i,
					reason: 'previous-hash-mismatch',
				};
			}
		}

		return { valid: true };
	}

	isChainValid(): boolean {
		return this.validateChain().valid;
	}
}

export type { BlockchainOptions, Logger, MineResult, SubmitResult, ValidationResult };
export { Blockchain, DEFAULT_DIFFICULTY, MAX_DIFFICULTY };
