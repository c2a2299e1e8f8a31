import sha256 from 'crypto-js/sha256';
import { Transaction } from './transaction';
import { canonicalStringify } from './utils';

interface BlockData {
	index: number;
	transactions: Transaction[];
	timestamp: number;
	previousHash: string;
	nonce?: number;
}

class Block {
	public index: number; // Position in the chain
	public transactions: Transaction[]; // List of transactions
	public timestamp: number; // Time of block creation (ms since epoch)
	public previousHash: string; // Hash of the previous block, '0' for genesis
	public nonce: number; // Counter searched by the proof of work
	public hash: string; // Hash of the block

	/**
	 * Create a new block.
	 *
	 * The hash is computed straight away so an unsealed block is still well-formed; sealing
	 * overwrites it once a nonce meeting the difficulty is found.
	 *
	 * @param index Position of the block in the chain
	 * @param transactions Transactions contained in the block, in order
	 * @param timestamp Time of block creation
	 * @param previousHash Hash of the previous block
	 * @param nonce Starting nonce, 0 by default
	 */
	constructor({ index, transactions, timestamp, previousHash, nonce = 0 }: BlockData) {
		this.index = index;
		this.transactions = transactions;
		this.timestamp = timestamp;
		this.previousHash = previousHash;
		this.nonce = nonce;
		this.hash = this.calculateHash();
	}

	/**
	 * Computes the SHA-256 hash of the block from its current field values.
	 *
	 * Fields are serialized with sorted keys, so the same values always give the same hash.
	 * Nothing is cached: the mining loop relies on a fresh hash for every nonce.
	 *
	 * @returns The lowercase hex digest.
	 */
	calculateHash(): string {
		return sha256(
			canonicalStringify({
				index: this.index,
				transactions: this.transactions,
				timestamp: this.timestamp,
				previousHash: this.previousHash,
				nonce: this.nonce,
			})
		).toString();
	}
}

export type { BlockData };
export { Block };
