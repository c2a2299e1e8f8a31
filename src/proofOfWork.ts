import { Block } from './block';
import { hasLeadingZeros } from './utils';

type SealResult =
	| { sealed: true; hash: string; nonce: number; attempts: number }
	| { sealed: false; reason: 'mining-aborted'; attempts: number };

/**
 * Seals a block by searching for a hash that meets the difficulty.
 *
 * The ledger only depends on this contract, so a cancellable or parallel search can be
 * swapped in as long as it adopts exactly one winning nonce per block.
 */
interface ProofOfWork {
	seal(block: Block, difficulty: number): SealResult;
}

/**
 * Brute-force nonce search: start at 0 and count up until the hash has `difficulty`
 * leading hex zeros.
 *
 * With the default `maxAttempts` of Infinity the search has no upper bound and blocks the
 * caller until it succeeds. The nonce is a plain number counter and is never wrapped.
 */
class NonceSearch implements ProofOfWork {
	private readonly maxAttempts: number;

	/**
	 * @param maxAttempts Number of hashes to try before giving up. Defaults to unbounded.
	 */
	constructor({ maxAttempts = Infinity }: { maxAttempts?: number } = {}) {
		if (Number.isNaN(maxAttempts) || maxAttempts < 0)
			throw new RangeError(`Invalid maxAttempts: ${maxAttempts}`);

		this.maxAttempts = maxAttempts;
	}

	/**
	 * Runs the search on the given block, mutating its nonce.
	 *
	 * On success the block's nonce and hash hold the winning pair.
	 *
	 * @param block The block to seal.
	 * @param difficulty Number of leading hex zeros required.
	 *
	 * @returns The winning hash and nonce, or a mining-aborted outcome when the cap is hit.
	 */
	seal(block: Block, difficulty: number): SealResult {
		block.nonce = 0;
		let attempts = 0;

		while (attempts < this.maxAttempts) {
			const hash = block.calculateHash();
			attempts++;

			if (hasLeadingZeros(hash, difficulty)) {
				block.hash = hash;
				return { sealed: true, hash, nonce: block.nonce, attempts };
			}

			block.nonce++;
		}

		return { sealed: false, reason: 'mining-aborted', attempts };
	}
}

export type { ProofOfWork, SealResult };
export { NonceSearch };
