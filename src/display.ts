import { Block } from './block';
import { Transaction } from './transaction';

interface BlockJSON {
	index: number;
	timestamp: number;
	transactions: Transaction[];
	previousHash: string;
	hash: string;
	nonce: number;
}

/**
 * Exports a block as a plain object, with copies of its transactions.
 */
const toBlockJSON = (block: Block): BlockJSON => {
	return {
		index: block.index,
		timestamp: block.timestamp,
		transactions: block.transactions.map((transaction) => ({ ...transaction })),
		previousHash: block.previousHash,
		hash: block.hash,
		nonce: block.nonce,
	};
};

/**
 * Renders a block as human-readable text.
 *
 * @param block The block to render.
 *
 * @returns One line per field, transactions pretty-printed as JSON.
 */
const formatBlock = (block: Block): string => {
	return [
		'Block Details:',
		`Index: ${block.index}`,
		`Timestamp: ${new Date(block.timestamp).toISOString()}`,
		`Transactions: ${JSON.stringify(block.transactions, null, 4)}`,
		`Previous Hash: ${block.previousHash}`,
		`Current Hash: ${block.hash}`,
		`Nonce: ${block.nonce}`,
	].join('\n');
};

const formatChain = (blocks: Block[]): string => {
	return blocks.map(formatBlock).join('\n\n');
};

export type { BlockJSON };
export { formatBlock, formatChain, toBlockJSON };
