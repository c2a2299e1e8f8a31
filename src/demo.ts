import { Blockchain, Logger, ValidationResult } from './blockchain';
import { formatChain } from './display';

/**
 * Walks through mining two blocks, validating the chain, tampering with block 1 and
 * validating again.
 *
 * @returns The validation results before and after tampering.
 */
const runDemo = ({
	difficulty,
	logger = console,
}: {
	difficulty?: number;
	logger?: Logger;
} = {}): { original: ValidationResult; tampered: ValidationResult } => {
	const blockchain = new Blockchain({ difficulty, logger });

	logger.log('\nAdding transactions and mining blocks...');
	blockchain.submitTransaction({ sender: 'Alice', receiver: 'Bob', amount: 1.5 });
	blockchain.submitTransaction({ sender: 'Bob', receiver: 'Charlie', amount: 0.8 });
	blockchain.minePendingTransactions();

	blockchain.submitTransaction({ sender: 'Charlie', receiver: 'Dave', amount: 2.2 });
	blockchain.minePendingTransactions();

	logger.log('\nOriginal Blockchain:');
	logger.log(formatChain(blockchain.getBlockchain()));

	logger.log('\nValidating original chain...');
	const original = blockchain.validateChain();
	logger.log(`Is chain valid? ${original.valid}`);

	logger.log('\nTampering with block 1...');
	blockchain.getBlockchain()[1].transactions[0].amount = 100;

	logger.log('\nValidating tampered chain...');
	const tampered = blockchain.validateChain();
	logger.log(`Is chain valid? ${tampered.valid}`);

	return { original, tampered };
};

if (require.main === module) runDemo();

export { runDemo };
