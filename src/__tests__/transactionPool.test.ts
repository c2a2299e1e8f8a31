import { TransactionPool } from '../transactionPool';
import { createTransaction, validateTransaction } from '../transaction';

describe('TransactionPool', () => {
	it('keeps transactions in submission order', () => {
		const pool = new TransactionPool();

		pool.add({ sender: 'Alice', receiver: 'Bob', amount: 1 });
		pool.add({ sender: 'Bob', receiver: 'Carol', amount: 2 });

		expect(pool.size).toBe(2);
		expect(pool.getTransactions().map((tx) => tx.receiver)).toEqual(['Bob', 'Carol']);
	});

	it('returns a copy of its contents', () => {
		const pool = new TransactionPool();
		pool.add({ sender: 'Alice', receiver: 'Bob', amount: 1 });

		pool.getTransactions().push({ sender: 'Eve', receiver: 'Eve', amount: 9 });

		expect(pool.size).toBe(1);
	});

	it('returns copies of the records', () => {
		const pool = new TransactionPool();
		pool.add({ sender: 'Alice', receiver: 'Bob', amount: 1 });

		pool.getTransactions()[0].amount = 100;

		expect(pool.getTransactions()).toEqual([{ sender: 'Alice', receiver: 'Bob', amount: 1 }]);
	});

	it('empties on clear', () => {
		const pool = new TransactionPool();
		pool.add({ sender: 'Alice', receiver: 'Bob', amount: 1 });

		pool.clear();

		expect(pool.size).toBe(0);
		expect(pool.getTransactions()).toEqual([]);
	});
});

describe('validateTransaction', () => {
	it('accepts a transaction with both parties and a positive amount', () => {
		expect(validateTransaction({ sender: 'Alice', receiver: 'Bob', amount: 0.01 })).toBeNull();
	});

	it('rejects an infinite amount', () => {
		expect(validateTransaction({ sender: 'Alice', receiver: 'Bob', amount: Infinity })).toBe(
			'Amount must be a number greater than 0'
		);
	});
});

describe('createTransaction', () => {
	it('builds a new record with fields in a fixed order', () => {
		const input = { amount: 2, receiver: 'Bob', sender: 'Alice' };

		const transaction = createTransaction(input);

		expect(transaction).not.toBe(input);
		expect(Object.keys(transaction)).toEqual(['sender', 'receiver', 'amount']);
	});
});
