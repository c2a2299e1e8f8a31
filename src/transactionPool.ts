import { Transaction } from './transaction';

/**
 * Buffer of transactions waiting to be mined, kept in submission order.
 */
class TransactionPool {
	private transactions: Transaction[] = [];

	get size(): number {
		return this.transactions.length;
	}

	add(transaction: Transaction): void {
		this.transactions.push(transaction);
	}

	// Copies of the records, so callers cannot change what gets mined
	getTransactions(): Transaction[] {
		return this.transactions.map((transaction) => ({ ...transaction }));
	}

	clear(): void {
		this.transactions = [];
	}
}

export { TransactionPool };
