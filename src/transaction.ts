interface Transaction {
	sender: string;
	receiver: string;
	amount: number;
}

// Issuance record carried by every genesis block; it never goes through submission
const GENESIS_TRANSACTION: Readonly<Transaction> = {
	sender: 'Genesis',
	receiver: 'Network',
	amount: 0,
};

/**
 * Checks a transaction before it is accepted into the pending pool.
 *
 * @param sender Name of the sender.
 * @param receiver Name of the receiver.
 * @param amount Amount being transferred.
 *
 * @returns null if the transaction is valid, otherwise the reason it was rejected.
 */
const validateTransaction = ({ sender, receiver, amount }: Transaction): string | null => {
	if (typeof sender !== 'string' || sender.length === 0) return 'Sender is required';

	if (typeof receiver !== 'string' || receiver.length === 0) return 'Receiver is required';

	if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0)
		return 'Amount must be a number greater than 0';

	return null;
};

/**
 * Creates a new transaction record with its fields in a fixed order.
 */
const createTransaction = ({ sender, receiver, amount }: Transaction): Transaction => {
	return { sender, receiver, amount };
};

export type { Transaction };
export { GENESIS_TRANSACTION, validateTransaction, createTransaction };
