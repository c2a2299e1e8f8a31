import { Block } from '../block';

const blockData = () => ({
	index: 1,
	transactions: [{ sender: 'Alice', receiver: 'Bob', amount: 1.5 }],
	timestamp: 1700000000000,
	previousHash: '0',
});

describe('Block', () => {
	it('defaults the nonce to 0', () => {
		expect(new Block(blockData()).nonce).toBe(0);
	});

	it('computes its hash on construction', () => {
		const block = new Block(blockData());

		expect(block.hash).toBe('810eac29252bd8f39545eccbcc31b172d2bf9c25f18f7d191bf3098021744d2d');
	});

	it('returns the same hash on repeated calls', () => {
		const block = new Block(blockData());

		expect(block.calculateHash()).toBe(block.calculateHash());
		expect(block.calculateHash()).toBe(block.hash);
	});

	it('returns a 64 character lowercase hex digest', () => {
		expect(new Block(blockData()).hash).toMatch(/^[0-9a-f]{64}$/);
	});

	it('is insensitive to key order inside transaction records', () => {
		const reordered = new Block({
			...blockData(),
			transactions: [{ amount: 1.5, receiver: 'Bob', sender: 'Alice' }],
		});

		expect(reordered.hash).toBe(new Block(blockData()).hash);
	});

	it('recomputes the hash from the current nonce', () => {
		const block = new Block(blockData());
		const initial = block.calculateHash();

		block.nonce = 42;

		expect(block.calculateHash()).toBe(
			'00148de8be86a671e617fc9105d879a59637114a97072b8dfa34930a16abc8f6'
		);
		expect(block.calculateHash()).not.toBe(initial);
	});

	it('depends on transaction order', () => {
		const transactions = [
			{ sender: 'Alice', receiver: 'Bob', amount: 1.5 },
			{ sender: 'Bob', receiver: 'Charlie', amount: 0.8 },
		];
		const forward = new Block({ ...blockData(), transactions });
		const backward = new Block({ ...blockData(), transactions: [...transactions].reverse() });

		expect(forward.hash).not.toBe(backward.hash);
	});
});
