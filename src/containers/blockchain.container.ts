import { z } from 'zod';
import express, { Request, Response, Router } from 'express';
import { Blockchain } from '../blockchain';
import { toBlockJSON } from '../display';

const TransactionRequestSchema = z.object({
	sender: z.string(),
	receiver: z.string(),
	amount: z.number(),
});

/**
 * Creates the router exposing a blockchain over HTTP.
 *
 * @param blockchain The ledger served by the routes.
 */
const createBlockchainRouter = ({ blockchain }: { blockchain: Blockchain }): Router => {
	/**
	 * @swagger
	 * tags:
	 *   - name: Blockchain
	 *     description: API endpoints for the blockchain
	 */
	const router = express.Router();

	/**
	 * @swagger
	 * /blockchain/blocks:
	 *   get:
	 *     summary: Get blockchain
	 *     tags: [Blockchain]
	 *     responses:
	 *       '200':
	 *         description: Success response.
	 */
	router.get('/blocks', (req: Request, res: Response) => {
		res.status(200).json(blockchain.getBlockchain().map(toBlockJSON));
	});

	/**
	 * @swagger
	 * /blockchain/blocks/{index}:
	 *   get:
	 *     summary: Get block by index
	 *     tags: [Blockchain]
	 *     parameters:
	 *       - name: index
	 *         in: path
	 *         required: true
	 *         description: Position of the block in the chain
	 *         schema:
	 *           type: integer
	 *     responses:
	 *       '200':
	 *         description: Success response.
	 *       '404':
	 *         description: Block not found.
	 */
	router.get('/blocks/:index', (req: Request, res: Response) => {
		const { index } = req.params;
		const block = /^\d+$/.test(index) ? blockchain.getBlock(parseInt(index, 10)) : undefined;

		if (!block) {
			res.status(404).json({ error: `Block ${index} not found` });
			return;
		}

		res.status(200).json(toBlockJSON(block));
	});

	/**
	 * @swagger
	 * /blockchain/transaction-pool:
	 *   get:
	 *     summary: Get pending transactions
	 *     tags: [Blockchain]
	 *     responses:
	 *       '200':
	 *         description: Success response.
	 */
	router.get('/transaction-pool', (req: Request, res: Response) => {
		res.status(200).json(blockchain.getPendingTransactions());
	});

	/**
	 * @swagger
	 * /blockchain/transactions:
	 *   post:
	 *     summary: Submit a transaction to the pending pool
	 *     tags: [Blockchain]
	 *     requestBody:
	 *       required: true
	 *       content:
	 *         application/json:
	 *           schema:
	 *             type: object
	 *             properties:
	 *               sender:
	 *                 type: string
	 *               receiver:
	 *                 type: string
	 *               amount:
	 *                 type: number
	 *             required:
	 *               - sender
	 *               - receiver
	 *               - amount
	 *     responses:
	 *       '201':
	 *         description: Created.
	 *       '400':
	 *         description: Bad Request.
	 */
	router.post('/transactions', (req: Request, res: Response) => {
		const parsed = TransactionRequestSchema.safeParse(req.body);

		if (!parsed.success) {
			res.status(400).json({ error: 'Invalid request body', issues: parsed.error.issues });
			return;
		}

		const result = blockchain.submitTransaction(parsed.data);

		if (!result.ok) {
			res.status(400).json({ error: result.error, reason: result.reason });
			return;
		}

		res.status(201).json(result.transaction);
	});

	/**
	 * @swagger
	 * /blockchain/mine:
	 *   post:
	 *     summary: Mine the pending transactions into a new block
	 *     tags: [Blockchain]
	 *     responses:
	 *       '201':
	 *         description: Created.
	 *       '409':
	 *         description: No pending transactions.
	 *       '503':
	 *         description: Mining aborted after the attempt limit.
	 */
	router.post('/mine', (req: Request, res: Response) => {
		const result = blockchain.minePendingTransactions();

		if (result.ok) {
			res.status(201).json(toBlockJSON(result.block));
			return;
		}

		if (result.error === 'nothing-to-mine') {
			res.status(409).json({ error: result.error });
			return;
		}

		res.status(503).json({ error: result.error, attempts: result.attempts });
	});

	/**
	 * @swagger
	 * /blockchain/validate:
	 *   get:
	 *     summary: Validate the blockchain
	 *     tags: [Blockchain]
	 *     responses:
	 *       '200':
	 *         description: Success response.
	 */
	router.get('/validate', (req: Request, res: Response) => {
		res.status(200).json(blockchain.validateChain());
	});

	return router;
};

export { createBlockchainRouter };
