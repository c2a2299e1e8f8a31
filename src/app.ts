import cors from 'cors';
import express, { Express, Request, Response } from 'express';
import { Blockchain } from './blockchain';
import { specs, swaggerUI } from './swagger/swagger';
import { createBlockchainRouter } from './containers/blockchain.container';

/**
 * Builds the HTTP application for a blockchain.
 *
 * - /blockchain: ledger routes (blocks, transaction pool, submit, mine, validate)
 * - /api-docs: Swagger UI, with the raw document at /api-docs.json
 */
const createApp = ({ blockchain }: { blockchain: Blockchain }): Express => {
	const app = express();

	// Middleware
	app.use(cors());
	app.use(express.json());
	app.use(express.urlencoded({ extended: true }));

	// API Routes
	app.use('/blockchain', createBlockchainRouter({ blockchain }));

	// Docs
	app.get('/api-docs.json', (req: Request, res: Response) => {
		res.status(200).json(specs);
	});
	app.use('/api-docs', swaggerUI.serve, swaggerUI.setup(specs));

	return app;
};

export { createApp };
