import { createApp } from './app';
import { loadConfig } from './config';
import { Blockchain } from './blockchain';
import { NonceSearch } from './proofOfWork';

const config = loadConfig();

/**
 * Mines a genesis block with the configured difficulty and serves the ledger over HTTP.
 *
 * @param {number} httpPort The port number to listen on.
 */
const initHttpServer = (httpPort: number) => {
	const blockchain = new Blockchain({
		difficulty: config.difficulty,
		proofOfWork: new NonceSearch({ maxAttempts: config.maxNonceAttempts }),
	});

	console.log(`\nGenesis block mined: ${blockchain.getLastBlock().hash}`);

	const app = createApp({ blockchain });

	// Start HTTP server
	app.listen(httpPort, () => {
		console.log(`\nHTTP server running on port ${httpPort}`);
	});
};

initHttpServer(config.httpPort);
