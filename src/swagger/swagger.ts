import swaggerJsDoc from 'swagger-jsdoc';
import swaggerUI from 'swagger-ui-express';

const options = {
	definition: {
		openapi: '3.0.0',
		info: {
			title: 'Hashledger APIs',
			version: '1.0.0',
			description: 'APIs for the Hashledger proof-of-work ledger',
		},
		servers: [
			{
				url: 'http://localhost:3000',
				description: 'Local Server',
			},
		],
	},
	apis: ['./src/containers/*.ts'],
};

const specs = swaggerJsDoc(options);

export { specs, swaggerUI };
