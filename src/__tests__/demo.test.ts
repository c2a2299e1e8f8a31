import { runDemo } from '../demo';

describe('runDemo', () => {
	it('detects tampering with block 1', () => {
		const logger = { log: jest.fn(), error: jest.fn() };

		const { original, tampered } = runDemo({ difficulty: 1, logger });

		expect(original).toEqual({ valid: true });
		expect(tampered).toEqual({
			valid: false,
			error: 'tamper-detected',
			index: 1,
			reason: 'hash-mismatch',
		});
	});

	it('prints the mined blocks', () => {
		const logger = { log: jest.fn(), error: jest.fn() };

		runDemo({ difficulty: 1, logger });

		expect(logger.log).toHaveBeenCalledWith('\nBlock 1 successfully mined!');
		expect(logger.log).toHaveBeenCalledWith('\nBlock 2 successfully mined!');
		expect(logger.log).toHaveBeenCalledWith('Is chain valid? true');
		expect(logger.log).toHaveBeenCalledWith('Is chain valid? false');
		expect(logger.error).toHaveBeenCalledWith('\nBlock 1 has been tampered!');
	});
});
