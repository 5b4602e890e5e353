#!/usr/bin/env node

import { buildProgram } from './program';
import { ConfigError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

buildProgram()
	.parseAsync(process.argv)
	.catch((error: unknown) => {
		if (error instanceof ConfigError) {
			logger.error(`Invalid configuration: ${error.message}`);
			process.exitCode = 2;
			return;
		}
		logger.error(describeError(error));
		process.exitCode = 1;
	});
