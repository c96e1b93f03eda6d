#!/usr/bin/env node
import { errorMessage } from '../core/errors.js';
import { run } from './index.js';

run().then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		console.error(`error: ${errorMessage(err)}`);
		process.exitCode = 1;
	},
);
