#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { runCli } from './commands';

runCli(hideBin(process.argv), {
	env: process.env,
	stdout: (line) => process.stdout.write(`${line}\n`),
	stderr: (line) => process.stderr.write(`${line}\n`),
}).then((exitCode) => {
	process.exitCode = exitCode;
}, (error: unknown) => {
	process.stderr.write(`${String(error)}\n`);
	process.exitCode = 1;
});
