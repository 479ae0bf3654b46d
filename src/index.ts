#!/usr/bin/env node
import dotenv from 'dotenv';
// Silence dotenv v17+ stdout output to prevent corrupting Pino's JSON log stream
dotenv.config({ quiet: true });

import { run } from './cli';

void run(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
});
