#!/usr/bin/env node
import { config } from 'dotenv';
import { run } from './cli.js';

config();

process.exitCode = await run(process.argv.slice(2));
