#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './core/cli.js';

await runCli(process.argv.slice(2));
