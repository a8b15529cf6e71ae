#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './run-cli.js';

process.exitCode = runCli(process.argv.slice(2), process.env);
