#!/usr/bin/env node
import { run } from './cli/program.js';

process.exitCode = run(process.argv.slice(2));
