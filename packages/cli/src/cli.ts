#!/usr/bin/env node
import { main } from './lib.js';

process.exitCode = main(process.argv.slice(2));
