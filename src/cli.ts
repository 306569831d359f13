#!/usr/bin/env node
import { main } from './commands.js';

process.exit(main(process.argv.slice(2)));
