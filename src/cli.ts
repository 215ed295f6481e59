#!/usr/bin/env node
import { runCli } from './runs/command.js';

process.exitCode = runCli(process.argv.slice(2));
