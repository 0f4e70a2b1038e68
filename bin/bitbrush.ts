#!/usr/bin/env node
import { runCli } from '../src/cli';

process.exitCode = runCli(process.argv.slice(2), (message) => console.log(message));
