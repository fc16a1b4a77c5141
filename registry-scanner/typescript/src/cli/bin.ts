#!/usr/bin/env node
import { runCli } from './main.js';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
