#!/usr/bin/env -S npx tsx
import { runCli } from './cli.js';

await runCli();
