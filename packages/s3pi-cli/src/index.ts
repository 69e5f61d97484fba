#!/usr/bin/env node

/**
 * s3pi - publish Python distributions to an S3-hosted simple package index
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { registerPublishCommand } from './commands/publish.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('s3pi')
  .description('Package index manager for S3 hosted package indexes')
  .version(pkg.version);

registerPublishCommand(program);

await program.parseAsync();
