#!/usr/bin/env node
/**
 * integration-hub CLI
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { startCommand } from './commands/start';
import { healthCommand } from './commands/health';

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf8'));
  return packageSchema.parse(raw).version;
}

const program = new Command();

program
  .name('integration-hub')
  .description('Marketplace integration hub')
  .version(readVersion());

program.addCommand(startCommand);
program.addCommand(healthCommand);

program.parse();
