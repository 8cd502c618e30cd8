#!/usr/bin/env tsx

/**
 * simplelang CLI - syntax checking for SimpleLang programs
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { tokensCommand } from './commands/tokens.js';

const program = new Command();

program.name('simplelang').description('CLI for SimpleLang syntax validation').version('0.1.0');

// Register commands
program.addCommand(checkCommand);
program.addCommand(tokensCommand);

// Parse arguments
await program.parseAsync();
