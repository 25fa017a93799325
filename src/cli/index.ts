#!/usr/bin/env node

/**
 * Holdgate CLI Entry Point
 */

import { Command } from 'commander';
import { statsCommand } from './commands/stats';
import { auditCommand } from './commands/audit';
import { cacheCommand } from './commands/cache';
import { statusCommand } from './commands/status';
import { resetCommand } from './commands/reset';

const program = new Command();

program
  .name('holdgate')
  .description('Permission escalation and adaptive auto-approval for agent sessions')
  .version('1.0.0');

// View statistics
program.command('stats').description('View decision statistics').action(statsCommand);

// View audit trail
program
  .command('audit')
  .description('View decision audit trail')
  .option('-n, --lines <number>', 'Number of recent records to show', '50')
  .action(auditCommand);

// Inspect the learning cache
program
  .command('cache')
  .description('List learned (operation, scope) outcomes')
  .option('-m, --min-observed <number>', 'Only show entries observed more than N times', '0')
  .action(cacheCommand);

// Inspect one interaction
program
  .command('status <interactionId>')
  .description('Show the state and escalation tasks of an interaction')
  .action(statusCommand);

// Reset stored data
program
  .command('reset')
  .description('Reset statistics, learned outcomes or configuration')
  .action(resetCommand);

program.parse();
