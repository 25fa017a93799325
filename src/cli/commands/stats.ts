/**
 * Holdgate Stats Command
 */

import chalk from 'chalk';
import { StatsTracker } from '../../storage/StatsTracker';
import { logger } from '../../core/Logger';

function pct(part: number, total: number): string {
  return total === 0 ? '0.0' : ((part / total) * 100).toFixed(1);
}

export async function statsCommand(): Promise<void> {
  console.log('');
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log(chalk.bold.cyan('   📊 Holdgate Statistics'));
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log('');

  try {
    const stats = await new StatsTracker().load();

    if (stats.totalDecisions === 0) {
      console.log(chalk.yellow('No activity recorded yet.'));
      console.log('');
      return;
    }

    const total = stats.totalDecisions;
    console.log(chalk.bold('Total Decisions:'), chalk.white(total.toString()));
    console.log('');

    console.log(chalk.bold('Routing:'));
    console.log(
      `  ${chalk.green('✅ Auto-approved:')}        ${stats.autoApproved.toString().padStart(6)} (${pct(stats.autoApproved, total)}%) - learned`
    );
    console.log(
      `  ${chalk.yellow('🛡  Conditional:')}          ${stats.conditionalApproved.toString().padStart(6)} (${pct(stats.conditionalApproved, total)}%) - with safeguards`
    );
    console.log(
      `  ${chalk.red('⏸  Escalated:')}            ${stats.escalated.toString().padStart(6)} (${pct(stats.escalated, total)}%) - to a reviewer`
    );
    console.log(
      `  ${chalk.red('🚫 Admission denied:')}     ${stats.admissionDenied.toString().padStart(6)} (${pct(stats.admissionDenied, total)}%)`
    );
    console.log('');

    console.log(chalk.bold('Resolutions:'));
    console.log(`  ${chalk.green('✅ Approved:')}   ${stats.approved.toString().padStart(6)} - by reviewer`);
    console.log(`  ${chalk.red('❌ Denied:')}     ${stats.denied.toString().padStart(6)} - by reviewer`);
    console.log(`  ${chalk.red('⌛ Exhausted:')}  ${stats.exhausted.toString().padStart(6)} - no tier answered`);
    console.log(`  ${chalk.yellow('↗  Re-escalated:')} ${stats.reEscalated.toString().padStart(3)} - after a timeout`);
    console.log('');

    console.log(
      chalk.bold('Average Resolution Time:'),
      chalk.white(`${(stats.avgResolutionTime / 1000).toFixed(1)}s`)
    );
    console.log('');

    console.log(chalk.dim(`Last Reset: ${new Date(stats.lastReset).toLocaleString()}`));
    console.log('');
  } catch (error) {
    console.error(chalk.red('❌ Failed to load statistics:'), error);
    logger.error('Stats command failed', { error });
    process.exit(1);
  }
}
