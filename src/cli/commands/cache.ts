/**
 * Holdgate Cache Command
 */

import chalk from 'chalk';
import { DecisionCache, FileDecisionCacheStore, qualifiesForAutoApprove } from '../../storage/DecisionCache';
import { logger } from '../../core/Logger';

export async function cacheCommand(options: { minObserved: string }): Promise<void> {
  console.log('');
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log(chalk.bold.cyan('   🧠 Holdgate Learned Outcomes'));
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log('');

  try {
    const store = new FileDecisionCacheStore();
    const cache = new DecisionCache(store);
    await cache.load();

    const minObserved = parseInt(options.minObserved, 10) || 0;
    const entries = (await cache.entries())
      .filter((e) => e.observedCount > minObserved)
      .sort((a, b) => b.observedCount - a.observedCount);

    if (entries.length === 0) {
      console.log(chalk.yellow('Nothing learned yet.'));
      console.log('');
      return;
    }

    entries.forEach((entry) => {
      const rate = `${(entry.successRate * 100).toFixed(1)}%`.padStart(7);
      const badge = qualifiesForAutoApprove(entry) ? chalk.green('auto') : chalk.dim('    ');
      console.log(
        `${badge} | ${chalk.cyan(`${entry.operation} ${entry.scope}`.padEnd(40))} | ` +
          `${entry.successCount}/${entry.observedCount} ${rate} | ` +
          chalk.dim(new Date(entry.lastUsedAt).toLocaleString())
      );
    });

    console.log('');
    console.log(chalk.dim(`Cache file: ${store.getPath()}`));
    console.log('');
  } catch (error) {
    console.error(chalk.red('❌ Failed to load decision cache:'), error);
    logger.error('Cache command failed', { error });
    process.exit(1);
  }
}
