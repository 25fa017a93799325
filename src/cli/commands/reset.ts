/**
 * Holdgate Reset Command
 * Clears counters, learned outcomes and/or configuration. Held interactions and
 * the audit trail are never touched.
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { StatsTracker } from '../../storage/StatsTracker';
import { ConfigStore } from '../../storage/ConfigStore';
import { DecisionCache, FileDecisionCacheStore } from '../../storage/DecisionCache';
import { HOLDGATE_DATA_DIR, logger } from '../../core/Logger';

export type ResetTarget = 'stats' | 'cache' | 'config';

const RESET_TARGETS: readonly ResetTarget[] = ['stats', 'cache', 'config'];

const TARGET_LABELS: Record<ResetTarget, string> = {
  stats: 'Decision statistics (stats.json)',
  cache: 'Learned outcomes (cache.json)',
  config: 'Configuration, back to defaults (config.json)',
};

export async function resetData(
  targets: ResetTarget[],
  dataDir: string = HOLDGATE_DATA_DIR
): Promise<void> {
  for (const target of targets) {
    switch (target) {
      case 'stats':
        await new StatsTracker(dataDir).reset();
        break;
      case 'cache':
        await new DecisionCache(new FileDecisionCacheStore(dataDir)).clear();
        logger.info('Decision cache cleared');
        break;
      case 'config':
        await new ConfigStore(dataDir).reset();
        break;
    }
  }
}

export async function resetCommand(): Promise<void> {
  console.log('');
  console.log(chalk.bold.yellow('⚠️  Reset Holdgate Data'));
  console.log('');

  try {
    const { targets } = await inquirer.prompt<{ targets: ResetTarget[] }>([
      {
        type: 'checkbox',
        name: 'targets',
        message: 'What should be reset?',
        choices: RESET_TARGETS.map((value) => ({
          name: TARGET_LABELS[value],
          value,
          checked: value === 'stats',
        })),
      },
    ]);

    if (targets.length === 0) {
      console.log(chalk.dim('Nothing selected'));
      console.log('');
      return;
    }

    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: chalk.red(`Are you sure you want to reset: ${targets.join(', ')}?`),
        default: false,
      },
    ]);

    if (confirm) {
      await resetData(targets);
      console.log(chalk.green(`✅ Reset ${targets.join(', ')}`));
      console.log('');
    } else {
      console.log(chalk.dim('Reset cancelled'));
      console.log('');
    }
  } catch (error) {
    console.error(chalk.red('❌ Failed to reset:'), error);
    logger.error('Reset command failed', { error });
    process.exit(1);
  }
}
