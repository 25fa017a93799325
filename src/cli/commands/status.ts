/**
 * Holdgate Status Command
 */

import chalk from 'chalk';
import { FileDecisionStore } from '../../storage/DecisionStore';
import { logger } from '../../core/Logger';

export async function statusCommand(interactionId: string): Promise<void> {
  try {
    const store = new FileDecisionStore();
    await store.load();

    const interaction = await store.getInteraction(interactionId);
    if (!interaction) {
      console.log(chalk.yellow(`No interaction with id ${interactionId}`));
      process.exit(1);
    }

    console.log('');
    console.log(chalk.bold.cyan('📦 Operation:'), chalk.white(`${interaction.operation} ${interaction.scope}`));
    console.log(chalk.bold.cyan('🔑 Session:'), chalk.white(interaction.session));
    console.log(
      chalk.bold.cyan('⚠️  Risk:'),
      chalk.yellow(`${interaction.riskScore} (confidence ${interaction.confidence})`)
    );
    console.log(chalk.bold.cyan('📍 Status:'), chalk.white(interaction.status));
    if (interaction.tier !== undefined) {
      console.log(
        chalk.bold.cyan('🪜 Tier:'),
        chalk.white(`${interaction.tier} → ${interaction.escalationTarget ?? '?'}`),
        chalk.dim(`(${interaction.escalationCount} re-escalation(s))`)
      );
    }
    if (interaction.resolution) {
      console.log(
        chalk.bold.cyan('✔  Resolution:'),
        chalk.white(interaction.resolution),
        chalk.dim(`${interaction.reasonCode ?? ''} by ${interaction.resolvedBy ?? '?'}`)
      );
    }

    const tasks = await store.listTasks(interactionId);
    if (tasks.length > 0) {
      console.log('');
      console.log(chalk.bold('Escalation tasks:'));
      tasks.forEach((task) => {
        console.log(
          `  ${chalk.dim(task.id)} | tier ${task.tier} | p${task.priority} | ${task.target.padEnd(20)} | ` +
            `${task.status.padEnd(9)} | deadline ${new Date(task.deadline).toLocaleString()}`
        );
      });
    }
    console.log('');
  } catch (error) {
    console.error(chalk.red('❌ Failed to load interaction:'), error);
    logger.error('Status command failed', { error });
    process.exit(1);
  }
}
