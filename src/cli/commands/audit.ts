/**
 * Holdgate Audit Command
 */

import chalk from 'chalk';
import { DecisionLog, DecisionRecord } from '../../storage/DecisionLog';
import { logger } from '../../core/Logger';

const GREEN_EVENTS: ReadonlyArray<DecisionRecord['event']> = [
  'AUTO_APPROVED',
  'CONDITIONAL_APPROVED',
  'APPROVED',
];

export async function auditCommand(options: { lines: string }): Promise<void> {
  console.log('');
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log(chalk.bold.cyan('   📋 Holdgate Audit Trail'));
  console.log(chalk.bold.cyan('═'.repeat(80)));
  console.log('');

  try {
    const log = new DecisionLog();
    const lineCount = parseInt(options.lines, 10);
    const records = await log.readLast(lineCount);

    if (records.length === 0) {
      console.log(chalk.yellow('No decisions recorded yet.'));
      console.log('');
      return;
    }

    console.log(chalk.dim(`Showing last ${records.length} record(s):`));
    console.log('');

    records.forEach((record) => {
      const timestamp = new Date(record.timestamp).toLocaleTimeString();
      const eventColor = GREEN_EVENTS.includes(record.event)
        ? chalk.green
        : record.event === 'ESCALATED' || record.event === 'RE_ESCALATED'
          ? chalk.yellow
          : chalk.red;

      const eventText = eventColor(record.event.padEnd(20));
      const tierText = record.tier !== undefined ? chalk.dim(` t${record.tier}`) : '';
      const actorText = record.actor ? chalk.dim(` (${record.actor})`) : '';
      const reasonText = record.reason ? chalk.dim(` - ${record.reason}`) : '';

      console.log(
        `${chalk.dim(timestamp)} | ${chalk.cyan(`${record.operation} ${record.scope}`.padEnd(30))} | ${eventText} | ${record.session}${tierText}${actorText}${reasonText}`
      );
    });

    console.log('');
    console.log(chalk.dim(`Audit log: ${log.getPath()}`));
    console.log('');
  } catch (error) {
    console.error(chalk.red('❌ Failed to load audit trail:'), error);
    logger.error('Audit command failed', { error });
    process.exit(1);
  }
}
