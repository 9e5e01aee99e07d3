/**
 * Bandit Lab CLI - Welcome Screen
 */

import chalk from 'chalk';
import { ExperimentSettings } from '../../utils/config';

export function displayWelcome(settings: ExperimentSettings): void {
  const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}            ${chalk.magenta.bold('Bandit Lab')} ${chalk.gray('- Multi-Armed Bandit Policy Comparison')}          ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════════════╝')}

${chalk.cyan.bold('Experiment:')}
  ${chalk.white('•')} ${chalk.gray('True means:')}  ${chalk.white(`[${settings.trueMeans.join(', ')}]`)}
  ${chalk.white('•')} ${chalk.gray('Trials:')}      ${chalk.white(settings.numTrials.toString())}
  ${chalk.white('•')} ${chalk.gray('Epsilon:')}     ${chalk.white(settings.epsilon.toString())}
  ${chalk.white('•')} ${chalk.gray('Seed:')}        ${chalk.white(settings.seed ?? 'unseeded')}

${chalk.gray('─'.repeat(70))}
`;

  console.log(banner);
}
