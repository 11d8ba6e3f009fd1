import { parseArgs } from 'node:util';
import { type CliCommand, REPORT_TASK_ORDER, ReportTask } from './tasks.types.js';

const TASK_FLAGS: Record<ReportTask, { short?: string; description: string }> = {
  [ReportTask.CAPACITY]: { short: 'c', description: 'Show capacity summary table' },
  [ReportTask.ABSENCES]: { short: 'a', description: 'Show upcoming absences grouped by person' },
  [ReportTask.L1]: { description: 'Show upcoming L1 assignments' },
  [ReportTask.L2]: { description: 'Show upcoming L2 assignments' },
  [ReportTask.INTEREST]: { short: 'i', description: 'Show absences for people of interest and the manager' },
  [ReportTask.SLACK]: { short: 's', description: 'Update the team Slack canvases' },
  [ReportTask.FULL]: { short: 'f', description: 'Show the full sprint report' },
  [ReportTask.XMAS]: { short: 'x', description: 'Show the Christmas rota as CSV' },
  [ReportTask.BANK_HOLIDAYS]: { short: 'b', description: 'Show bank holidays for the next 12 months' },
  [ReportTask.WARNING]: { short: 'w', description: 'Warn when someone is on call while absent' },
  [ReportTask.DEBUG]: { short: 'd', description: 'Dump cached API responses' },
  [ReportTask.CALENDAR]: { short: 'k', description: 'Show a two-week calendar of team availability' },
};

export const USAGE = [
  'Usage: sprint-planner <team> [options]',
  '',
  'Options:',
  ...REPORT_TASK_ORDER.map((task) => {
    const { short, description } = TASK_FLAGS[task];
    const flag = `${short ? `-${short}, ` : '    '}--${task}`;
    return `  ${flag.padEnd(18)}${description}`;
  }),
  `  ${'-p, --purge'.padEnd(18)}Delete all cached API responses and exit`,
  `  ${'-h, --help'.padEnd(18)}Show this help`,
].join('\n');

/** Turns argv (without the node and script entries) into a command. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const options: Record<string, { type: 'boolean'; short?: string }> = {
    purge: { type: 'boolean', short: 'p' },
    help: { type: 'boolean', short: 'h' },
  };
  for (const task of REPORT_TASK_ORDER) {
    const { short } = TASK_FLAGS[task];
    // parseArgs rejects an explicit `short: undefined`
    options[task] = short ? { type: 'boolean', short } : { type: 'boolean' };
  }

  let values: Record<string, unknown>;
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({ args: [...argv], options, allowPositionals: true, strict: true }));
  } catch (error) {
    // unknown flags land here
    return { command: 'help', reason: error instanceof Error ? error.message : String(error) };
  }

  if (values.help) {
    return { command: 'help' };
  }
  if (values.purge) {
    return { command: 'purge' };
  }

  const teamName = positionals[0];
  if (!teamName) {
    return { command: 'help', reason: 'A team name is required' };
  }

  const tasks = REPORT_TASK_ORDER.filter((task) => values[task] === true);
  if (tasks.length === 0) {
    return { command: 'help', reason: 'No output option specified' };
  }

  return { command: 'run', teamName, tasks };
}
