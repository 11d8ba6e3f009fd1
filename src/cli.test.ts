import { describe, expect, it } from 'vitest';
import { parseCliArgs, USAGE } from './cli.js';
import { ReportTask } from './tasks.types.js';

describe('parseCliArgs', () => {
  it('runs the selected tasks in their fixed order', () => {
    expect(parseCliArgs(['Platform', '--calendar', '-c', '--l2', '-a'])).toEqual({
      command: 'run',
      teamName: 'Platform',
      tasks: [ReportTask.CAPACITY, ReportTask.ABSENCES, ReportTask.L2, ReportTask.CALENDAR],
    });
  });

  it('accepts grouped short flags', () => {
    expect(parseCliArgs(['-bw', 'Payments'])).toEqual({
      command: 'run',
      teamName: 'Payments',
      tasks: [ReportTask.BANK_HOLIDAYS, ReportTask.WARNING],
    });
  });

  it('purges without a team', () => {
    expect(parseCliArgs(['--purge'])).toEqual({ command: 'purge' });
    expect(parseCliArgs(['Platform', '-p', '-c'])).toEqual({ command: 'purge' });
  });

  it('shows help when asked', () => {
    expect(parseCliArgs(['-h'])).toEqual({ command: 'help' });
  });

  it('asks for a team name', () => {
    expect(parseCliArgs(['-c'])).toEqual({ command: 'help', reason: 'A team name is required' });
  });

  it('asks for at least one output option', () => {
    expect(parseCliArgs(['Platform'])).toEqual({ command: 'help', reason: 'No output option specified' });
  });

  it('rejects unknown flags', () => {
    const command = parseCliArgs(['Platform', '--nope']);

    expect(command.command).toBe('help');
    expect(command.command === 'help' && command.reason).toMatch(/--nope/);
  });
});

describe('USAGE', () => {
  it('lists every option', () => {
    const lines = USAGE.split('\n');

    expect(lines[0]).toBe('Usage: sprint-planner <team> [options]');
    expect(lines).toContain('  -c, --capacity    Show capacity summary table');
    expect(lines).toContain('      --l1          Show upcoming L1 assignments');
    expect(lines).toContain('  -p, --purge       Delete all cached API responses and exit');
  });
});
