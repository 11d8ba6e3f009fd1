#!/usr/bin/env node
import 'dotenv/config';

import fs from 'fs';
import { pathToFileURL } from 'url';
import { BambooHrClient } from './bamboohr/bamboohr.client.js';
import { USAGE, parseCliArgs } from './cli.js';
import {
  BAMBOO_HR_API_KEY,
  BAMBOO_HR_SUBDOMAIN,
  ConfigurationError,
  JIRA_API_KEY,
  JIRA_BASE_URL,
  PAGERDUTY_API_KEY,
  PLANNER_CONFIG_PATH,
  validateEnvironmentVariables,
} from './config.js';
import { ApiResponseCache } from './database/api-response-cache.js';
import { openDatabase } from './database/db.js';
import { DateHolidaysProvider } from './holidays/public-holidays.js';
import { JiraClient } from './jira/jira.client.js';
import { Logger } from './logger.js';
import { PagerDutyClient } from './pagerduty/pagerduty.client.js';
import {
  renderAbsences,
  renderAbsenceWarnings,
  renderPeopleOfInterestAbsences,
} from './reports/reports.absences.js';
import { renderNext12MonthsBankHolidays } from './reports/reports.bank-holidays.js';
import { buildCalendarData, renderCalendar } from './reports/reports.calendar.js';
import { renderCapacityTable } from './reports/reports.capacity.js';
import { renderCacheDump } from './reports/reports.debug.js';
import { renderL1Assignments, renderL2Assignments } from './reports/reports.oncall.js';
import { renderSprintData } from './reports/reports.sprint.js';
import type { ReportContext } from './reports/reports.types.js';
import { collectXmasRota, renderXmasRotaCsv } from './reports/reports.xmas.js';
import { findTeam, loadPlannerConfig } from './roster/roster.loader.js';
import type { PlannerConfig, Team } from './roster/roster.types.js';
import { sendSprintDataToSlack } from './slack/slack.canvas.js';
import { buildSprintReport, collectSprintInputs, type SprintReport } from './sprint/sprint.data.js';
import type { SprintSources } from './sprint/sprint.sources.js';
import { EPIC_TASKS, ReportTask, SPRINT_REPORT_TASKS } from './tasks.types.js';
import { today } from './utils/date.js';

const logger = new Logger('main');

/** What a task may use. The sprint report is only built when some task needs it. */
export interface TaskRuntime {
  config: PlannerConfig;
  team: Team;
  cache: ApiResponseCache;
  sources: SprintSources;
  context: ReportContext;
  getReport: () => Promise<SprintReport>;
}

export interface TaskResult {
  output?: string;
  /** False when the task ran but part of it failed. */
  ok: boolean;
}

export function createSources(config: PlannerConfig, cache: ApiResponseCache): SprintSources {
  return {
    absences: new BambooHrClient({ apiKey: BAMBOO_HR_API_KEY ?? '', subdomain: BAMBOO_HR_SUBDOMAIN ?? '' }, cache),
    onCall: new PagerDutyClient({ apiKey: PAGERDUTY_API_KEY ?? '' }, cache),
    epics:
      JIRA_BASE_URL && JIRA_API_KEY
        ? new JiraClient(
            { baseUrl: JIRA_BASE_URL, apiKey: JIRA_API_KEY, projectKeys: config.teams.map((t) => t.jiraKey) },
            cache,
          )
        : undefined,
  };
}

export async function runTask(task: ReportTask, runtime: TaskRuntime): Promise<TaskResult> {
  const { context } = runtime;

  switch (task) {
    case ReportTask.CAPACITY:
      return { ok: true, output: renderCapacityTable(await runtime.getReport()) };
    case ReportTask.ABSENCES:
      return { ok: true, output: renderAbsences(await runtime.getReport()) };
    case ReportTask.L1:
      return { ok: true, output: renderL1Assignments(await runtime.getReport(), context) };
    case ReportTask.L2:
      return { ok: true, output: renderL2Assignments(await runtime.getReport(), context) };
    case ReportTask.INTEREST:
      return { ok: true, output: renderPeopleOfInterestAbsences(await runtime.getReport()) };
    case ReportTask.SLACK: {
      const results = await sendSprintDataToSlack(await runtime.getReport(), context);
      if (results.length === 0) {
        logger.warn(`No Slack canvases configured for ${runtime.team.name}`);
      }
      const failed = results.filter((r) => !r.ok);
      return {
        ok: failed.length === 0,
        output: failed.length > 0 ? failed.map((r) => `Failed to update ${r.canvas} canvas: ${r.error}`).join('\n') : undefined,
      };
    }
    case ReportTask.FULL:
      return { ok: true, output: renderSprintData(await runtime.getReport(), context) };
    case ReportTask.XMAS:
      return {
        ok: true,
        output: renderXmasRotaCsv(await collectXmasRota(runtime.sources.absences, runtime.config.settings.xmasRota)),
      };
    case ReportTask.BANK_HOLIDAYS:
      return { ok: true, output: renderNext12MonthsBankHolidays(context) };
    case ReportTask.WARNING:
      return { ok: true, output: renderAbsenceWarnings(await runtime.getReport()) };
    case ReportTask.DEBUG:
      return { ok: true, output: renderCacheDump(runtime.cache.entries()) };
    case ReportTask.CALENDAR:
      return { ok: true, output: renderCalendar(buildCalendarData(await runtime.getReport(), context)) };
    default: {
      const unhandled: never = task;
      throw new Error(`Unhandled task: ${String(unhandled)}`);
    }
  }
}

function write(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}

/** Runs the CLI and returns the process exit code. */
export async function main(argv: readonly string[]): Promise<number> {
  const command = parseCliArgs(argv);

  if (command.command === 'help') {
    if (command.reason) {
      write(command.reason);
    }
    write(USAGE);
    return command.reason ? 1 : 0;
  }

  const db = openDatabase();
  try {
    if (command.command === 'purge') {
      new ApiResponseCache(db, { timeoutSeconds: 0 }).invalidate();
      write('API cache purged.');
      return 0;
    }

    const config = loadPlannerConfig(PLANNER_CONFIG_PATH);
    const team = findTeam(config, command.teamName);
    if (!team) {
      write(`Team '${command.teamName}' not found. Available teams: ${config.teams.map((t) => t.name).join(', ')}`);
      return 1;
    }

    const needsSources = command.tasks.some((t) => SPRINT_REPORT_TASKS.has(t) || t === ReportTask.XMAS);
    if (needsSources) {
      const env = validateEnvironmentVariables({
        requireJira: command.tasks.some((t) => EPIC_TASKS.has(t)),
        requireSlack: command.tasks.includes(ReportTask.SLACK),
      });
      if (!env.valid) {
        throw new ConfigurationError(`Missing required environment variables: ${env.missing.join(', ')}`, env.missing);
      }
    }

    const cache = new ApiResponseCache(db, { timeoutSeconds: config.settings.apiCacheTimeoutSeconds });
    const sources = createSources(config, cache);
    const now = today();
    const context: ReportContext = {
      today: now,
      holidays: new DateHolidaysProvider(),
      bankHolidayRegions: config.settings.bankHolidayRegions,
    };

    let report: Promise<SprintReport> | undefined;
    const getReport = () => {
      report ??= collectSprintInputs(team, config.settings, sources, now).then((inputs) =>
        buildSprintReport(team, config.settings, inputs, now),
      );
      return report;
    };

    let ok = true;
    for (const task of command.tasks) {
      const result = await runTask(task, { config, team, cache, sources, context, getReport });
      if (result.output !== undefined) {
        write(result.output);
      }
      ok &&= result.ok;
    }
    return ok ? 0 : 1;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : 'Unknown error', error);
    return 1;
  } finally {
    db.close();
  }
}

// For direct execution, including through the `sprint-planner` bin link
if (process.argv[1] && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Unexpected failure', error);
      process.exitCode = 1;
    });
}
