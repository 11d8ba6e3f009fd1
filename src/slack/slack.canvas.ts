import type { WebClient } from '@slack/web-api';
import { Logger } from '../logger.js';
import { renderAbsencesAndOnCall, renderCapacityCanvas, renderSupport } from '../reports/reports.canvases.js';
import type { ReportContext } from '../reports/reports.types.js';
import type { CanvasTargets } from '../roster/roster.types.js';
import type { SprintReport } from '../sprint/sprint.data.js';
import { getSlackClient } from './slack.client.js';

const logger = new Logger('slack-canvas');

export type TeamCanvas = keyof CanvasTargets;

export interface CanvasUpdateResult {
  canvas: TeamCanvas;
  canvasId: string;
  ok: boolean;
  error?: string;
}

/** Canvas text is posted as one preformatted block so the tables keep their alignment. */
export function toCanvasMarkdown(content: string): string {
  return `\`\`\`\n${content}\n\`\`\``;
}

/** Replaces the whole canvas with `content`. */
export async function updateCanvas(canvasId: string, content: string, client: WebClient = getSlackClient()) {
  return client.canvases.edit({
    canvas_id: canvasId,
    changes: [
      {
        operation: 'replace',
        document_content: { type: 'markdown', markdown: toCanvasMarkdown(content) },
      },
    ],
  });
}

const CANVAS_RENDERERS: Record<TeamCanvas, (report: SprintReport, context: ReportContext) => string> = {
  capacity: renderCapacityCanvas,
  absences: renderAbsencesAndOnCall,
  support: renderSupport,
};

/**
 * Updates every canvas the team has configured. A failing canvas is logged and
 * reported; the others are still attempted.
 */
export async function sendSprintDataToSlack(
  report: SprintReport,
  context: ReportContext,
  client: WebClient = getSlackClient(),
): Promise<CanvasUpdateResult[]> {
  const results: CanvasUpdateResult[] = [];
  const canvases: TeamCanvas[] = ['capacity', 'absences', 'support'];

  for (const canvas of canvases) {
    const canvasId = report.team.canvasTargets[canvas];
    if (!canvasId) {
      continue;
    }

    try {
      await updateCanvas(canvasId, CANVAS_RENDERERS[canvas](report, context), client);
      logger.info(`Updated ${canvas} canvas for ${report.team.name}`);
      results.push({ canvas, canvasId, ok: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to update ${canvas} canvas ${canvasId}`, { error: message });
      results.push({ canvas, canvasId, ok: false, error: message });
    }
  }

  return results;
}
