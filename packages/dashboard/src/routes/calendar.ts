/**
 * Calendar API Routes
 *
 * Parse a pasted (or uploaded) schedule and render it as a wall calendar PNG.
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import {
  parseSchedule,
  renderCalendar,
  exportPng,
  ParseError,
  CalendarSpanError,
  NO_CALENDAR_MESSAGE,
  PNG_MIME_TYPE,
  SAMPLE_SCHEDULE,
  type AppConfig,
  type CalendarFigure,
  type ScheduleSet,
} from "@sprint-calendar/core";

const ScheduleBodySchema = z.object({
  text: z.string(),
});

const RenderBodySchema = ScheduleBodySchema.extend({
  dpi: z.number().positive().max(1200).optional(),
});

interface ErrorBody {
  error: string;
  token?: string;
  line?: number;
  months?: number;
  maxMonths?: number;
}

interface RenderedCalendar {
  schedule: ScheduleSet;
  figure: CalendarFigure;
  png: Buffer;
}

type RenderResult =
  | { ok: true; calendar: RenderedCalendar }
  | { ok: false; status: number; body: ErrorBody };

function parseError(err: ParseError): ErrorBody {
  return { error: err.message, token: err.token, line: err.line };
}

/**
 * Parse, lay out and paint a schedule. Bad dates, empty schedules and spans
 * past render.maxMonths come back as error results; anything else is thrown.
 */
function renderFromText(
  text: string,
  dpi: number,
  config: AppConfig,
): RenderResult {
  let schedule: ScheduleSet;
  try {
    schedule = parseSchedule(text);
  } catch (err) {
    if (err instanceof ParseError) {
      return { ok: false, status: 400, body: parseError(err) };
    }
    throw err;
  }

  let figure: CalendarFigure | null;
  try {
    figure = renderCalendar(schedule, config.render);
  } catch (err) {
    if (err instanceof CalendarSpanError) {
      return {
        ok: false,
        status: 422,
        body: { error: err.message, months: err.months, maxMonths: err.maxMonths },
      };
    }
    throw err;
  }
  if (!figure) {
    return { ok: false, status: 422, body: { error: NO_CALENDAR_MESSAGE } };
  }

  return {
    ok: true,
    calendar: { schedule, figure, png: exportPng(figure, { dpi }) },
  };
}

/**
 * Convert a rendered calendar to API response format
 */
function toResponse(calendar: RenderedCalendar, fileName: string) {
  return {
    sprints: calendar.schedule.map((sprint) => ({ ...sprint })),
    months: calendar.figure.months.map((month) => month.title),
    legend: calendar.figure.legend.entries,
    fileName,
    image: `data:${PNG_MIME_TYPE};base64,${calendar.png.toString("base64")}`,
  };
}

function invalidBody(reply: FastifyReply, error: z.ZodError) {
  const issue = error.issues[0];
  const field = issue?.path.join(".") || "body";
  return reply
    .code(400)
    .send({ error: `Invalid request: ${field}: ${issue?.message ?? "invalid"}` });
}

export async function registerCalendarRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  const config = fastify.appConfig;

  // GET /api/schedule/sample - Schedule the text area starts with
  fastify.get("/api/schedule/sample", async () => {
    return { text: SAMPLE_SCHEDULE };
  });

  // POST /api/schedule/parse - Parsed sprints, no rendering
  fastify.post("/api/schedule/parse", async (request, reply) => {
    const body = ScheduleBodySchema.safeParse(request.body);
    if (!body.success) {
      return invalidBody(reply, body.error);
    }

    try {
      const schedule = parseSchedule(body.data.text);
      return { sprints: schedule.map((sprint) => ({ ...sprint })) };
    } catch (err) {
      if (err instanceof ParseError) {
        return reply.code(400).send(parseError(err));
      }
      throw err;
    }
  });

  // POST /api/calendar - Sprints plus an inline PNG preview
  fastify.post("/api/calendar", async (request, reply) => {
    const body = RenderBodySchema.safeParse(request.body);
    if (!body.success) {
      return invalidBody(reply, body.error);
    }

    const result = renderFromText(
      body.data.text,
      body.data.dpi ?? config.export.previewDpi,
      config,
    );
    if (!result.ok) {
      return reply.code(result.status).send(result.body);
    }

    const { calendar } = result;
    request.log.info(
      {
        sprints: calendar.schedule.length,
        months: calendar.figure.months.length,
        bytes: calendar.png.length,
      },
      "Rendered sprint calendar",
    );
    return toResponse(calendar, config.export.fileName);
  });

  // POST /api/calendar/download - PNG attachment at export resolution
  fastify.post("/api/calendar/download", async (request, reply) => {
    const body = RenderBodySchema.safeParse(request.body);
    if (!body.success) {
      return invalidBody(reply, body.error);
    }

    const result = renderFromText(
      body.data.text,
      body.data.dpi ?? config.export.dpi,
      config,
    );
    if (!result.ok) {
      return reply.code(result.status).send(result.body);
    }

    return reply
      .type(PNG_MIME_TYPE)
      .header(
        "Content-Disposition",
        `attachment; filename="${config.export.fileName}"`,
      )
      .send(result.calendar.png);
  });

  // POST /api/calendar/upload - Same as /api/calendar, schedule sent as a file
  fastify.post("/api/calendar/upload", async (request, reply) => {
    if (!request.isMultipart()) {
      return reply
        .code(400)
        .send({ error: "Expected multipart/form-data with a schedule file" });
    }

    const file = await request.file();
    if (!file) {
      return reply.code(400).send({ error: "No schedule file uploaded" });
    }

    const text = (await file.toBuffer()).toString("utf-8");
    const result = renderFromText(text, config.export.previewDpi, config);
    if (!result.ok) {
      return reply.code(result.status).send(result.body);
    }

    request.log.info(
      { file: file.filename, sprints: result.calendar.schedule.length },
      "Rendered uploaded schedule",
    );
    return toResponse(result.calendar, config.export.fileName);
  });
}
