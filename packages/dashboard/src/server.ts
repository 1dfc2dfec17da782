import Fastify, { FastifyInstance } from "fastify";
import fastifyStatic from "@fastify/static";
import fastifyCors from "@fastify/cors";
import fastifyMultipart from "@fastify/multipart";
import { join } from "node:path";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { SAMPLE_SCHEDULE, type AppConfig } from "@sprint-calendar/core";
import { registerCalendarRoutes } from "./routes/calendar.js";

/** Largest schedule file accepted by the upload route */
export const MAX_UPLOAD_BYTES = 1024 * 1024;

export interface ServerOptions {
  config: AppConfig;
  /** Pretty-printed pino logging (default true) */
  logger?: boolean;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    appConfig: AppConfig;
  }
}

function escapeHtml(text: string): string {
  return text
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;");
}

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: "info",
            transport: {
              target: "pino-pretty",
              options: {
                translateTime: "HH:MM:ss Z",
                ignore: "pid,hostname",
              },
            },
          },
  });

  // Register CORS (allow all origins, local planning tool)
  await fastify.register(fastifyCors, {
    origin: true,
  });

  // Register multipart/form-data support for schedule file uploads
  await fastify.register(fastifyMultipart, {
    limits: {
      fileSize: MAX_UPLOAD_BYTES,
      files: 1,
    },
  });

  fastify.decorate("appConfig", config);

  // Serve index.html with the sample schedule injected (replaces __SAMPLE_SCHEDULE__)
  const publicDir = fileURLToPath(new URL("../public", import.meta.url));
  fastify.get("/", async (_request, reply) => {
    const html = await readFile(join(publicDir, "index.html"), "utf-8");
    return reply
      .type("text/html")
      .send(html.replaceAll("__SAMPLE_SCHEDULE__", escapeHtml(SAMPLE_SCHEDULE)));
  });

  // Serve static files from public/ directory (index: false, / is handled by the route above)
  await fastify.register(fastifyStatic, {
    root: publicDir,
    prefix: "/",
    index: false,
  });

  await registerCalendarRoutes(fastify);

  return fastify;
}
