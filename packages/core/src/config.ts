import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { TAB10 } from './calendar/palette.js'
import { isHexColor } from './calendar/color.js'
import type { AppConfig, ExportConfig, RenderConfig, ServerConfig } from './types.js'

export const CONFIG_FILENAME = 'sprint-calendar.yaml'

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: '127.0.0.1',
  port: 4321,
}

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  maxColumns: 3,
  maxMonths: 60,
  legendColumns: 5,
  palette: TAB10,
  headerFill: '#e6e6e6',
  weekendFill: '#f2f2f2',
  darkText: '#000000',
  lightText: '#ffffff',
  gridColor: '#000000',
  fontFamily: 'sans-serif',
}

export const DEFAULT_EXPORT_CONFIG: ExportConfig = {
  dpi: 300,
  previewDpi: 100,
  fileName: 'sprint_calendar.png',
}

const hexColor = z.string().refine(isHexColor, { message: 'Expected a #rrggbb color' })

const YamlConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).optional(),
      port: z.number().int().min(0).max(65535).optional(),
    })
    .optional(),
  render: z
    .object({
      maxColumns: z.number().int().min(1).optional(),
      maxMonths: z.number().int().min(1).max(240).optional(),
      legendColumns: z.number().int().min(1).optional(),
      palette: z.union([z.literal('tab10'), z.array(hexColor).min(1)]).optional(),
      headerFill: hexColor.optional(),
      weekendFill: hexColor.optional(),
      darkText: hexColor.optional(),
      lightText: hexColor.optional(),
      gridColor: hexColor.optional(),
      fontFamily: z.string().min(1).optional(),
    })
    .optional(),
  export: z
    .object({
      dpi: z.number().positive().max(1200).optional(),
      previewDpi: z.number().positive().max(1200).optional(),
      fileName: z.string().min(1).optional(),
    })
    .optional(),
})

type YamlConfig = z.infer<typeof YamlConfigSchema>

export class ConfigError extends Error {
  constructor(
    readonly configPath: string,
    readonly issues: string[],
  ) {
    super(`Invalid ${configPath}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`)
    this.name = 'ConfigError'
  }
}

export function findConfigFile(startDir: string = process.cwd()): string | null {
  // Walk up from startDir looking for sprint-calendar.yaml
  let dir = path.resolve(startDir)
  while (true) {
    const candidate = path.join(dir, CONFIG_FILENAME)
    if (existsSync(candidate)) return candidate
    if (dir === path.dirname(dir)) return null
    dir = path.dirname(dir)
  }
}

function loadYamlConfig(configPath: string): YamlConfig {
  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return {}
  }

  const result = YamlConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigError(
      configPath,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return result.data
}

/**
 * Load configuration.
 *
 * Lookup order: explicit path, SPRINT_CALENDAR_CONFIG, then sprint-calendar.yaml
 * in the working directory or any parent. No file means defaults.
 * PORT overrides server.port.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const resolved = configPath ?? env.SPRINT_CALENDAR_CONFIG ?? findConfigFile()
  const yaml = resolved && existsSync(resolved) ? loadYamlConfig(resolved) : {}

  const palette = yaml.render?.palette
  const render: RenderConfig = {
    ...DEFAULT_RENDER_CONFIG,
    ...yaml.render,
    palette: palette === undefined || palette === 'tab10' ? TAB10 : palette,
  }

  const server: ServerConfig = { ...DEFAULT_SERVER_CONFIG, ...yaml.server }
  if (env.PORT) {
    const port = parseInt(env.PORT, 10)
    if (Number.isNaN(port)) {
      console.warn(`Warning: Ignoring non-numeric PORT "${env.PORT}".`)
    } else {
      server.port = port
    }
  }

  return {
    server,
    render,
    export: { ...DEFAULT_EXPORT_CONFIG, ...yaml.export },
  }
}
