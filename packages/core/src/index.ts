#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises'
import { text } from 'node:stream/consumers'
import { parseArgs } from 'node:util'
import { loadConfig } from './config.js'
import { parseSchedule, formatSchedule, ParseError } from './schedule/index.js'
import {
  renderCalendar,
  exportPng,
  CalendarSpanError,
  NO_CALENDAR_MESSAGE,
  type CalendarFigure,
} from './calendar/index.js'
import type { ScheduleSet } from './types.js'

const USAGE = `Usage: sprint-calendar [schedule-file|-] [--out file.png] [--dpi n] [--config path]

Reads a schedule (stdin when no file is given) and writes the wall calendar as PNG.

  Sprint Name Start Date End Date
  0 2025-03-10 2025-03-21
  1 2025-03-24 2025-04-11`

async function readSchedule(source: string | undefined): Promise<string> {
  if (!source || source === '-') {
    return text(process.stdin)
  }
  return readFile(source, 'utf-8')
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      dpi: { type: 'string' },
      config: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
  })

  if (values.help) {
    console.log(USAGE)
    return
  }

  const config = loadConfig(values.config)
  const dpi = values.dpi ? Number(values.dpi) : config.export.dpi
  const out = values.out ?? config.export.fileName

  const input = await readSchedule(positionals[0])

  let schedule: ScheduleSet
  try {
    schedule = parseSchedule(input)
  } catch (err) {
    if (err instanceof ParseError) {
      console.error(`Error: ${err.message}`)
      process.exit(1)
    }
    throw err
  }

  let figure: CalendarFigure | null
  try {
    figure = renderCalendar(schedule, config.render)
  } catch (err) {
    if (err instanceof CalendarSpanError) {
      console.error(`Error: ${err.message}`)
      process.exit(1)
    }
    throw err
  }
  if (!figure) {
    console.error(`Error: ${NO_CALENDAR_MESSAGE}`)
    process.exit(1)
  }

  console.log(formatSchedule(schedule))
  console.log()

  const png = exportPng(figure, { dpi })
  await writeFile(out, png)
  console.log(`Wrote ${out} (${figure.months.length} month(s), ${png.length} bytes)`)
}

main().catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})
