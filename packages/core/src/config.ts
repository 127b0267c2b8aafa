import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { IANAZone } from 'luxon'

const CONFIG_DIRNAME = '.timetable'
const CONFIG_FILENAME = 'config.yaml'

const DEFAULT_TIME_ZONE = 'Asia/Ho_Chi_Minh'
const DEFAULT_CALENDAR_NAME = 'Class Schedule'
const DEFAULT_REMINDER_MINUTES = 30
const DEFAULT_SERVER_HOST = '127.0.0.1'
const DEFAULT_SERVER_PORT = 5232

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-MM-dd')

const configSchema = z.object({
  timeZone: z
    .string()
    .refine((zone) => IANAZone.isValidZone(zone), 'unknown IANA time zone')
    .default(DEFAULT_TIME_ZONE),
  defaultCalendarName: z.string().min(1).default(DEFAULT_CALENDAR_NAME),
  reminderMinutes: z.number().int().nonnegative().default(DEFAULT_REMINDER_MINUTES),
  calendar: z
    .object({
      server: z
        .object({
          host: z.string().default(DEFAULT_SERVER_HOST),
          port: z.number().int().positive().default(DEFAULT_SERVER_PORT),
        })
        .default({}),
    })
    .default({}),
  sources: z
    .record(
      z.object({
        baseUrl: z.string().url().optional(),
        semesterStarts: z.record(isoDate).optional(),
      }),
    )
    .default({}),
})

export type AppConfig = z.infer<typeof configSchema>

export type SourceConfig = AppConfig['sources'][string]

export function findConfigDir(): string {
  // Walk up from cwd looking for an existing .timetable/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, CONFIG_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  return path.resolve(CONFIG_DIRNAME)
}

function loadYamlConfig(configDir: string): unknown {
  const configPath = path.join(configDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }
  try {
    return parse(readFileSync(configPath, 'utf-8')) ?? {}
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return {}
  }
}

/**
 * Load config.yaml from the config directory and apply env overrides.
 * Invalid values are an error naming the offending key.
 */
export function loadConfig(configDir?: string): AppConfig {
  const dir = configDir ?? process.env.TIMETABLE_DIR ?? findConfigDir()
  const raw = loadYamlConfig(dir)

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const key = issue?.path.join('.') || '(root)'
    throw new Error(
      `Invalid ${path.join(dir, CONFIG_FILENAME)}: ${key}: ${issue?.message ?? 'invalid value'}`,
    )
  }

  const config = result.data
  const envZone = process.env.TIMETABLE_TZ
  if (envZone) {
    if (!IANAZone.isValidZone(envZone)) {
      throw new Error(`Invalid TIMETABLE_TZ: unknown IANA time zone '${envZone}'`)
    }
    config.timeZone = envZone
  }

  return config
}

export function sourceConfig(config: AppConfig, sourceId: string): SourceConfig {
  return config.sources[sourceId] ?? {}
}
