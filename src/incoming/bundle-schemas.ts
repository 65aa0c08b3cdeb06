import { z } from 'zod'
import type { TableSchema } from '../io/row-validation'

const key = (column: string) => z.string().trim().min(1, `${column} is empty`)
const text = () => z.string().default('')

export const bundleAthleteSchema = {
  source: 'bundle.athletes',
  requiredColumns: ['code', 'name', 'gender', 'country_code', 'birth_date', 'disciplines', 'events'],
  row: z.object({
    code: key('code'),
    name: z.string().trim(),
    name_tv: z.string().trim().default(''),
    gender: z.string().trim(),
    country_code: z.string().trim().toUpperCase(),
    country_long: z.string().trim().default(''),
    nationality_code: z.string().trim().toUpperCase().default(''),
    birth_date: z.string(),
    height: z.string().trim().default(''),
    weight: z.string().trim().default(''),
    disciplines: z.string(),
    events: z.string(),
  }),
} satisfies TableSchema<z.ZodTypeAny>

export const bundleEventSchema = {
  source: 'bundle.events',
  requiredColumns: ['sport', 'event'],
  row: z.object({
    sport: key('sport'),
    event: key('event'),
  }),
} satisfies TableSchema<z.ZodTypeAny>

export const bundleNocSchema = {
  source: 'bundle.nocs',
  requiredColumns: ['code', 'country_long'],
  row: z.object({
    code: z.string().trim().toUpperCase(),
    country_long: z.string().trim(),
  }),
} satisfies TableSchema<z.ZodTypeAny>

export const bundleTeamSchema = {
  source: 'bundle.teams',
  requiredColumns: ['discipline', 'events', 'athletes_codes'],
  row: z.object({
    discipline: key('discipline'),
    events: key('events'),
    athletes_codes: text(),
  }),
} satisfies TableSchema<z.ZodTypeAny>

export const bundleMedallistSchema = {
  source: 'bundle.medallists',
  requiredColumns: ['code_athlete', 'discipline', 'event', 'medal_type'],
  row: z.object({
    code_athlete: key('code_athlete'),
    discipline: key('discipline'),
    event: key('event'),
    medal_type: z.string(),
  }),
} satisfies TableSchema<z.ZodTypeAny>
