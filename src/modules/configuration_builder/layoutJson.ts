import { z } from 'zod'
import type { Configuration, GroupDeclaration, WellIndex } from '@/types'
import { ConfigurationError } from '@/utils/errors'
import { parseWellsField } from '@/utils/wells'
import { finalizeConfiguration } from './finalize'

const WellsSchema = z.union([
  z.array(z.number().int().positive()).min(1),
  z.string().transform((value, ctx): WellIndex[] => {
    const wells = parseWellsField(value)
    if (!wells) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `cannot read wells "${value}"` })
      return z.NEVER
    }
    return wells
  }),
])

const SampleEntrySchema = z.object({
  name: z.string(),
  wells: WellsSchema,
})

const GroupSchema = z.object({
  name: z.string(),
  blank: WellsSchema.optional(),
  // Object keys that look like integers are iterated first; use the array form to keep such names in order.
  samples: z.union([z.array(SampleEntrySchema), z.record(z.string(), WellsSchema)]).default([]),
})

export const LayoutJsonSchema = z.object({
  groups: z.array(GroupSchema).min(1),
})

export type LayoutJson = z.input<typeof LayoutJsonSchema>

/**
 * Builds a Configuration from a parsed JSON layout:
 * `{ "groups": [{ "name": "LB", "blank": "1-4", "samples": { "WT": [5, 6, 7, 8] } }] }`.
 * The blank is its own field, so a sample may itself be called "blank".
 */
export function parseLayoutJson(value: unknown): Configuration {
  const parsed = LayoutJsonSchema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ConfigurationError(`invalid JSON layout at ${issue.path.join('.') || '(root)'}: ${issue.message}`)
  }
  const declarations: GroupDeclaration[] = parsed.data.groups.map((group) => {
    const samples = Array.isArray(group.samples)
      ? group.samples
      : Object.entries(group.samples).map(([name, wells]) => ({ name, wells }))
    return group.blank ? { name: group.name, blankWells: group.blank, samples } : { name: group.name, samples }
  })
  return finalizeConfiguration(declarations)
}

export function parseLayoutJsonText(text: string): Configuration {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (err) {
    throw new ConfigurationError(`invalid JSON layout: ${err instanceof Error ? err.message : String(err)}`)
  }
  return parseLayoutJson(value)
}
