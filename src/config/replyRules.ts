import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { ConfigurationError } from '../core/errors.js'
import type {
  ButtonReplyTable,
  DispatchDefaults,
  ForwardToGenerativeAction,
  ReplyRule,
  StaticAction
} from '../core/types.js'

// WhatsApp reply buttons: at most 3 per message
const MAX_BUTTONS = 3

export const DEFAULT_RULES_PATH = path.resolve(__dirname, '../../config/reply-rules.json')

const sendTextSchema = z.object({
  kind: z.literal('send_text'),
  body: z.string().min(1)
})

const sendButtonsSchema = z.object({
  kind: z.literal('send_buttons'),
  body: z.string().min(1),
  buttons: z
    .array(z.object({ id: z.string().min(1), label: z.string().min(1) }))
    .min(1)
    .max(MAX_BUTTONS)
})

const staticActionSchema = z.discriminatedUnion('kind', [sendTextSchema, sendButtonsSchema])

const forwardSchema = z.object({
  kind: z.literal('forward_to_generative'),
  promptContext: z.string().min(1),
  fallback: staticActionSchema.optional()
})

const actionSchema = z.discriminatedUnion('kind', [sendTextSchema, sendButtonsSchema, forwardSchema])

const ruleSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().trim().min(1)).min(1),
  match: z.enum(['contains', 'equals']).optional(),
  action: actionSchema
})

const replyTableSchema = z.object({
  rules: z.array(ruleSchema),
  buttons: z.object({
    answers: z.record(staticActionSchema),
    unknown: staticActionSchema
  }),
  defaults: z.object({
    nonText: staticActionSchema,
    static: staticActionSchema,
    generative: forwardSchema
  })
})

export interface ReplyTable {
  rules: ReplyRule[]
  buttons: ButtonReplyTable
  defaults: {
    nonText: StaticAction
    static: StaticAction
    generative: ForwardToGenerativeAction
  }
}

export function parseReplyTable(raw: unknown): ReplyTable {
  const parsed = replyTableSchema.safeParse(raw)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid reply rule table: ${problems.join('; ')}`)
  }

  const names = new Set<string>()
  for (const rule of parsed.data.rules) {
    if (names.has(rule.name)) {
      throw new ConfigurationError(`Duplicate reply rule name: ${rule.name}`)
    }
    names.add(rule.name)
  }

  return parsed.data
}

/**
 * Load the rule table once at startup. Rule order in the file is match order.
 */
export function loadReplyTable(filePath: string = DEFAULT_RULES_PATH): ReplyTable {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'))
  } catch (err) {
    throw new ConfigurationError(`Cannot read reply rules from ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
  }
  return parseReplyTable(raw)
}

export function buildDispatchDefaults(table: ReplyTable, unmatched: 'static' | 'generative'): DispatchDefaults {
  return {
    nonText: table.defaults.nonText,
    unmatched: unmatched === 'generative'
      ? { ...table.defaults.generative, fallback: table.defaults.generative.fallback ?? table.defaults.static }
      : table.defaults.static
  }
}
