/**
 * Everything about a coaching call that can be decided before touching LiveKit:
 * dispatch metadata, agent persona, greeting and naming.
 */

import { randomInt } from 'crypto'
import { z } from 'zod'
import type { ConversationContext } from '../core/types.js'

export const AGENT_NAME = 'career-guidance-agent'

export const COACH_INSTRUCTIONS = `You're Anjali, a casual and friendly career coach on a weekly check-in phone call.
You talk like a real person, not a corporate coach: everyday words, contractions, the odd "um", "so..." or "you know what I mean?".
Be encouraging without being fake-positive.

Keep the conversation on career topics: work projects, professional goals, job challenges, skill development,
workplace dynamics, career transitions, networking and professional growth. If the caller drifts to unrelated
personal topics, steer back to their career with light, playful humor.

Questions you might ask, phrased naturally:
- What was the best part of your work week?
- Anything driving you crazy at work lately?
- How's that project going, the one you mentioned last time?
- What's on your plate for next week?
- Any skills you've been wanting to learn or improve?

This is a phone call: answer in one to three short spoken sentences, no lists, no markdown.`

const dialMetadataSchema = z.object({
  phone_number: z.string().trim().min(1),
  last_topic: z.string().trim().min(1).optional()
})

export type CallPlan =
  | { kind: 'outbound'; phoneNumber: string; context?: ConversationContext }
  | { kind: 'inbound' }

/**
 * Job metadata carries the number to dial. Anything unparseable is an inbound call.
 */
export function parseDialMetadata(metadata: string | undefined): CallPlan {
  if (!metadata) return { kind: 'inbound' }

  let raw: unknown
  try {
    raw = JSON.parse(metadata)
  } catch {
    return { kind: 'inbound' }
  }

  const parsed = dialMetadataSchema.safeParse(raw)
  if (!parsed.success) return { kind: 'inbound' }

  const { phone_number: phoneNumber, last_topic: lastTopic } = parsed.data
  return lastTopic
    ? { kind: 'outbound', phoneNumber, context: { senderId: phoneNumber, lastTopic } }
    : { kind: 'outbound', phoneNumber }
}

export function buildDialMetadata(phoneNumber: string, lastTopic?: string): string {
  return JSON.stringify(lastTopic ? { phone_number: phoneNumber, last_topic: lastTopic } : { phone_number: phoneNumber })
}

export function buildGreeting(context?: ConversationContext): string {
  if (context?.lastTopic) {
    return `Hey! Anjali here. Last week we talked about ${context.lastTopic}. Are you still into that, or is there something new on your mind today?`
  }
  return "Hey! Anjali here for your weekly check-in. So, how's work been treating you?"
}

// E.164: leading +, country code, up to 15 digits
export function isInternationalNumber(phoneNumber: string): boolean {
  return /^\+[1-9]\d{6,14}$/.test(phoneNumber)
}

export function sipParticipantIdentity(phoneNumber: string): string {
  return `caller-${phoneNumber}`
}

export function createRoomName(nextDigit: () => number = () => randomInt(10)): string {
  let digits = ''
  for (let i = 0; i < 10; i++) digits += String(nextDigit())
  return `coaching-${digits}`
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/** `recordings/coaching_call_{phone}_{YYYYMMDD_HHMMSS}.mp4`, in UTC */
export function recordingFilePath(phoneNumber: string, startedAt: Date): string {
  const stamp =
    `${startedAt.getUTCFullYear()}${pad(startedAt.getUTCMonth() + 1)}${pad(startedAt.getUTCDate())}` +
    `_${pad(startedAt.getUTCHours())}${pad(startedAt.getUTCMinutes())}${pad(startedAt.getUTCSeconds())}`
  return `recordings/coaching_call_${phoneNumber}_${stamp}.mp4`
}
