import { describe, it, expect } from '@jest/globals'
import os from 'os'
import path from 'path'
import fs from 'fs'
import { buildDispatchDefaults, loadReplyTable, parseReplyTable } from '../replyRules.js'
import { ConfigurationError } from '../../core/errors.js'
import { dispatch } from '../../routing/Dispatcher.js'
import type { InboundMessage } from '../../core/types.js'

function text(body: string): InboundMessage {
  return { id: 'wamid.rules', senderId: '15550002222', text: body, type: 'text', timestamp: new Date(0) }
}

describe('reply rule table', () => {
  const table = loadReplyTable()

  it('loads the bundled rules in declaration order', () => {
    expect(table.rules.map((rule) => rule.name)).toEqual([
      'webhook-test',
      'greeting',
      'resume',
      'interview',
      'salary',
      'career'
    ])
  })

  it('offers three menu buttons on a greeting', () => {
    const action = dispatch(text('Hello'), table.rules, buildDispatchDefaults(table, 'static'))
    expect(action.kind).toBe('send_buttons')
    if (action.kind === 'send_buttons') {
      expect(action.buttons.map((button) => button.id)).toEqual(['goals', 'resume', 'jobs'])
    }
  })

  it('only answers the webhook test rule on an exact match', () => {
    const defaults = buildDispatchDefaults(table, 'static')
    expect(dispatch(text('PING'), table.rules, defaults)).toEqual({
      kind: 'send_text',
      body: "🎉 *Webhook Working!*\n\n✅ Message received: _PING_\n✅ Two-way communication active!\n\nI'm Coach Alex, ready to help with your career! 💼"
    })
    expect(dispatch(text('testing my salary'), table.rules, defaults)).toBe(table.rules[4]?.action)
  })

  it('quotes at most 50 characters of the question in the career fallback', () => {
    const question = 'How do I move from support engineering into a product manager career path?'
    const action = dispatch(text(question), table.rules, buildDispatchDefaults(table, 'static'))

    expect(action.kind).toBe('forward_to_generative')
    if (action.kind === 'forward_to_generative') {
      expect(action.promptContext).toBe(question)
      const fallback = action.fallback
      expect(fallback?.kind).toBe('send_text')
      if (fallback?.kind === 'send_text') {
        expect(fallback.body).toContain('Great question about "How do I move from support engineering into a prod..."!')
      }
    }
  })

  it('has an answer for every menu button', () => {
    expect(Object.keys(table.buttons.answers).sort()).toEqual(['goals', 'jobs', 'resume'])
  })

  it('uses the static default unless generative replies are requested', () => {
    expect(buildDispatchDefaults(table, 'static').unmatched).toBe(table.defaults.static)
    expect(buildDispatchDefaults(table, 'generative').unmatched).toEqual({
      kind: 'forward_to_generative',
      promptContext: '{{text}}',
      fallback: table.defaults.static
    })
  })
})

describe('parseReplyTable', () => {
  const valid = {
    rules: [{ name: 'resume', keywords: ['resume'], action: { kind: 'send_text', body: 'tip' } }],
    buttons: { answers: {}, unknown: { kind: 'send_text', body: 'more?' } },
    defaults: {
      nonText: { kind: 'send_text', body: 'text only' },
      static: { kind: 'send_text', body: 'menu' },
      generative: { kind: 'forward_to_generative', promptContext: '{{text}}' }
    }
  }

  it('accepts a well-formed table', () => {
    expect(parseReplyTable(valid).rules).toHaveLength(1)
  })

  it('rejects more than three buttons', () => {
    const buttons = ['a', 'b', 'c', 'd'].map((id) => ({ id, label: id.toUpperCase() }))
    const raw = {
      ...valid,
      rules: [{ name: 'menu', keywords: ['menu'], action: { kind: 'send_buttons', body: 'Pick', buttons } }]
    }
    expect(() => parseReplyTable(raw)).toThrow(ConfigurationError)
  })

  it('rejects unknown action kinds', () => {
    const raw = { ...valid, rules: [{ name: 'x', keywords: ['x'], action: { kind: 'send_image', body: 'x' } }] }
    expect(() => parseReplyTable(raw)).toThrow(ConfigurationError)
  })

  it('rejects duplicate rule names', () => {
    const raw = { ...valid, rules: [...valid.rules, ...valid.rules] }
    expect(() => parseReplyTable(raw)).toThrow('Duplicate reply rule name: resume')
  })

  it('reports unreadable files as configuration errors', () => {
    const missing = path.join(os.tmpdir(), 'career-coach-missing-rules.json')
    expect(() => loadReplyTable(missing)).toThrow(ConfigurationError)
  })

  it('reads a table from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'career-coach-'))
    const file = path.join(dir, 'rules.json')
    fs.writeFileSync(file, JSON.stringify(valid))
    try {
      expect(loadReplyTable(file).defaults.static).toEqual({ kind: 'send_text', body: 'menu' })
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })
})
