import { z } from 'zod'

// Inbound webhook payloads from the WhatsApp Cloud API

const contactSchema = z.object({
  wa_id: z.string().optional(),
  profile: z.object({ name: z.string().optional() }).optional()
})

export const webhookMessageSchema = z.object({
  id: z.string().optional(),
  from: z.string().optional(),
  timestamp: z.string().optional(),
  type: z.string().optional(),
  text: z.object({ body: z.string() }).optional(),
  interactive: z
    .object({
      type: z.string(),
      button_reply: z.object({ id: z.string(), title: z.string() }).optional(),
      list_reply: z.object({ id: z.string(), title: z.string() }).optional()
    })
    .optional(),
  image: z
    .object({
      id: z.string().optional(),
      mime_type: z.string().optional(),
      caption: z.string().optional()
    })
    .optional()
})

export const webhookStatusSchema = z.object({
  id: z.string().optional(),
  status: z.string(),
  recipient_id: z.string().optional(),
  errors: z.array(z.object({ code: z.number().optional(), title: z.string().optional() })).optional()
})

export const webhookBodySchema = z.object({
  object: z.string(),
  entry: z
    .array(
      z.object({
        id: z.string().optional(),
        changes: z
          .array(
            z.object({
              field: z.string().optional(),
              value: z.object({
                metadata: z.object({ phone_number_id: z.string().optional() }).optional(),
                contacts: z.array(contactSchema).optional(),
                messages: z.array(webhookMessageSchema).optional(),
                statuses: z.array(webhookStatusSchema).optional()
              })
            })
          )
          .default([])
      })
    )
    .default([])
})

export type WebhookMessage = z.infer<typeof webhookMessageSchema>
export type WebhookStatus = z.infer<typeof webhookStatusSchema>
export type WebhookBody = z.infer<typeof webhookBodySchema>
export type WebhookContact = z.infer<typeof contactSchema>

// Outbound payloads for POST /{phone-id}/messages

export interface OutboundTextPayload {
  messaging_product: 'whatsapp'
  recipient_type: 'individual'
  to: string
  type: 'text'
  text: { body: string }
}

export interface OutboundInteractivePayload {
  messaging_product: 'whatsapp'
  recipient_type: 'individual'
  to: string
  type: 'interactive'
  interactive: {
    type: 'button'
    body: { text: string }
    action: {
      buttons: Array<{ type: 'reply'; reply: { id: string; title: string } }>
    }
  }
}

export type OutboundPayload = OutboundTextPayload | OutboundInteractivePayload

export const sendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).optional()
})

export type SendResponse = z.infer<typeof sendResponseSchema>

// HTTP API request bodies

export const sendMessageBodySchema = z.object({
  to: z.string().min(1),
  message: z.string().min(1)
})

export const broadcastBodySchema = z.object({
  message: z.string().min(1),
  recipients: z.array(z.string().min(1)).min(1)
})
