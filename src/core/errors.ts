/**
 * Error kinds shared by the webhook server and the voice scripts
 */

export class ValidationError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class ProviderUnavailable extends Error {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ProviderUnavailable'
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly missing: string[] = []) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class WhatsAppApiError extends Error {
  constructor(public readonly status: number, public readonly body: string) {
    super(`WhatsApp API request failed with status ${status}`)
    this.name = 'WhatsAppApiError'
  }
}
