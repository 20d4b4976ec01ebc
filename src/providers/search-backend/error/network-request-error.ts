import { messages } from '@constants/messages'

export class NetworkRequestError extends Error {
  readonly status: number | undefined
  private readonly originalReason: unknown

  constructor(detail: string, status?: number, reason?: unknown) {
    super(messages.errors.networkError(detail))

    this.status = status
    this.originalReason = reason
  }

  get reason(): unknown {
    return this.originalReason
  }
}
