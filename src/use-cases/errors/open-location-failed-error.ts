import { messages } from '@constants/messages'

export class OpenLocationFailedError extends Error {
  private readonly originalReason: unknown

  constructor(reason?: unknown) {
    super(messages.errors.openLocationFailed)

    this.originalReason = reason
  }

  get reason(): unknown {
    return this.originalReason
  }
}
