import { messages } from '@constants/messages'

export class InvalidSearchRequestError extends Error {
  constructor(reason: string) {
    super(messages.errors.invalidRequest(reason))
  }
}
