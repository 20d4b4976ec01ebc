import { messages } from '@constants/messages'

export class InvalidResponseFormatError extends Error {
  constructor() {
    super(messages.errors.invalidResponseFormat)
  }
}
