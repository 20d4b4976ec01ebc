import { messages } from '@constants/messages'

export class SearchAbortedError extends Error {
  constructor() {
    super(messages.errors.searchAborted)
  }
}
