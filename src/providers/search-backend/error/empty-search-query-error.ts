import { messages } from '@constants/messages'

export class EmptySearchQueryError extends Error {
  constructor() {
    super(messages.validation.enterSearchQuery)
  }
}
