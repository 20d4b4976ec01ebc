import { messages } from '@constants/messages'

export class EmptyQueryError extends Error {
  constructor() {
    super(messages.validation.emptyQuery)
  }
}
