import { messages } from '@constants/messages'

export class NoMockCitiesFoundError extends Error {
  constructor(query: string) {
    super(messages.errors.noMockCitiesFound(query))
  }
}
