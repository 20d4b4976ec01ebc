import { messages } from '@constants/messages'

export class NoCitiesFoundError extends Error {
  constructor() {
    super(messages.errors.noCitiesFound)
  }
}
