import { messages } from '@constants/messages'

export class SimulatedNetworkError extends Error {
  constructor(query: string) {
    super(messages.errors.simulatedNetworkError(query))
  }
}
