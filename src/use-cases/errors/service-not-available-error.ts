import { messages } from '@constants/messages'

export class ServiceNotAvailableError extends Error {
  constructor(serviceName: string) {
    super(messages.errors.serviceNotAvailable(serviceName))
  }
}
