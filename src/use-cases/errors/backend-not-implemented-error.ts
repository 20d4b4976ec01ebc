import { messages } from '@constants/messages'

export class BackendNotImplementedError extends Error {
  constructor(readonly backendName: string) {
    super(messages.errors.backendNotImplemented(backendName))
  }
}
