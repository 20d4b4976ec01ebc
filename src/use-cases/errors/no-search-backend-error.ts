import { messages } from '@constants/messages'

export class NoSearchBackendError extends Error {
  constructor() {
    super(messages.errors.noSearchBackend)
  }
}
