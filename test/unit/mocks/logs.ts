import { ILoggerComponent } from '@well-known-components/interfaces'

export function createLogMockComponent(): ILoggerComponent {
  const logger = {
    log: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    info: jest.fn()
  }

  return {
    getLogger: jest.fn().mockReturnValue(logger)
  }
}
