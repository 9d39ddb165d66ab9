import { IDoublePuppetComponent } from '../../../src/types'

export function createDoublePuppetMockComponent(): jest.Mocked<IDoublePuppetComponent> {
  return {
    tryStart: jest.fn().mockResolvedValue(null),
    getSession: jest.fn().mockReturnValue(undefined),
    getSessions: jest.fn().mockReturnValue([])
  }
}
