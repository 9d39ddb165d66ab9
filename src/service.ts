import { Lifecycle } from '@well-known-components/interfaces'
import { AppComponents, GlobalContext } from './types'

// this function wires the business logic (adapters & controllers) with the components (ports)
export async function main(program: Lifecycle.EntryPointParameters<AppComponents>): Promise<void> {
  const { components, startComponents } = program
  const globalContext: GlobalContext = {
    components
  }

  components.server.setContext(globalContext)

  await startComponents()

  // after pg has run its migrations
  components.customPuppetsStarter.launch()
}
