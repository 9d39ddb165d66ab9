import type {
  IBaseComponent,
  IConfigComponent,
  IFetchComponent,
  IHttpServerComponent,
  ILoggerComponent,
  IMetricsComponent
} from '@well-known-components/interfaces'
import { IPgComponent } from '@well-known-components/pg-component'
import {
  ICustomPuppetsStarterComponent,
  IDbComponent,
  IDoublePuppetComponent,
  IIntentsComponent,
  IMediaReuploaderComponent,
  IProfileSynchronizerComponent,
  IPuppetIntentsComponent,
  IPuppetRegistryComponent,
  IUserIdTemplateComponent
} from './service'
import { BridgeConfig } from './types'
import { metricDeclarations } from '../metrics'

export type GlobalContext = {
  components: BaseComponents
}

// components used in every environment
export type BaseComponents = {
  config: IConfigComponent
  bridgeConfig: BridgeConfig
  fetch: IFetchComponent
  logs: ILoggerComponent
  metrics: IMetricsComponent<keyof typeof metricDeclarations>
  db: IDbComponent
  intents: IIntentsComponent
  userIdTemplate: IUserIdTemplateComponent
  mediaReuploader: IMediaReuploaderComponent
  puppetRegistry: IPuppetRegistryComponent
  profileSynchronizer: IProfileSynchronizerComponent
  doublePuppet: IDoublePuppetComponent
  puppetIntents: IPuppetIntentsComponent
}

// components used in runtime
export type AppComponents = BaseComponents & {
  server: IHttpServerComponent<GlobalContext>
  statusChecks: IBaseComponent
  pg: IPgComponent
  customPuppetsStarter: ICustomPuppetsStarterComponent
}
