import { createDotEnvConfigComponent } from '@well-known-components/env-config-provider'
import {
  createServerComponent,
  createStatusCheckComponent,
  instrumentHttpServerWithPromClientRegistry
} from '@well-known-components/http-server'
import { createLogComponent } from '@well-known-components/logger'
import { createFetchComponent } from '@well-known-components/fetch-component'
import { createMetricsComponent } from '@well-known-components/metrics'
import { createPgComponent } from '@well-known-components/pg-component'
import path from 'path'
import { metricDeclarations } from './metrics'
import { AppComponents, GlobalContext } from './types'
import { createDbAdapter } from './adapters/db'
import { createIntentsAdapter } from './adapters/intents'
import { loadBridgeConfig } from './logic/bridge-config'
import { createUserIdTemplateComponent } from './logic/user-id-template'
import { createPuppetRegistryComponent } from './logic/puppet-registry'
import { createMediaReuploaderComponent } from './logic/media-reuploader'
import { createProfileSynchronizerComponent } from './logic/profile-synchronizer'
import { createDoublePuppetComponent } from './logic/double-puppet'
import { createPuppetIntentsComponent } from './logic/puppet-intents'
import { createCustomPuppetsStarterComponent } from './logic/custom-puppets-starter'

// Initialize all the components of the app
export async function initComponents(): Promise<AppComponents> {
  const config = await createDotEnvConfigComponent(
    { path: ['.env.default', '.env'] },
    {
      LOG_LEVEL: 'ALL'
    }
  )
  const logs = await createLogComponent({ config })

  const logger = logs.getLogger('components')
  const commitHash = (await config.getString('COMMIT_HASH')) || 'unknown'
  logger.info(`Initializing components. Version: ${commitHash}`)

  const bridgeConfig = await loadBridgeConfig(config)

  const server = await createServerComponent<GlobalContext>({ config, logs }, {})
  const statusChecks = await createStatusCheckComponent({ server, config })
  const fetch = createFetchComponent()
  const metrics = await createMetricsComponent(metricDeclarations, { config })
  await instrumentHttpServerWithPromClientRegistry({ server, metrics, config, registry: metrics.registry! })

  let databaseUrl: string | undefined = await config.getString('PG_COMPONENT_PSQL_CONNECTION_STRING')
  if (!databaseUrl) {
    const dbUser = await config.requireString('PG_COMPONENT_PSQL_USER')
    const dbDatabaseName = await config.requireString('PG_COMPONENT_PSQL_DATABASE')
    const dbPort = await config.requireString('PG_COMPONENT_PSQL_PORT')
    const dbHost = await config.requireString('PG_COMPONENT_PSQL_HOST')
    const dbPassword = await config.requireString('PG_COMPONENT_PSQL_PASSWORD')
    databaseUrl = `postgres://${dbUser}:${dbPassword}@${dbHost}:${dbPort}/${dbDatabaseName}`
  }

  const pg = await createPgComponent(
    { logs, config, metrics },
    {
      migration: {
        databaseUrl,
        dir: path.resolve(__dirname, 'migrations'),
        migrationsTable: 'pgmigrations',
        ignorePattern: '.*\\.map',
        direction: 'up'
      }
    }
  )

  const db = createDbAdapter({ pg })
  const intents = await createIntentsAdapter({ config, fetch, logs })
  const userIdTemplate = createUserIdTemplateComponent({ bridgeConfig })
  const puppetRegistry = createPuppetRegistryComponent({ db, logs, metrics, userIdTemplate })
  const mediaReuploader = createMediaReuploaderComponent({ fetch, logs, metrics })
  const profileSynchronizer = createProfileSynchronizerComponent({
    logs,
    metrics,
    bridgeConfig,
    intents,
    mediaReuploader,
    puppetRegistry
  })
  const doublePuppet = createDoublePuppetComponent({ fetch, logs, metrics, bridgeConfig })
  const puppetIntents = createPuppetIntentsComponent({ intents, doublePuppet, bridgeConfig })
  const customPuppetsStarter = createCustomPuppetsStarterComponent({ logs, metrics, puppetRegistry, doublePuppet })

  return {
    config,
    bridgeConfig,
    fetch,
    logs,
    metrics,
    server,
    statusChecks,
    pg,
    db,
    intents,
    userIdTemplate,
    puppetRegistry,
    mediaReuploader,
    profileSynchronizer,
    doublePuppet,
    puppetIntents,
    customPuppetsStarter
  }
}
