import { validateMetricsDeclaration } from '@well-known-components/metrics'
import { metricDeclarations as logMetricDeclarations } from '@well-known-components/logger'
import { metricDeclarations as pgMetricDeclarations } from '@well-known-components/pg-component'
import { getDefaultHttpMetrics } from '@well-known-components/http-server'
import { IMetricsComponent } from '@well-known-components/interfaces'

export const metricDeclarations = {
  ...getDefaultHttpMetrics(),
  ...pgMetricDeclarations,
  ...logMetricDeclarations,
  puppets_created_count: {
    help: 'Count of puppets created for remote users seen for the first time',
    type: IMetricsComponent.CounterType
  },
  puppets_retrieved_from_cache: {
    help: 'Count of puppet lookups served from memory',
    type: IMetricsComponent.CounterType
  },
  puppets_retrieved_from_database: {
    help: 'Count of puppet lookups served from the database',
    type: IMetricsComponent.CounterType
  },
  profile_syncs_count: {
    help: 'Count of profile synchronizations by result',
    type: IMetricsComponent.CounterType,
    labelNames: ['result']
  },
  avatar_reuploads_count: {
    help: 'Count of avatars downloaded and uploaded to the homeserver',
    type: IMetricsComponent.CounterType
  },
  custom_puppets_started_count: {
    help: 'Count of double puppet start attempts by result',
    type: IMetricsComponent.CounterType,
    labelNames: ['result']
  }
}

// type assertions
validateMetricsDeclaration(metricDeclarations)
