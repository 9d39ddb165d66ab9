import Ajv, { JSONSchemaType } from 'ajv'
import { AppComponents, DoublePuppetError, DoublePuppetSession, IDoublePuppetComponent, Puppet } from '../types'

type WellKnownClient = {
  'm.homeserver': {
    base_url: string
  }
}

const wellKnownClientSchema: JSONSchemaType<WellKnownClient> = {
  type: 'object',
  properties: {
    'm.homeserver': {
      type: 'object',
      properties: {
        base_url: { type: 'string' }
      },
      required: ['base_url']
    }
  },
  required: ['m.homeserver']
}

const validateWellKnownClient = new Ajv().compile(wellKnownClientSchema)

export function getServerName(userId: string): string | null {
  const separator = userId.indexOf(':')
  if (!userId.startsWith('@') || separator === -1 || separator === userId.length - 1) {
    return null
  }
  return userId.slice(separator + 1)
}

/**
 * Prepares double puppet sessions for puppets linked to a real Matrix account. Logging in as that account
 * and running its sync loop belong to the transport; this component only works out where the account
 * lives and what the bridge is allowed to do with it.
 */
export function createDoublePuppetComponent({
  fetch,
  logs,
  metrics,
  bridgeConfig
}: Pick<AppComponents, 'fetch' | 'logs' | 'metrics' | 'bridgeConfig'>): IDoublePuppetComponent {
  const logger = logs.getLogger('double-puppet')
  const sessions = new Map<string, DoublePuppetSession>()

  async function discoverHomeserver(serverName: string): Promise<string | null> {
    const url = `https://${serverName}/.well-known/matrix/client`
    try {
      const response = await fetch.fetch(url)
      if (!response.ok) {
        logger.debug('Homeserver discovery failed', { serverName, status: response.status })
        return null
      }

      const body: unknown = await response.json()
      if (!validateWellKnownClient(body)) {
        logger.warn('Invalid well-known client document', { serverName })
        return null
      }

      return body['m.homeserver'].base_url
    } catch (error: any) {
      logger.warn('Homeserver discovery failed', { serverName, error: error?.message || 'Unknown error' })
      return null
    }
  }

  async function resolveHomeserverUrl(userId: string, serverName: string): Promise<string> {
    const mapped = bridgeConfig.doublePuppetServerMap.get(serverName)
    if (mapped) {
      return mapped
    }

    if (bridgeConfig.doublePuppetAllowDiscovery) {
      const discovered = await discoverHomeserver(serverName)
      if (discovered) {
        return discovered
      }
    }

    throw new DoublePuppetError(`No homeserver URL known for ${serverName}`, userId)
  }

  async function tryStart(puppet: Puppet.Instance): Promise<DoublePuppetSession | null> {
    const userId = puppet.customUserId
    if (!userId) {
      return null
    }

    const serverName = getServerName(userId)
    if (!serverName) {
      throw new DoublePuppetError(`Invalid custom user id ${userId}`, userId)
    }

    const homeserverUrl = (await resolveHomeserverUrl(userId, serverName)).replace(/\/+$/, '')
    const session: DoublePuppetSession = {
      userId,
      remoteUserKey: puppet.remoteUserKey,
      homeserverUrl,
      syncToken: puppet.syncToken,
      syncEnabled: bridgeConfig.syncWithCustomPuppets,
      canLogin: bridgeConfig.loginSharedSecretMap.has(serverName)
    }

    sessions.set(userId, session)
    metrics.increment('custom_puppets_started_count', { result: 'ok' }, 1)
    logger.info('Double puppet session ready', {
      userId,
      remoteUserKey: puppet.remoteUserKey,
      homeserverUrl,
      syncEnabled: String(session.syncEnabled)
    })

    return session
  }

  function getSession(userId: string): DoublePuppetSession | undefined {
    return sessions.get(userId)
  }

  function getSessions(): DoublePuppetSession[] {
    return Array.from(sessions.values())
  }

  return {
    tryStart,
    getSession,
    getSessions
  }
}
