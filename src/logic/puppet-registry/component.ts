import { AppComponents, IPuppetRegistryComponent, Puppet } from '../../types'
import { createKeyedLock } from '../../utils/keyed-lock'
import { createEmptyPuppet, toDbEntity } from './types'

/**
 * Owns the in-memory puppet instances.
 *
 * Every instance handed out is indexed by its remote user key and, when double puppeted, by its custom
 * user id. Lookups are serialized per key so a remote user never ends up with two instances.
 */
export function createPuppetRegistryComponent({
  db,
  logs,
  metrics,
  userIdTemplate
}: Pick<AppComponents, 'db' | 'logs' | 'metrics' | 'userIdTemplate'>): IPuppetRegistryComponent {
  const logger = logs.getLogger('puppet-registry')

  const byRemoteKey = new Map<string, Puppet.Instance>()
  const byCustomUserId = new Map<string, Puppet.Instance>()

  const remoteKeyLock = createKeyedLock()
  const customUserIdLock = createKeyedLock()

  function toInstance(entity: Puppet.DbEntity): Puppet.Instance {
    return {
      ...entity,
      defaultUserId: userIdTemplate.format(entity.remoteUserKey),
      lastInfoSyncAt: null
    }
  }

  function addToCache(puppet: Puppet.Instance): void {
    byRemoteKey.set(puppet.remoteUserKey, puppet)
    if (puppet.customUserId) {
      byCustomUserId.set(puppet.customUserId, puppet)
    }
  }

  // a stored record for a remote key that is already in memory never replaces the live instance
  function adopt(entity: Puppet.DbEntity): Puppet.Instance {
    const cached = byRemoteKey.get(entity.remoteUserKey)
    if (cached) {
      return cached
    }

    const puppet = toInstance(entity)
    addToCache(puppet)
    return puppet
  }

  async function getByRemoteKey(
    remoteUserKey: string,
    options: Puppet.LookupOptions = {}
  ): Promise<Puppet.Instance | null> {
    const { create = true } = options

    return remoteKeyLock.withLock(remoteUserKey, async () => {
      const cached = byRemoteKey.get(remoteUserKey)
      if (cached) {
        metrics.increment('puppets_retrieved_from_cache', {}, 1)
        return cached
      }

      const stored = await db.getPuppetByRemoteKey(remoteUserKey)
      if (stored) {
        metrics.increment('puppets_retrieved_from_database', {}, 1)
        return adopt(stored)
      }

      if (!create) {
        return null
      }

      const puppet = toInstance(createEmptyPuppet(remoteUserKey))
      await db.insertPuppet(toDbEntity(puppet))
      addToCache(puppet)

      metrics.increment('puppets_created_count', {}, 1)
      logger.info('Puppet created', { remoteUserKey, userId: puppet.defaultUserId })

      return puppet
    })
  }

  async function getByUserId(userId: string, options: Puppet.LookupOptions = {}): Promise<Puppet.Instance | null> {
    const remoteUserKey = userIdTemplate.parse(userId)
    if (!remoteUserKey) {
      return null
    }

    return getByRemoteKey(remoteUserKey, options)
  }

  async function getByCustomUserId(userId: string): Promise<Puppet.Instance | null> {
    return customUserIdLock.withLock(userId, async () => {
      const cached = byCustomUserId.get(userId)
      if (cached) {
        metrics.increment('puppets_retrieved_from_cache', {}, 1)
        return cached
      }

      const stored = await db.getPuppetByCustomUserId(userId)
      if (!stored) {
        return null
      }

      metrics.increment('puppets_retrieved_from_database', {}, 1)
      const puppet = adopt(stored)

      // the live instance was re-linked after the record was written
      if (puppet.customUserId !== userId) {
        logger.debug('Stored custom user id is stale', {
          userId,
          remoteUserKey: puppet.remoteUserKey,
          currentCustomUserId: puppet.customUserId || ''
        })
        return null
      }

      return puppet
    })
  }

  async function* getAllWithCustomUserId(): AsyncGenerator<Puppet.Instance> {
    const stored = await db.getPuppetsWithCustomUserId()
    logger.debug('Puppets with custom user id loaded', { count: stored.length })

    for (const entity of stored) {
      yield adopt(entity)
    }
  }

  async function save(puppet: Puppet.Instance): Promise<void> {
    await db.updatePuppet(toDbEntity(puppet))
  }

  async function setCustomUserId(puppet: Puppet.Instance, userId: string | null): Promise<void> {
    if (puppet.customUserId === userId) {
      return
    }

    // an account is double puppeted by one puppet at most, the previous holder is unlinked first
    const previousHolder = userId ? byCustomUserId.get(userId) : undefined
    if (userId && previousHolder && previousHolder !== puppet) {
      byCustomUserId.delete(userId)
      previousHolder.customUserId = null
      previousHolder.syncToken = null
      logger.info('Custom user id moved to another puppet', {
        userId,
        previousRemoteUserKey: previousHolder.remoteUserKey,
        remoteUserKey: puppet.remoteUserKey
      })
      await save(previousHolder)
    }

    const previousUserId = puppet.customUserId
    if (previousUserId && byCustomUserId.get(previousUserId) === puppet) {
      byCustomUserId.delete(previousUserId)
    }

    puppet.customUserId = userId
    // the cursor belonged to the previous account's sync
    puppet.syncToken = null
    addToCache(puppet)

    logger.info('Custom user id changed', {
      remoteUserKey: puppet.remoteUserKey,
      previousUserId: previousUserId || '',
      userId: userId || ''
    })

    await save(puppet)
  }

  async function saveSyncToken(puppet: Puppet.Instance, syncToken: string | null): Promise<void> {
    puppet.syncToken = syncToken
    await save(puppet)
  }

  return {
    getByRemoteKey,
    getByUserId,
    getByCustomUserId,
    getAllWithCustomUserId,
    setCustomUserId,
    saveSyncToken,
    save
  }
}
