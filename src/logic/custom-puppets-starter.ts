import { AppComponents, CustomPuppetStartResult, ICustomPuppetsStarterComponent, Puppet } from '../types'

/**
 * Starts the double puppet session of every puppet linked to a real account when the bridge starts.
 * Sessions start independently; one failing doesn't hold back the others.
 */
export function createCustomPuppetsStarterComponent({
  logs,
  metrics,
  puppetRegistry,
  doublePuppet
}: Pick<AppComponents, 'logs' | 'metrics' | 'puppetRegistry' | 'doublePuppet'>): ICustomPuppetsStarterComponent {
  const logger = logs.getLogger('custom-puppets-starter')
  let inFlight: Promise<CustomPuppetStartResult[]> | undefined

  async function startPuppet(puppet: Puppet.Instance): Promise<CustomPuppetStartResult> {
    try {
      const session = await doublePuppet.tryStart(puppet)
      return { remoteUserKey: puppet.remoteUserKey, ok: true, session }
    } catch (error: any) {
      logger.warn('Failed to start double puppet', {
        remoteUserKey: puppet.remoteUserKey,
        userId: puppet.customUserId || '',
        error: error?.message || 'Unknown error'
      })
      metrics.increment('custom_puppets_started_count', { result: 'failed' }, 1)
      return { remoteUserKey: puppet.remoteUserKey, ok: false, error: error?.message || 'Unknown error' }
    }
  }

  async function startAll(): Promise<CustomPuppetStartResult[]> {
    const tasks: Promise<CustomPuppetStartResult>[] = []
    for await (const puppet of puppetRegistry.getAllWithCustomUserId()) {
      tasks.push(startPuppet(puppet))
    }

    const results = await Promise.all(tasks)
    logger.info('Double puppets started', {
      total: results.length,
      failed: results.filter((result) => !result.ok).length
    })

    return results
  }

  // runs in the background, stop() waits for it
  function launch(): void {
    inFlight = startAll().catch((error: any) => {
      logger.error('Failed to load double puppets', { error: error?.message || 'Unknown error' })
      return []
    })
  }

  async function stop(): Promise<void> {
    await inFlight
  }

  return {
    startAll,
    launch,
    stop
  }
}
