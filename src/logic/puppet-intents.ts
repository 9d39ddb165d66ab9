import { AppComponents, IGhostIntent, IPuppetIntentsComponent, PortalContext, Puppet } from '../types'

export function createPuppetIntentsComponent({
  intents,
  doublePuppet,
  bridgeConfig
}: Pick<AppComponents, 'intents' | 'doublePuppet' | 'bridgeConfig'>): IPuppetIntentsComponent {
  function defaultIntentFor(puppet: Puppet.Instance): IGhostIntent {
    return intents.user(puppet.defaultUserId)
  }

  /**
   * The ghost acts in its own direct chat and, when configured, during backfill. Anywhere else a double
   * puppeted user acts as their real account once its session is up.
   */
  function intentFor(puppet: Puppet.Instance, portal: PortalContext): IGhostIntent {
    if (
      portal.otherUserKey === puppet.remoteUserKey ||
      (portal.isBackfilling && bridgeConfig.backfillInviteOwnPuppet)
    ) {
      return defaultIntentFor(puppet)
    }

    if (puppet.customUserId && doublePuppet.getSession(puppet.customUserId)) {
      return intents.user(puppet.customUserId)
    }

    return defaultIntentFor(puppet)
  }

  return {
    defaultIntentFor,
    intentFor
  }
}
