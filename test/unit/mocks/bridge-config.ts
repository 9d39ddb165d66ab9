import { BridgeConfig } from '../../../src/types'

export function createBridgeConfigMock(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    homeserverDomain: 'example.org',
    usernameTemplate: 'linkedin_{userid}',
    displaynamePreference: ['name', 'first_name'],
    displaynameTemplate: '{displayname} (LinkedIn)',
    syncWithCustomPuppets: false,
    backfillInviteOwnPuppet: true,
    doublePuppetServerMap: new Map(),
    doublePuppetAllowDiscovery: false,
    loginSharedSecretMap: new Map(),
    ...overrides
  }
}
