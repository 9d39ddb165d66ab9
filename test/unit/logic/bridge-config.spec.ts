import { ConfigError } from '../../../src/types'
import { loadBridgeConfig, parseDisplaynamePreference, parseStringMap } from '../../../src/logic/bridge-config'
import { createConfigMockComponent } from '../mocks/config'

describe('bridge config', () => {
  describe('when loading with only the required options', () => {
    it('should apply the defaults', async () => {
      const bridgeConfig = await loadBridgeConfig(createConfigMockComponent({ HOMESERVER_DOMAIN: 'example.org' }))

      expect(bridgeConfig).toEqual({
        homeserverDomain: 'example.org',
        usernameTemplate: 'linkedin_{userid}',
        displaynamePreference: ['name', 'first_name'],
        displaynameTemplate: '{displayname} (LinkedIn)',
        syncWithCustomPuppets: false,
        backfillInviteOwnPuppet: false,
        doublePuppetServerMap: new Map(),
        doublePuppetAllowDiscovery: false,
        loginSharedSecretMap: new Map()
      })
    })
  })

  describe('when loading every option', () => {
    it('should read them all', async () => {
      const bridgeConfig = await loadBridgeConfig(
        createConfigMockComponent({
          HOMESERVER_DOMAIN: 'example.org',
          BRIDGE_USERNAME_TEMPLATE: 'li_{userid}_ghost',
          BRIDGE_DISPLAYNAME_PREFERENCE: 'first_name, last_name',
          BRIDGE_DISPLAYNAME_TEMPLATE: '{first_name} [LI]',
          BRIDGE_SYNC_WITH_CUSTOM_PUPPETS: 'true',
          BRIDGE_BACKFILL_INVITE_OWN_PUPPET: 'true',
          BRIDGE_DOUBLE_PUPPET_SERVER_MAP: '{"other.org":"https://matrix.other.org"}',
          BRIDGE_DOUBLE_PUPPET_ALLOW_DISCOVERY: 'true',
          BRIDGE_LOGIN_SHARED_SECRET_MAP: '{"example.org":"test-secret"}'
        })
      )

      expect(bridgeConfig).toEqual({
        homeserverDomain: 'example.org',
        usernameTemplate: 'li_{userid}_ghost',
        displaynamePreference: ['first_name', 'last_name'],
        displaynameTemplate: '{first_name} [LI]',
        syncWithCustomPuppets: true,
        backfillInviteOwnPuppet: true,
        doublePuppetServerMap: new Map([['other.org', 'https://matrix.other.org']]),
        doublePuppetAllowDiscovery: true,
        loginSharedSecretMap: new Map([['example.org', 'test-secret']])
      })
    })
  })

  describe('when the homeserver domain is missing', () => {
    it('should reject', async () => {
      await expect(loadBridgeConfig(createConfigMockComponent())).rejects.toThrow(
        'Configuration: string HOMESERVER_DOMAIN is required'
      )
    })
  })

  describe('when a boolean option is not exactly "true"', () => {
    it('should read it as false', async () => {
      const bridgeConfig = await loadBridgeConfig(
        createConfigMockComponent({ HOMESERVER_DOMAIN: 'example.org', BRIDGE_SYNC_WITH_CUSTOM_PUPPETS: 'yes' })
      )

      expect(bridgeConfig.syncWithCustomPuppets).toBe(false)
    })
  })

  describe('when parsing the displayname preference', () => {
    it('should ignore blank entries', () => {
      expect(parseDisplaynamePreference('name,, last_name ,')).toEqual(['name', 'last_name'])
    })

    it('should reject unknown fields', () => {
      expect(() => parseDisplaynamePreference('name,nickname')).toThrow(ConfigError)
      expect(() => parseDisplaynamePreference('name,nickname')).toThrow('Unknown displayname field "nickname"')
    })
  })

  describe('when parsing a string map', () => {
    it('should return an empty map for an absent value', () => {
      expect(parseStringMap(undefined, 'OPTION')).toEqual(new Map())
    })

    it.each([
      ['invalid json', '{not json'],
      ['an array', '["example.org"]'],
      ['non string values', '{"example.org": 1}']
    ])('should reject %s', (_, value) => {
      expect(() => parseStringMap(value, 'OPTION')).toThrow(ConfigError)
    })

    it('should name the option in the error', () => {
      let thrown: unknown
      try {
        parseStringMap('[]', 'BRIDGE_LOGIN_SHARED_SECRET_MAP')
      } catch (error) {
        thrown = error
      }

      expect(thrown).toBeInstanceOf(ConfigError)
      expect(thrown).toHaveProperty('option', 'BRIDGE_LOGIN_SHARED_SECRET_MAP')
    })
  })
})
