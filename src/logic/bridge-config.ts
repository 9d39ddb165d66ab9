import Ajv, { JSONSchemaType } from 'ajv'
import { IConfigComponent } from '@well-known-components/interfaces'
import { BridgeConfig, ConfigError, DISPLAYNAME_FIELDS, DisplaynameField } from '../types'

export const DEFAULT_USERNAME_TEMPLATE = 'linkedin_{userid}'
export const DEFAULT_DISPLAYNAME_PREFERENCE = 'name,first_name'
export const DEFAULT_DISPLAYNAME_TEMPLATE = '{displayname} (LinkedIn)'

const stringMapSchema: JSONSchemaType<Record<string, string>> = {
  type: 'object',
  additionalProperties: { type: 'string' },
  required: []
}

const ajv = new Ajv()
const validateStringMap = ajv.compile(stringMapSchema)

function isDisplaynameField(value: string): value is DisplaynameField {
  return DISPLAYNAME_FIELDS.some((field) => field === value)
}

export function parseDisplaynamePreference(value: string): DisplaynameField[] {
  const fields = value
    .split(',')
    .map((field) => field.trim())
    .filter(Boolean)

  return fields.map((field) => {
    if (!isDisplaynameField(field)) {
      throw new ConfigError(
        `Unknown displayname field "${field}", expected one of ${DISPLAYNAME_FIELDS.join(', ')}`,
        'displaynamePreference'
      )
    }
    return field
  })
}

export function parseStringMap(value: string | undefined, option: string): ReadonlyMap<string, string> {
  if (!value) {
    return new Map()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(value)
  } catch (error: any) {
    throw new ConfigError(`${option} is not valid JSON: ${error?.message || 'Unknown error'}`, option)
  }

  if (!validateStringMap(parsed)) {
    throw new ConfigError(`${option} must be an object of strings: ${ajv.errorsText(validateStringMap.errors)}`, option)
  }

  return new Map(Object.entries(parsed))
}

async function getBoolean(config: IConfigComponent, key: string): Promise<boolean> {
  return (await config.getString(key)) === 'true'
}

/**
 * Reads the bridge options once at startup. Components receive the resulting struct, nothing reads the
 * options again afterwards.
 */
export async function loadBridgeConfig(config: IConfigComponent): Promise<BridgeConfig> {
  const homeserverDomain = await config.requireString('HOMESERVER_DOMAIN')

  return {
    homeserverDomain,
    usernameTemplate: (await config.getString('BRIDGE_USERNAME_TEMPLATE')) || DEFAULT_USERNAME_TEMPLATE,
    displaynamePreference: parseDisplaynamePreference(
      (await config.getString('BRIDGE_DISPLAYNAME_PREFERENCE')) || DEFAULT_DISPLAYNAME_PREFERENCE
    ),
    displaynameTemplate: (await config.getString('BRIDGE_DISPLAYNAME_TEMPLATE')) || DEFAULT_DISPLAYNAME_TEMPLATE,
    syncWithCustomPuppets: await getBoolean(config, 'BRIDGE_SYNC_WITH_CUSTOM_PUPPETS'),
    backfillInviteOwnPuppet: await getBoolean(config, 'BRIDGE_BACKFILL_INVITE_OWN_PUPPET'),
    doublePuppetServerMap: parseStringMap(
      await config.getString('BRIDGE_DOUBLE_PUPPET_SERVER_MAP'),
      'BRIDGE_DOUBLE_PUPPET_SERVER_MAP'
    ),
    doublePuppetAllowDiscovery: await getBoolean(config, 'BRIDGE_DOUBLE_PUPPET_ALLOW_DISCOVERY'),
    loginSharedSecretMap: parseStringMap(
      await config.getString('BRIDGE_LOGIN_SHARED_SECRET_MAP'),
      'BRIDGE_LOGIN_SHARED_SECRET_MAP'
    )
  }
}
