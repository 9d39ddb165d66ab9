import { AppComponents, ConfigError, IUserIdTemplateComponent } from '../../types'
import { USER_ID_PLACEHOLDER } from './types'

/**
 * Maps remote user keys to ghost user ids and back.
 *
 * A template such as `linkedin_{userid}` on the `example.org` homeserver turns the key `abc` into
 * `@linkedin_abc:example.org`. Parsing strips the same fixed prefix and suffix, so
 * `parse(format(key)) === key` for every non-empty key.
 */
export function createUserIdTemplateComponent({
  bridgeConfig
}: Pick<AppComponents, 'bridgeConfig'>): IUserIdTemplateComponent {
  const { usernameTemplate, homeserverDomain } = bridgeConfig
  const parts = usernameTemplate.split(USER_ID_PLACEHOLDER)

  if (parts.length !== 2) {
    throw new ConfigError(
      `Username template must contain exactly one ${USER_ID_PLACEHOLDER} placeholder, got "${usernameTemplate}"`,
      'usernameTemplate'
    )
  }

  const [before, after] = parts
  const prefix = `@${before}`
  const suffix = `${after}:${homeserverDomain}`

  function format(remoteUserKey: string): string {
    return `${prefix}${remoteUserKey}${suffix}`
  }

  function parse(userId: string): string | null {
    if (userId.length <= prefix.length + suffix.length) {
      return null
    }

    if (!userId.startsWith(prefix) || !userId.endsWith(suffix)) {
      return null
    }

    return userId.slice(prefix.length, userId.length - suffix.length)
  }

  return {
    format,
    parse
  }
}
