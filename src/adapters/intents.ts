import { AppComponents, IGhostIntent, IIntentsComponent, PushError } from '../types'

type RequestBody = { json: Record<string, unknown> } | { data: Buffer; contentType: string }

type MatrixError = {
  errcode?: string
  error?: string
}

function getLocalpart(userId: string): string {
  const separator = userId.indexOf(':')
  return userId.slice(1, separator === -1 ? undefined : separator)
}

function parseMatrixError(text: string): MatrixError {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return { error: text }
  }

  if (typeof parsed !== 'object' || parsed === null) {
    return {}
  }

  return {
    errcode: 'errcode' in parsed && typeof parsed.errcode === 'string' ? parsed.errcode : undefined,
    error: 'error' in parsed && typeof parsed.error === 'string' ? parsed.error : undefined
  }
}

/**
 * Application service access to the homeserver's client-server API. Requests are made with the
 * appservice token and masquerade as the target user through the `user_id` query parameter.
 */
export async function createIntentsAdapter({
  config,
  fetch,
  logs
}: Pick<AppComponents, 'config' | 'fetch' | 'logs'>): Promise<IIntentsComponent> {
  const logger = logs.getLogger('intents')
  const HOMESERVER_URL = (await config.requireString('HOMESERVER_URL')).replace(/\/+$/, '')
  const AS_TOKEN = await config.requireString('APPSERVICE_AS_TOKEN')

  async function request(
    userId: string,
    method: 'POST' | 'PUT',
    path: string,
    body?: RequestBody,
    masquerade: boolean = true
  ): Promise<unknown> {
    const url = new URL(`${HOMESERVER_URL}${path}`)
    if (masquerade) {
      url.searchParams.set('user_id', userId)
    }

    const headers: Record<string, string> = { Authorization: `Bearer ${AS_TOKEN}` }
    let payload: string | Buffer | undefined
    if (body && 'json' in body) {
      headers['Content-Type'] = 'application/json'
      payload = JSON.stringify(body.json)
    } else if (body) {
      headers['Content-Type'] = body.contentType
      payload = body.data
    }

    const response = await fetch.fetch(url.toString(), { method, headers, body: payload })
    const text = await response.text()

    if (!response.ok) {
      const matrixError = parseMatrixError(text)
      const detail = [matrixError.errcode, matrixError.error].filter(Boolean).join(' ')
      throw new PushError(
        `${method} ${path} failed with HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
        userId,
        response.status,
        matrixError.errcode
      )
    }

    if (!text) {
      return {}
    }

    try {
      return JSON.parse(text)
    } catch {
      throw new PushError(`${method} ${path} returned a body that is not JSON`, userId, response.status)
    }
  }

  function user(userId: string): IGhostIntent {
    const encodedUserId = encodeURIComponent(userId)

    async function ensureRegistered(): Promise<void> {
      try {
        await request(
          userId,
          'POST',
          '/_matrix/client/v3/register',
          { json: { type: 'm.login.application_service', username: getLocalpart(userId) } },
          false
        )
        logger.info('Ghost registered', { userId })
      } catch (error) {
        if (error instanceof PushError && error.errcode === 'M_USER_IN_USE') {
          return
        }
        throw error
      }
    }

    async function setDisplayName(displayName: string): Promise<void> {
      await request(userId, 'PUT', `/_matrix/client/v3/profile/${encodedUserId}/displayname`, {
        json: { displayname: displayName }
      })
    }

    async function setAvatarUrl(contentUri: string): Promise<void> {
      await request(userId, 'PUT', `/_matrix/client/v3/profile/${encodedUserId}/avatar_url`, {
        json: { avatar_url: contentUri }
      })
    }

    async function uploadMedia(data: Buffer, mimeType: string): Promise<string> {
      const result = await request(userId, 'POST', '/_matrix/media/v3/upload', { data, contentType: mimeType })
      const contentUri =
        typeof result === 'object' && result !== null && 'content_uri' in result ? result.content_uri : undefined
      if (typeof contentUri !== 'string') {
        throw new PushError('Upload response did not include a content URI', userId)
      }

      return contentUri
    }

    return {
      userId,
      ensureRegistered,
      setDisplayName,
      setAvatarUrl,
      uploadMedia
    }
  }

  return {
    user
  }
}
