import {
  AppComponents,
  IGhostIntent,
  IProfileSynchronizerComponent,
  ProfileSyncResult,
  Puppet,
  RemoteProfile,
  SyncSource
} from '../../types'
import { extractPhotoId, getDisplayname, getVectorImage, selectAvatarArtifact } from '../profile-info'
import { UpdateInfoOptions } from './types'

/**
 * Pushes remote profile changes (display name and avatar) to the puppet's ghost.
 *
 * A push that fails leaves the matching `*Applied` flag false, so the next update with the same data
 * retries it instead of considering the puppet up to date.
 */
export function createProfileSynchronizerComponent({
  logs,
  metrics,
  bridgeConfig,
  intents,
  mediaReuploader,
  puppetRegistry
}: Pick<
  AppComponents,
  'logs' | 'metrics' | 'bridgeConfig' | 'intents' | 'mediaReuploader' | 'puppetRegistry'
>): IProfileSynchronizerComponent {
  const logger = logs.getLogger('profile-synchronizer')

  async function ensureRegistered(puppet: Puppet.Instance, intent: IGhostIntent, errors: string[]): Promise<boolean> {
    if (puppet.isRegistered) {
      return false
    }

    try {
      await intent.ensureRegistered()
      puppet.isRegistered = true
      return true
    } catch (error: any) {
      logger.warn('Failed to register ghost', { userId: intent.userId, error: error?.message || 'Unknown error' })
      errors.push(`register: ${error?.message || 'Unknown error'}`)
      return false
    }
  }

  async function updateName(
    puppet: Puppet.Instance,
    intent: IGhostIntent,
    info: RemoteProfile.Info,
    errors: string[]
  ): Promise<boolean> {
    const displayName = getDisplayname(info, bridgeConfig.displaynamePreference, bridgeConfig.displaynameTemplate)
    if (displayName === puppet.displayName && puppet.nameApplied) {
      return false
    }

    puppet.displayName = displayName
    try {
      await intent.setDisplayName(displayName)
      puppet.nameApplied = true
    } catch (error: any) {
      logger.warn('Failed to set displayname', { userId: intent.userId, error: error?.message || 'Unknown error' })
      errors.push(`displayname: ${error?.message || 'Unknown error'}`)
      puppet.nameApplied = false
    }

    return true
  }

  async function reuploadAvatar(intent: IGhostIntent, image: RemoteProfile.VectorImage, rootUrl: string): Promise<string> {
    const artifact = selectAvatarArtifact(image)
    if (!artifact) {
      throw new Error('Profile picture has no artifacts')
    }

    return mediaReuploader.reupload(intent, rootUrl + artifact.fileIdentifyingUrlPathSegment)
  }

  async function updatePhoto(
    puppet: Puppet.Instance,
    intent: IGhostIntent,
    image: RemoteProfile.VectorImage | undefined,
    errors: string[]
  ): Promise<boolean> {
    const rootUrl = image?.rootUrl
    const photoId = extractPhotoId(rootUrl)
    if (photoId === puppet.photoId && puppet.avatarApplied) {
      return false
    }

    puppet.photoId = photoId

    let photoRef = ''
    if (photoId && image && rootUrl) {
      try {
        photoRef = await reuploadAvatar(intent, image, rootUrl)
      } catch (error: any) {
        logger.warn('Failed to reupload avatar', {
          userId: intent.userId,
          photoId,
          error: error?.message || 'Unknown error'
        })
        errors.push(`avatar download: ${error?.message || 'Unknown error'}`)
        puppet.avatarApplied = false
        return true
      }
    }

    puppet.photoRef = photoRef
    try {
      await intent.setAvatarUrl(photoRef)
      puppet.avatarApplied = true
    } catch (error: any) {
      logger.warn('Failed to set avatar', { userId: intent.userId, error: error?.message || 'Unknown error' })
      errors.push(`avatar: ${error?.message || 'Unknown error'}`)
      puppet.avatarApplied = false
    }

    return true
  }

  async function updateInfo(
    puppet: Puppet.Instance,
    source: SyncSource | null,
    info: RemoteProfile.Info | null | undefined,
    options: UpdateInfoOptions = {}
  ): Promise<ProfileSyncResult> {
    const { updateAvatar = true } = options

    // fetching the profile when the event carried none is left to the caller
    if (!info || Object.keys(info).length === 0) {
      return { puppet, changed: false, ok: true, errors: [] }
    }

    const errors: string[] = []
    let changed = false
    puppet.lastInfoSyncAt = Date.now()

    try {
      const intent = intents.user(puppet.defaultUserId)

      if (await ensureRegistered(puppet, intent, errors)) {
        changed = true
      }

      if (await updateName(puppet, intent, info, errors)) {
        changed = true
      }

      if (updateAvatar && (await updatePhoto(puppet, intent, getVectorImage(info), errors))) {
        changed = true
      }

      if (changed) {
        await puppetRegistry.save(puppet)
      }
    } catch (error: any) {
      logger.error('Failed to update info', {
        remoteUserKey: puppet.remoteUserKey,
        source: source?.remoteUserKey || 'unknown',
        error: error?.message || 'Unknown error'
      })
      errors.push(error?.message || 'Unknown error')
    }

    const ok = errors.length === 0
    metrics.increment('profile_syncs_count', { result: ok ? 'ok' : 'failed' }, 1)
    if (!ok) {
      logger.info('Profile synchronized with errors', {
        remoteUserKey: puppet.remoteUserKey,
        source: source?.remoteUserKey || 'unknown',
        errors: errors.join('; ')
      })
    }

    return { puppet, changed, ok, errors }
  }

  return {
    updateInfo
  }
}
