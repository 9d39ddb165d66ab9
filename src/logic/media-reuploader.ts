import { AppComponents, FetchError, IGhostIntent, IMediaReuploaderComponent } from '../types'
import { detectMimeType } from '../utils/mime'

export function createMediaReuploaderComponent({
  fetch,
  logs,
  metrics
}: Pick<AppComponents, 'fetch' | 'logs' | 'metrics'>): IMediaReuploaderComponent {
  const logger = logs.getLogger('media-reuploader')

  /**
   * Downloads the file at `url` and uploads it to the homeserver's content repository as `intent`.
   * The content type is sniffed from the downloaded bytes, the response headers are ignored.
   *
   * @returns the `mxc://` URI of the uploaded content
   * @throws FetchError when the download does not succeed
   */
  async function reupload(intent: IGhostIntent, url: string): Promise<string> {
    const response = await fetch.fetch(url)

    if (!response.ok) {
      logger.warn('Failed to download media', { url, status: response.status })
      throw new FetchError(url, response.status)
    }

    const data = Buffer.from(await response.arrayBuffer())
    const mimeType = await detectMimeType(data)
    const contentUri = await intent.uploadMedia(data, mimeType)

    logger.debug('Media reuploaded', { url, userId: intent.userId, mimeType, size: data.length, contentUri })
    metrics.increment('avatar_reuploads_count', {}, 1)

    return contentUri
  }

  return {
    reupload
  }
}
