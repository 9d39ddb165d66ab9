import { fromBuffer } from 'file-type'

export const FALLBACK_MIME_TYPE = 'application/octet-stream'

/**
 * Detects the MIME type from the magic number of the data. Unknown signatures map to
 * `application/octet-stream`.
 */
export async function detectMimeType(data: Buffer | Uint8Array): Promise<string> {
  const fileType = await fromBuffer(data)
  return fileType?.mime || FALLBACK_MIME_TYPE
}
