import { DisplaynameField, RemoteProfile } from '../types'

/**
 * Matches profile picture root URLs such as
 * `https://media.licdn.com/dms/image/C4D03AQH/profile-displayphoto-shrink_` and captures the image
 * identifier (`C4D03AQH`). The identifier only changes when the user uploads a new picture, so it
 * works as the avatar's version token.
 */
export const PHOTO_ID_PATTERN = /^https:\/\/.*?\/image\/(.*?)\/profile-/

export type DisplaynameFields = Record<DisplaynameField, string | null>

export function getDisplaynameFields(info: RemoteProfile.Info): DisplaynameFields {
  const profile = info.miniProfile || {}
  const firstName = profile.firstName || null
  const lastName = profile.lastName || null
  const name = [firstName, lastName].filter(Boolean).join(' ')

  return {
    displayname: null,
    name: name || null,
    first_name: firstName,
    last_name: lastName
  }
}

export function renderDisplaynameTemplate(template: string, fields: DisplaynameFields): string {
  return template.replace(/\{(displayname|name|first_name|last_name)\}/g, (_, field: DisplaynameField) => {
    return fields[field] || ''
  })
}

/**
 * Picks the first field of `preference` holding a value as the display name, then renders the template.
 */
export function getDisplayname(info: RemoteProfile.Info, preference: DisplaynameField[], template: string): string {
  const fields = getDisplaynameFields(info)

  for (const field of preference) {
    const value = fields[field]
    if (value) {
      fields.displayname = value
      break
    }
  }

  return renderDisplaynameTemplate(template, fields)
}

export function getVectorImage(info: RemoteProfile.Info): RemoteProfile.VectorImage | undefined {
  return info.miniProfile?.picture?.['com.linkedin.common.VectorImage']
}

export function extractPhotoId(rootUrl: string | null | undefined): string | null {
  if (!rootUrl) {
    return null
  }

  const match = PHOTO_ID_PATTERN.exec(rootUrl)
  return match?.[1] || null
}

// narrowest variant among those with a width, the first listed one when none has it
export function selectAvatarArtifact(image: RemoteProfile.VectorImage): RemoteProfile.ImageArtifact | undefined {
  const artifacts = image.artifacts || []

  const narrowest = artifacts.reduce<RemoteProfile.ImageArtifact | undefined>((selected, artifact) => {
    if (artifact.width === undefined) {
      return selected
    }

    if (!selected || selected.width === undefined || artifact.width < selected.width) {
      return artifact
    }

    return selected
  }, undefined)

  return narrowest || artifacts[0]
}
