export namespace Puppet {
  export type DbEntity = {
    remoteUserKey: string
    displayName: string | null
    photoId: string | null
    photoRef: string | null
    nameApplied: boolean
    avatarApplied: boolean
    isRegistered: boolean
    customUserId: string | null
    syncToken: string | null
  }

  export type Instance = Omit<DbEntity, 'remoteUserKey'> & {
    readonly remoteUserKey: string
    // ghost user id built from the username template, never persisted
    readonly defaultUserId: string
    lastInfoSyncAt: number | null
  }

  export type LookupOptions = {
    create?: boolean
  }
}

export namespace RemoteProfile {
  export type ImageArtifact = {
    width?: number
    height?: number
    fileIdentifyingUrlPathSegment: string
    expiresAt?: number
  }

  export type VectorImage = {
    rootUrl?: string
    artifacts?: ImageArtifact[]
  }

  export type MiniProfile = {
    firstName?: string | null
    lastName?: string | null
    picture?: {
      'com.linkedin.common.VectorImage'?: VectorImage
    }
  }

  export type Info = {
    miniProfile?: MiniProfile
  }
}

export type DisplaynameField = 'displayname' | 'name' | 'first_name' | 'last_name'

export const DISPLAYNAME_FIELDS: readonly DisplaynameField[] = ['displayname', 'name', 'first_name', 'last_name']

export type BridgeConfig = {
  homeserverDomain: string
  usernameTemplate: string
  displaynamePreference: DisplaynameField[]
  displaynameTemplate: string
  syncWithCustomPuppets: boolean
  backfillInviteOwnPuppet: boolean
  doublePuppetServerMap: ReadonlyMap<string, string>
  doublePuppetAllowDiscovery: boolean
  loginSharedSecretMap: ReadonlyMap<string, string>
}

/**
 * The user whose session delivered the profile data being synchronized.
 */
export type SyncSource = {
  remoteUserKey: string
}

export type ProfileSyncResult = {
  puppet: Puppet.Instance
  changed: boolean
  ok: boolean
  errors: string[]
}

export type PortalContext = {
  // remote key of the other participant of a direct chat, if any
  otherUserKey: string | null
  isBackfilling: boolean
}

export type DoublePuppetSession = {
  userId: string
  remoteUserKey: string
  homeserverUrl: string
  syncToken: string | null
  syncEnabled: boolean
  canLogin: boolean
}

export type CustomPuppetStartResult =
  | { remoteUserKey: string; ok: true; session: DoublePuppetSession | null }
  | { remoteUserKey: string; ok: false; error: string }
