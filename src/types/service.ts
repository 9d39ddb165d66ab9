import { IBaseComponent } from '@well-known-components/interfaces'
import {
  CustomPuppetStartResult,
  DoublePuppetSession,
  PortalContext,
  ProfileSyncResult,
  Puppet,
  RemoteProfile,
  SyncSource
} from './types'

export interface IDbComponent {
  getPuppetByRemoteKey(remoteUserKey: string): Promise<Puppet.DbEntity | null>
  getPuppetByCustomUserId(userId: string): Promise<Puppet.DbEntity | null>
  getPuppetsWithCustomUserId(): Promise<Puppet.DbEntity[]>
  insertPuppet(puppet: Puppet.DbEntity): Promise<void>
  updatePuppet(puppet: Puppet.DbEntity): Promise<void>
}

/**
 * Acts on the homeserver as a single user. For ghosts this is the
 * application service masquerading as the ghost.
 */
export interface IGhostIntent {
  readonly userId: string
  ensureRegistered(): Promise<void>
  setDisplayName(displayName: string): Promise<void>
  setAvatarUrl(contentUri: string): Promise<void>
  uploadMedia(data: Buffer, mimeType: string): Promise<string>
}

export interface IIntentsComponent {
  user(userId: string): IGhostIntent
}

export interface IUserIdTemplateComponent {
  /**
   * Builds the full local user id for a remote user key.
   */
  format(remoteUserKey: string): string

  /**
   * Reverse of `format`. Returns null when the user id does not have the shape of a ghost of this bridge.
   */
  parse(userId: string): string | null
}

export interface IPuppetRegistryComponent {
  getByRemoteKey(remoteUserKey: string, options?: Puppet.LookupOptions): Promise<Puppet.Instance | null>
  getByUserId(userId: string, options?: Puppet.LookupOptions): Promise<Puppet.Instance | null>
  getByCustomUserId(userId: string): Promise<Puppet.Instance | null>
  getAllWithCustomUserId(): AsyncGenerator<Puppet.Instance>
  setCustomUserId(puppet: Puppet.Instance, userId: string | null): Promise<void>
  saveSyncToken(puppet: Puppet.Instance, syncToken: string | null): Promise<void>
  save(puppet: Puppet.Instance): Promise<void>
}

export interface IProfileSynchronizerComponent {
  updateInfo(
    puppet: Puppet.Instance,
    source: SyncSource | null,
    info: RemoteProfile.Info | null | undefined,
    options?: { updateAvatar?: boolean }
  ): Promise<ProfileSyncResult>
}

export interface IMediaReuploaderComponent {
  reupload(intent: IGhostIntent, url: string): Promise<string>
}

export interface IDoublePuppetComponent {
  tryStart(puppet: Puppet.Instance): Promise<DoublePuppetSession | null>
  getSession(userId: string): DoublePuppetSession | undefined
  getSessions(): DoublePuppetSession[]
}

export interface IPuppetIntentsComponent {
  defaultIntentFor(puppet: Puppet.Instance): IGhostIntent
  intentFor(puppet: Puppet.Instance, portal: PortalContext): IGhostIntent
}

export interface ICustomPuppetsStarterComponent extends IBaseComponent {
  startAll(): Promise<CustomPuppetStartResult[]>
  launch(): void
}
