import { Puppet } from '../../types'

export type { IPuppetRegistryComponent } from '../../types/service'

export function createEmptyPuppet(remoteUserKey: string): Puppet.DbEntity {
  return {
    remoteUserKey,
    displayName: null,
    photoId: null,
    photoRef: null,
    nameApplied: false,
    avatarApplied: false,
    isRegistered: false,
    customUserId: null,
    syncToken: null
  }
}

export function toDbEntity(puppet: Puppet.Instance): Puppet.DbEntity {
  return {
    remoteUserKey: puppet.remoteUserKey,
    displayName: puppet.displayName,
    photoId: puppet.photoId,
    photoRef: puppet.photoRef,
    nameApplied: puppet.nameApplied,
    avatarApplied: puppet.avatarApplied,
    isRegistered: puppet.isRegistered,
    customUserId: puppet.customUserId,
    syncToken: puppet.syncToken
  }
}
