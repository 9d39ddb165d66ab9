export type { IProfileSynchronizerComponent } from '../../types/service'
export type { ProfileSyncResult, SyncSource } from '../../types/types'

export type UpdateInfoOptions = {
  updateAvatar?: boolean
}
