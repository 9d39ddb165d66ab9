import SQL, { SQLStatement } from 'sql-template-strings'
import { AppComponents, IDbComponent, Puppet } from '../types'

const PUPPET_COLUMNS = `
  remote_user_key AS "remoteUserKey",
  display_name AS "displayName",
  photo_id AS "photoId",
  photo_ref AS "photoRef",
  name_applied AS "nameApplied",
  avatar_applied AS "avatarApplied",
  is_registered AS "isRegistered",
  custom_user_id AS "customUserId",
  sync_token AS "syncToken"
`

export function createDbAdapter({ pg }: Pick<AppComponents, 'pg'>): IDbComponent {
  async function getPuppetByRemoteKey(remoteUserKey: string): Promise<Puppet.DbEntity | null> {
    const query: SQLStatement = SQL`SELECT `.append(PUPPET_COLUMNS).append(SQL`
      FROM puppets
      WHERE remote_user_key = ${remoteUserKey}
    `)

    const result = await pg.query<Puppet.DbEntity>(query)
    return result.rows[0] || null
  }

  async function getPuppetByCustomUserId(userId: string): Promise<Puppet.DbEntity | null> {
    const query: SQLStatement = SQL`SELECT `.append(PUPPET_COLUMNS).append(SQL`
      FROM puppets
      WHERE custom_user_id = ${userId}
    `)

    const result = await pg.query<Puppet.DbEntity>(query)
    return result.rows[0] || null
  }

  async function getPuppetsWithCustomUserId(): Promise<Puppet.DbEntity[]> {
    const query: SQLStatement = SQL`SELECT `.append(PUPPET_COLUMNS).append(SQL`
      FROM puppets
      WHERE custom_user_id IS NOT NULL
    `)

    const result = await pg.query<Puppet.DbEntity>(query)
    return result.rows
  }

  async function insertPuppet(puppet: Puppet.DbEntity): Promise<void> {
    const query: SQLStatement = SQL`
      INSERT INTO puppets (
        remote_user_key, display_name, photo_id, photo_ref, name_applied, avatar_applied,
        is_registered, custom_user_id, sync_token
      )
      VALUES (
        ${puppet.remoteUserKey},
        ${puppet.displayName},
        ${puppet.photoId},
        ${puppet.photoRef},
        ${puppet.nameApplied},
        ${puppet.avatarApplied},
        ${puppet.isRegistered},
        ${puppet.customUserId},
        ${puppet.syncToken}
      )
    `

    await pg.query(query)
  }

  async function updatePuppet(puppet: Puppet.DbEntity): Promise<void> {
    const query: SQLStatement = SQL`
      UPDATE puppets
      SET
        display_name = ${puppet.displayName},
        photo_id = ${puppet.photoId},
        photo_ref = ${puppet.photoRef},
        name_applied = ${puppet.nameApplied},
        avatar_applied = ${puppet.avatarApplied},
        is_registered = ${puppet.isRegistered},
        custom_user_id = ${puppet.customUserId},
        sync_token = ${puppet.syncToken}
      WHERE remote_user_key = ${puppet.remoteUserKey}
    `

    await pg.query(query)
  }

  return {
    getPuppetByRemoteKey,
    getPuppetByCustomUserId,
    getPuppetsWithCustomUserId,
    insertPuppet,
    updatePuppet
  }
}
