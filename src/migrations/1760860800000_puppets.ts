/* eslint-disable @typescript-eslint/naming-convention */
import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate'

export const shorthands: ColumnDefinitions | undefined = undefined

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('puppets', {
    remote_user_key: { type: 'varchar(255)', notNull: true, primaryKey: true },
    display_name: { type: 'text' },
    photo_id: { type: 'varchar(255)' },
    photo_ref: { type: 'varchar(255)' },
    name_applied: { type: 'boolean', notNull: true, default: false },
    avatar_applied: { type: 'boolean', notNull: true, default: false },
    is_registered: { type: 'boolean', notNull: true, default: false },
    custom_user_id: { type: 'varchar(255)', unique: true },
    sync_token: { type: 'text' }
  })
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('puppets', { ifExists: true })
}
