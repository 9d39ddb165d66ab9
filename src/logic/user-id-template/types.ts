export type { IUserIdTemplateComponent } from '../../types/service'

// the single placeholder a username template must carry
export const USER_ID_PLACEHOLDER = '{userid}'
