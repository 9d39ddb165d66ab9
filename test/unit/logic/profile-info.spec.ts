import {
  extractPhotoId,
  getDisplayname,
  getDisplaynameFields,
  getVectorImage,
  renderDisplaynameTemplate,
  selectAvatarArtifact
} from '../../../src/logic/profile-info'
import { createRemoteProfileInfo, PICTURE_ROOT_URL } from '../mocks/data/puppets'

describe('profile info', () => {
  describe('when building the display name fields', () => {
    it('should join first and last name', () => {
      expect(getDisplaynameFields({ miniProfile: { firstName: 'Ada', lastName: 'Lovelace' } })).toEqual({
        displayname: null,
        name: 'Ada Lovelace',
        first_name: 'Ada',
        last_name: 'Lovelace'
      })
    })

    it('should use the single name present as the full name', () => {
      expect(getDisplaynameFields({ miniProfile: { firstName: 'Ada', lastName: null } }).name).toBe('Ada')
    })

    it('should leave every field empty when there is no mini profile', () => {
      expect(getDisplaynameFields({})).toEqual({ displayname: null, name: null, first_name: null, last_name: null })
    })
  })

  describe('when computing the display name', () => {
    it('should render the full name when it is preferred', () => {
      const info = { miniProfile: { firstName: 'Ada', lastName: 'Lovelace' } }

      expect(getDisplayname(info, ['name'], '{displayname}')).toBe('Ada Lovelace')
    })

    it('should take the first preference holding a value', () => {
      const info = { miniProfile: { firstName: '', lastName: 'Lovelace' } }

      expect(getDisplayname(info, ['first_name', 'last_name'], '{displayname} (LinkedIn)')).toBe('Lovelace (LinkedIn)')
    })

    it('should skip the explicit display name, which the profile never carries', () => {
      const info = { miniProfile: { firstName: 'Ada', lastName: 'Lovelace' } }

      expect(getDisplayname(info, ['displayname', 'first_name'], '{displayname}')).toBe('Ada')
    })

    it('should render an empty display name when no preference matches', () => {
      expect(getDisplayname({ miniProfile: {} }, ['name'], '[{displayname}]')).toBe('[]')
    })

    it('should render every known placeholder of the template', () => {
      const info = { miniProfile: { firstName: 'Ada', lastName: 'Lovelace' } }

      expect(getDisplayname(info, ['first_name'], '{last_name}, {first_name} ({displayname}/{name})')).toBe(
        'Lovelace, Ada (Ada/Ada Lovelace)'
      )
    })
  })

  describe('when rendering a template with unknown placeholders', () => {
    it('should leave them untouched', () => {
      const fields = { displayname: 'Ada', name: null, first_name: null, last_name: null }

      expect(renderDisplaynameTemplate('{displayname} {company}', fields)).toBe('Ada {company}')
    })
  })

  describe('when extracting the photo id', () => {
    it('should capture the segment after /image/', () => {
      expect(extractPhotoId('https://media.licdn.com/image/ABC123/profile-displayphoto-shrink_100_100')).toBe('ABC123')
    })

    it('should accept hosts with a path before /image/', () => {
      expect(extractPhotoId(PICTURE_ROOT_URL)).toBe('C4E03AQF')
    })

    it.each([
      ['an absent url', undefined],
      ['an empty url', ''],
      ['a plain http url', 'http://media.licdn.com/image/ABC123/profile-displayphoto'],
      ['a url without /image/', 'https://media.licdn.com/ABC123/profile-displayphoto'],
      ['a url without the profile segment', 'https://media.licdn.com/image/ABC123/company-logo_100_100'],
      ['a url with an empty id', 'https://media.licdn.com/image//profile-displayphoto'],
      ['a relative url', '/image/ABC123/profile-displayphoto']
    ])('should return null for %s', (_, rootUrl) => {
      expect(extractPhotoId(rootUrl)).toBeNull()
    })
  })

  describe('when getting the vector image', () => {
    it('should read it from the mini profile picture', () => {
      expect(getVectorImage(createRemoteProfileInfo())?.rootUrl).toBe(PICTURE_ROOT_URL)
    })

    it('should return undefined when the profile has no picture', () => {
      expect(getVectorImage(createRemoteProfileInfo({ picture: null }))).toBeUndefined()
    })
  })

  describe('when selecting the avatar artifact', () => {
    it('should pick the narrowest one', () => {
      const artifact = selectAvatarArtifact({
        rootUrl: PICTURE_ROOT_URL,
        artifacts: [
          { width: 400, fileIdentifyingUrlPathSegment: '400_400' },
          { width: 100, fileIdentifyingUrlPathSegment: '100_100' },
          { width: 200, fileIdentifyingUrlPathSegment: '200_200' }
        ]
      })

      expect(artifact?.fileIdentifyingUrlPathSegment).toBe('100_100')
    })

    it('should pick the first one when widths are missing', () => {
      const artifact = selectAvatarArtifact({
        artifacts: [{ fileIdentifyingUrlPathSegment: 'first' }, { fileIdentifyingUrlPathSegment: 'second' }]
      })

      expect(artifact?.fileIdentifyingUrlPathSegment).toBe('first')
    })

    it('should ignore artifacts without a width when others have one', () => {
      const artifact = selectAvatarArtifact({
        artifacts: [
          { fileIdentifyingUrlPathSegment: 'unsized' },
          { width: 800, fileIdentifyingUrlPathSegment: '800_800' },
          { width: 100, fileIdentifyingUrlPathSegment: '100_100' }
        ]
      })

      expect(artifact?.fileIdentifyingUrlPathSegment).toBe('100_100')
    })

    it('should return undefined when there are no artifacts', () => {
      expect(selectAvatarArtifact({ rootUrl: PICTURE_ROOT_URL })).toBeUndefined()
    })
  })
})
