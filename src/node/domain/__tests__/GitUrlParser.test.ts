import { describe, expect, it } from 'vitest'
import { parseRemoteUrl } from '../GitUrlParser'

describe('parseRemoteUrl', () => {
  describe('HTTPS URLs', () => {
    it('parses owner and repo with .git suffix', () => {
      expect(parseRemoteUrl('https://github.com/acme/widgets.git')).toEqual({
        owner: 'acme',
        repo: 'widgets'
      })
    })

    it('parses owner and repo without .git suffix', () => {
      expect(parseRemoteUrl('https://github.com/acme/widgets')).toEqual({
        owner: 'acme',
        repo: 'widgets'
      })
    })

    it('ignores credentials, host and port', () => {
      expect(parseRemoteUrl('https://user@github.com:443/acme/widgets.git')).toEqual({
        owner: 'acme',
        repo: 'widgets'
      })
    })

    it('ignores a trailing slash', () => {
      expect(parseRemoteUrl('https://github.com/acme/widgets/')?.repo).toBe('widgets')
    })

    it('uses the last two segments of nested paths', () => {
      expect(parseRemoteUrl('https://gitlab.example.com/group/sub/tool.git')).toEqual({
        owner: 'sub',
        repo: 'tool'
      })
    })
  })

  describe('SSH URLs', () => {
    it('parses scp-like syntax', () => {
      expect(parseRemoteUrl('git@github.com:acme/widgets.git')).toEqual({
        owner: 'acme',
        repo: 'widgets'
      })
    })

    it('parses ssh:// URLs', () => {
      expect(parseRemoteUrl('ssh://git@github.com/acme/widgets.git')).toEqual({
        owner: 'acme',
        repo: 'widgets'
      })
    })
  })

  describe('edge cases', () => {
    it('trims surrounding whitespace', () => {
      expect(parseRemoteUrl('  git@github.com:acme/widgets.git\n')?.owner).toBe('acme')
    })

    it('returns null for empty string', () => {
      expect(parseRemoteUrl('')).toBe(null)
    })

    it('returns null when the path has no owner', () => {
      expect(parseRemoteUrl('https://github.com/widgets')).toBe(null)
    })

    it('returns null for text that is not a URL', () => {
      expect(parseRemoteUrl('not a remote')).toBe(null)
    })
  })
})
