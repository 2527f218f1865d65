import { describe, expect, it } from 'vitest'

import { formatPlaceholder, parsePlaceholder, referencedMatchNumber } from './placeholders'

describe('parsePlaceholder', () => {
  it('parses group positions', () => {
    expect(parsePlaceholder('1A')).toEqual({ ok: true, placeholder: { kind: 'group-position', rank: 1, group: 'A' } })
    expect(parsePlaceholder(' 2l ')).toEqual({ ok: true, placeholder: { kind: 'group-position', rank: 2, group: 'L' } })
  })

  it('parses best-third slots with sorted candidate groups', () => {
    expect(parsePlaceholder('3FDCBA')).toEqual({
      ok: true,
      placeholder: { kind: 'third-place', candidateGroups: ['A', 'B', 'C', 'D', 'F'] }
    })
  })

  it('parses ranked third-place slots', () => {
    expect(parsePlaceholder('3-2')).toEqual({ ok: true, placeholder: { kind: 'third-place-rank', rank: 2 } })
  })

  it('parses winner and loser references', () => {
    expect(parsePlaceholder('W73')).toEqual({ ok: true, placeholder: { kind: 'match-winner', matchNumber: 73 } })
    expect(parsePlaceholder('L101')).toEqual({ ok: true, placeholder: { kind: 'match-loser', matchNumber: 101 } })
  })

  it('rejects unknown codes', () => {
    for (const code of ['', 'A1', '0A', 'W0', 'X12', '3-0', '1AB']) {
      const parsed = parsePlaceholder(code)
      expect(parsed.ok).toBe(false)
    }
    expect(parsePlaceholder('Q9')).toEqual({ ok: false, code: 'Q9', message: 'Unrecognized slot code "Q9"' })
  })
})

describe('formatPlaceholder', () => {
  it('writes the canonical code back', () => {
    for (const code of ['1A', '2K', '3ABCDF', '3-4', 'W89', 'L102']) {
      const parsed = parsePlaceholder(code)
      if (!parsed.ok) throw new Error(parsed.message)
      expect(formatPlaceholder(parsed.placeholder)).toBe(code)
    }
  })

  it('exposes the referenced match number', () => {
    expect(referencedMatchNumber({ kind: 'match-loser', matchNumber: 61 })).toBe(61)
    expect(referencedMatchNumber({ kind: 'group-position', group: 'A', rank: 1 })).toBeUndefined()
  })
})
