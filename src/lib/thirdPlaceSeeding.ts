import type { ThirdPlaceSeedingTable } from '../types/bracket'

export type ThirdPlaceSlot = {
  code: string
  candidateGroups: string[]
}

export function seedingTableKey(groups: string[]): string {
  return [...groups].sort().join('')
}

function fromTable(
  slots: ThirdPlaceSlot[],
  qualifiedGroups: string[],
  table: ThirdPlaceSeedingTable
): Map<string, string> | undefined {
  const row = table[seedingTableKey(qualifiedGroups)]
  if (!row) return undefined
  const assignment = new Map<string, string>()
  for (const slot of slots) {
    const group = row[slot.code]
    if (!group || !qualifiedGroups.includes(group)) return undefined
    assignment.set(slot.code, group)
  }
  return assignment
}

/**
 * Maps each best-third slot (`3ABCDF`) to one qualifying group. A row of the
 * seeding table keyed by the qualifying groups takes precedence; otherwise slots
 * are filled in order, trying qualifiers by rank and backtracking on dead ends.
 * `undefined` when no assignment keeps every team inside its slot's candidates.
 */
export function assignThirdPlaceSlots(
  slots: ThirdPlaceSlot[],
  qualifiedGroups: string[],
  table?: ThirdPlaceSeedingTable
): Map<string, string> | undefined {
  if (slots.length !== qualifiedGroups.length) return undefined
  if (table) {
    const seeded = fromTable(slots, qualifiedGroups, table)
    if (seeded) return seeded
  }

  const assignment = new Map<string, string>()
  const used = new Set<string>()

  const fill = (slotIndex: number): boolean => {
    if (slotIndex === slots.length) return true
    const slot = slots[slotIndex]
    for (const group of qualifiedGroups) {
      if (used.has(group) || !slot.candidateGroups.includes(group)) continue
      used.add(group)
      assignment.set(slot.code, group)
      if (fill(slotIndex + 1)) return true
      used.delete(group)
      assignment.delete(slot.code)
    }
    return false
  }

  return fill(0) ? assignment : undefined
}
