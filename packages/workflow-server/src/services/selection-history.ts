import type { CapabilitySelection } from '@ledgerline/shared'

export class SelectionHistory {
  private readonly entries: CapabilitySelection[] = []

  record(selection: CapabilitySelection) {
    this.entries.push({ ...selection, contextHints: { ...selection.contextHints } })
  }

  list(): CapabilitySelection[] {
    return this.entries.map((entry) => ({ ...entry, contextHints: { ...entry.contextHints } }))
  }

  // Latest tool per selection key
  snapshot(): Record<string, string> {
    const result: Record<string, string> = {}
    for (const entry of this.entries) {
      result[entry.selectionKey] = entry.chosen
    }
    return result
  }

  get size() {
    return this.entries.length
  }
}

let activeHistory: SelectionHistory | null = null

export function getSelectionHistory(): SelectionHistory {
  if (!activeHistory) activeHistory = new SelectionHistory()
  return activeHistory
}

export function resetSelectionHistory() {
  activeHistory = new SelectionHistory()
}
