/**
 * In-memory read path of the event log. Rows are only ever appended,
 * and every update replaces the array, so a `rows` reference taken
 * from getState() is an immutable snapshot.
 */
import { createStore, type StoreApi } from 'zustand/vanilla'
import type { EventLogRow } from '@/types/eventLog'

export type EventLogState = {
  rows: readonly EventLogRow[]
  hydrated: boolean
  skippedRows: number
}

export type EventLogActions = {
  hydrate: (rows: EventLogRow[], skippedRows: number) => void
  appendRows: (rows: EventLogRow[]) => void
}

export type EventLogStore = StoreApi<EventLogState & EventLogActions>

const initialState: EventLogState = {
  rows: [],
  hydrated: false,
  skippedRows: 0,
}

export const createEventLogStore = (): EventLogStore =>
  createStore<EventLogState & EventLogActions>()((set) => ({
    ...initialState,

    hydrate: (rows, skippedRows) => set({ rows, hydrated: true, skippedRows }),

    appendRows: (rows) =>
      set((state) => ({
        rows: [...state.rows, ...rows],
      })),
  }))
