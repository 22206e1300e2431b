// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect } from 'vitest'
import { parseKeyboard } from '../kle-parser'
import {
  formatDelta,
  formatLegends,
  formatMetadata,
  groupRows,
  toRawFormat,
} from '../kle-serializer'
import type { Key, KeyProperties } from '../types'

function makeKey(label: string, properties: KeyProperties = {}, row = 0): Key {
  return { legends: [label], properties, x: 0, y: 0, row }
}

describe('KLE Serializer', () => {
  describe('formatDelta', () => {
    it('emits y then x for plain keys', () => {
      expect(formatDelta({ x: 1, y: 0.5 }, {})).toBe('{y:0.5,x:1}')
    })

    it('omits unchanged offsets', () => {
      expect(formatDelta({ x: 1 }, { x: 1 })).toBeNull()
      expect(formatDelta({ y: 1, x: 2 }, { y: 1 })).toBe('{x:2}')
    })

    it('orders rotated keys as r, rx, ry, y, x', () => {
      expect(formatDelta({ x: 0.25, y: -0.5, ry: 2, rx: 1, r: 15 }, {})).toBe(
        '{r:15,rx:1,ry:2,y:-0.5,x:0.25}',
      )
    })

    it('always emits every field of a rotated key', () => {
      const props = { r: 15, rx: 1, ry: 2, y: 1, x: 1 }
      expect(formatDelta(props, { ...props })).toBe('{r:15,rx:1,ry:2,y:1,x:1}')
      expect(formatDelta({ r: 15, rx: 1, ry: 2 }, { r: 15, rx: 1, ry: 2 })).toBe('{r:15,rx:1,ry:2}')
      expect(formatDelta({ rx: 3 }, {})).toBe('{rx:3}')
    })

    it('keeps a repeated negative y that starts a row', () => {
      expect(formatDelta({ y: -1 }, { y: -1 })).toBe('{y:-1}')
      expect(formatDelta({ y: 0.5 }, { y: 0.5 })).toBeNull()
    })

    it('never emits style properties', () => {
      expect(formatDelta({ c: '#ff0000', a: 4, w: 2 }, {})).toBeNull()
    })
  })

  describe('formatting helpers', () => {
    it('writes metadata fields in canonical order', () => {
      expect(formatMetadata({ switchType: 'MX', name: 'K', author: 'me' })).toBe(
        '{"author":"me","name":"K","switchType":"MX"}',
      )
    })

    it('joins legends with an escaped line break', () => {
      expect(formatLegends(['Top', 'Bottom'])).toBe('"Top\\nBottom"')
    })

    it('escapes quotes in legends', () => {
      expect(formatLegends(['say "hi"'])).toBe('"say \\"hi\\""')
    })
  })

  describe('groupRows', () => {
    const keys = [
      makeKey('A', {}, 0),
      makeKey('B', { y: -0.5 }, 1),
      makeKey('C', {}, 1),
      makeKey('D', { y: 0.25 }, 1),
      makeKey('E', { y: -1 }, 3),
    ]
    const labels = (rows: Key[][]): string[][] => rows.map((row) => row.map((k) => k.legends[0]))

    it('starts a new row at each negative y offset', () => {
      expect(labels(groupRows(keys, 'offset'))).toEqual([['A'], ['B', 'C', 'D'], ['E']])
    })

    it('groups by recorded row when asked', () => {
      const shuffled = [makeKey('X', {}, 2), makeKey('Y', {}, 0), makeKey('Z', {}, 2)]
      expect(labels(groupRows(shuffled, 'recorded'))).toEqual([['Y'], ['X', 'Z']])
    })
  })

  describe('toRawFormat', () => {
    it('writes nothing for an empty keyboard', () => {
      expect(toRawFormat({ keys: [] })).toBe('')
    })

    it('writes metadata on its own line first', () => {
      const keyboard = parseKeyboard('{name:"K"}\n["A"]')
      expect(toRawFormat(keyboard)).toBe('{"name":"K"},\n["A"]')
    })

    it('re-joins multi-line legends', () => {
      const keyboard = parseKeyboard('["Top\\nBottom"]')
      expect(toRawFormat(keyboard)).toBe('["Top\\nBottom"]')
    })

    it('merges rows without negative offsets by default', () => {
      const keyboard = parseKeyboard('[["Q","W"],["A","S"]]')
      expect(toRawFormat(keyboard)).toBe('["Q","W","A","S"]')
    })

    it('keeps the source rows with the recorded strategy', () => {
      const keyboard = parseKeyboard('[["Q","W"],["A","S"]]')
      expect(toRawFormat(keyboard, { rowStrategy: 'recorded' })).toBe('["Q","W"],\n["A","S"]')
    })

    it('writes position deltas before the keys they move', () => {
      const raw = '["Esc",{x:1},"F1"],\n[{y:-0.5},"~","1"],\n'
      expect(toRawFormat(parseKeyboard(raw))).toBe('["Esc",{x:1},"F1"],\n[{y:-0.5},"~","1"]')
    })

    it('writes every rotation field on each rotated key', () => {
      const raw = '["A"],\n[{r:15,rx:1,ry:2,y:-0.5,x:0.25},"R1",{r:30,rx:1,ry:2,y:0.5,x:1},"R2"]'
      expect(toRawFormat(parseKeyboard(raw))).toBe(
        '["A"],\n[{r:15,rx:1,ry:2,y:-0.5,x:0.25},"R1",{r:30,rx:1,ry:2,y:0.5,x:1},"R2"]',
      )
    })

    it('round-trips legends containing quotes', () => {
      const output = toRawFormat({ keys: [makeKey('say "hi"')] })
      expect(parseKeyboard(output).keys[0].legends).toEqual(['say "hi"'])
    })
  })

  describe('canonical output', () => {
    const inputs = [
      '{name:"Mini",switchType:"MX"},\n["Esc",{x:1},"F1"],\n[{y:-0.5},"~","1"]',
      '["A"],\n[{r:15,rx:1,ry:2,y:-0.5,x:0.25},"R1",{r:30,rx:1,ry:2,y:0.5,x:1},"R2"]',
      '[{c:"#ff0000",w:1.5},"Tab","Q\\nq"],\n[{x:0.25},"Caps"]',
      '[{r:15,rx:1,ry:2,y:0,x:0},"A",{r:15,rx:1,ry:2,x:1},"B",{r:15,rx:1,ry:2,x:1},"C"]',
      '[{y:-1},"A"],\n[{y:-1},"B"]',
    ]

    it.each(inputs)('is stable under re-parsing: %s', (raw) => {
      const first = toRawFormat(parseKeyboard(raw))
      expect(toRawFormat(parseKeyboard(first))).toBe(first)
    })

    it('keeps repeated rotations on every key', () => {
      const raw = '[{r:15,rx:1,ry:2,y:0,x:0},"A",{r:15,rx:1,ry:2,x:1},"B",{r:15,rx:1,ry:2,x:1},"C"]'
      const first = toRawFormat(parseKeyboard(raw))
      expect(first).toBe(raw)
      const reparsed = parseKeyboard(first)
      expect(reparsed.keys[1].x).toBe(1)
      expect(reparsed.keys[1].properties.r).toBe(15)
    })

    it('keeps rows that start with the same negative offset apart', () => {
      const first = toRawFormat(parseKeyboard('[{y:-1},"A"],\n[{y:-1},"B"]'))
      expect(first).toBe('[{y:-1},"A"],\n[{y:-1},"B"]')
    })

    it('is stable under re-parsing with recorded rows', () => {
      const raw = '[{x:0.5},"A","B"],\n[],\n[{y:0.25},"C"]'
      const first = toRawFormat(parseKeyboard(raw), { rowStrategy: 'recorded' })
      expect(first).toBe('[{x:0.5},"A","B"],\n[{y:0.25},"C"]')
      expect(toRawFormat(parseKeyboard(first), { rowStrategy: 'recorded' })).toBe(first)
    })
  })
})
