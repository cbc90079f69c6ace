import { describe, expect, it } from 'vitest'
import { createMessage } from '../test-support/index'
import type { ParserWarning } from '../types'
import {
  ConversationAccumulator,
  conversationIdFor,
  findHeaderLine,
  groupingKey,
  missingColumns,
  parseTimestampOrNow,
  readCsvTable
} from './csv'
import { FormatError } from './errors'

describe('CSV helpers', () => {
  describe('findHeaderLine', () => {
    it('skips prose that mentions the column names', () => {
      const lines = ['Legend: a, b and c are columns', 'a,b,c', '1,2,3']
      expect(findHeaderLine(lines, ['a', 'b', 'c'])).toBe(1)
    })

    it('accepts quoted header cells', () => {
      expect(findHeaderLine(['"a","b"'], ['a', 'b'])).toBe(0)
    })

    it('returns -1 when no line qualifies', () => {
      expect(findHeaderLine(['a,b'], ['a', 'b', 'c'])).toBe(-1)
    })
  })

  describe('readCsvTable', () => {
    it('reads rows with their source lines', () => {
      const table = readCsvTable(['junk line', 'a,b', '1,2', '3', ''], 1)

      expect(table.header).toEqual(['a', 'b'])
      expect(table.rows).toEqual([
        { line: 3, values: { a: '1', b: '2' } },
        { line: 4, values: { a: '3' } }
      ])
    })

    it('keeps quoted newlines inside a cell', () => {
      const table = readCsvTable(['a,b', '"one', 'two",x', ''], 0)

      expect(table.rows.map((row) => row.values)).toEqual([{ a: 'one\ntwo', b: 'x' }])
    })

    it('cites the first line of a multi-line record', () => {
      const table = readCsvTable(['a,b', '"one', 'two",x', 'c,d'], 0)

      expect(table.rows.map((row) => row.line)).toEqual([2, 4])
    })

    it('skips blank lines when citing the start line', () => {
      const table = readCsvTable(['a,b', '1,2', '', '', '3,4'], 0)

      expect(table.rows).toEqual([
        { line: 2, values: { a: '1', b: '2' } },
        { line: 5, values: { a: '3', b: '4' } }
      ])
    })

    it('ignores an unbalanced quote above the header', () => {
      const table = readCsvTable(['"Unclosed legend note', 'a,b', '1,2'], 1)

      expect(table.rows).toEqual([{ line: 3, values: { a: '1', b: '2' } }])
    })

    it('returns an empty table for header-less input', () => {
      expect(readCsvTable([''], 0)).toEqual({ header: [], rows: [] })
    })

    it('wraps parser failures in FormatError', () => {
      expect(() => readCsvTable(['a,b', '"unterminated,1', ''], 0)).toThrow(FormatError)
    })
  })

  describe('missingColumns', () => {
    it('lists required columns absent from a row', () => {
      expect(missingColumns({ line: 2, values: { a: '1' } }, ['a', 'b', 'c'])).toEqual(['b', 'c'])
    })

    it('treats empty cells as present', () => {
      expect(missingColumns({ line: 2, values: { a: '' } }, ['a'])).toEqual([])
    })
  })

  describe('grouping', () => {
    it('is symmetric in sender and recipient', () => {
      expect(groupingKey('bob', 'alice')).toEqual(['alice', 'bob'])
      expect(groupingKey('alice', 'bob')).toEqual(['alice', 'bob'])
    })

    it('collapses self-addressed messages', () => {
      expect(conversationIdFor(groupingKey('alice', 'alice'))).toBe('alice')
    })
  })

  describe('ConversationAccumulator', () => {
    it('builds conversations ordered by earliest message', () => {
      const accumulator = new ConversationAccumulator(() => ({ count: 0 }))
      const late = accumulator.add(
        createMessage({ id: '1', senderId: 'a', recipientId: 'b', timestamp: new Date('2024-01-02T00:00:00Z') }),
        2
      )
      late.state.count++
      accumulator.add(
        createMessage({ id: '2', senderId: 'c', recipientId: 'a', timestamp: new Date('2024-01-01T00:00:00Z') }),
        3,
        ['d']
      )

      const conversations = accumulator.build((group) => ({ count: group.state.count }))

      expect(conversations.map((c) => c.id)).toEqual(['a-c', 'a-b'])
      expect(conversations[0]?.participants).toEqual(['c', 'a', 'd'])
      expect(conversations[0]?.sourceLineNumber).toBe(3)
      expect(conversations[1]?.metadata).toEqual({ count: 1 })
    })

    it('keeps member sets apart when their ids join to the same string', () => {
      const accumulator = new ConversationAccumulator(() => ({}))
      accumulator.add(createMessage({ id: '1', senderId: 'alice-bob', recipientId: 'carol' }), 2)
      accumulator.add(createMessage({ id: '2', senderId: 'alice', recipientId: 'bob-carol' }), 3)

      const conversations = accumulator.build(() => ({}))

      expect(conversations.map((c) => [c.id, c.participants])).toEqual([
        ['alice-bob-carol', ['alice-bob', 'carol']],
        ['alice-bob-carol', ['alice', 'bob-carol']]
      ])
    })
  })

  describe('parseTimestampOrNow', () => {
    it('records a warning when parsing fails', () => {
      const warnings: ParserWarning[] = []
      const before = Date.now()

      const date = parseTimestampOrNow('??', () => null, { line: 7, values: {} }, warnings)

      expect(date.getTime()).toBeGreaterThanOrEqual(before)
      expect(warnings).toEqual([
        { code: 'invalid_timestamp', message: 'Unparseable timestamp "??" on row 7', line: 7 }
      ])
    })

    it('returns the parsed value without warnings', () => {
      const warnings: ParserWarning[] = []
      const parsed = new Date('2024-01-01T00:00:00Z')

      expect(parseTimestampOrNow('x', () => parsed, { line: 1, values: {} }, warnings)).toBe(parsed)
      expect(warnings).toEqual([])
    })
  })
})
