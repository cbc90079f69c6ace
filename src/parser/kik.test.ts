import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { KIK_HEADER, kikCsv, TempFiles } from '../test-support/index'
import { FormatError } from './errors'
import { KikParser, parseKikTimestamp } from './kik'

describe('Kik Parser', () => {
  const parser = new KikParser()

  describe('parseKikTimestamp', () => {
    it('parses ISO timestamps with Z', () => {
      expect(parseKikTimestamp('2023-01-05T10:00:00Z')?.toISOString()).toBe('2023-01-05T10:00:00.000Z')
    })

    it('applies explicit offsets', () => {
      expect(parseKikTimestamp('2023-01-05T10:00:00+02:00')?.toISOString()).toBe(
        '2023-01-05T08:00:00.000Z'
      )
    })

    it('reads a space-separated value without offset as UTC', () => {
      expect(parseKikTimestamp('2023-01-05 10:00:00')?.toISOString()).toBe('2023-01-05T10:00:00.000Z')
    })

    it('returns null for empty or invalid values', () => {
      expect(parseKikTimestamp('')).toBeNull()
      expect(parseKikTimestamp('yesterday')).toBeNull()
    })
  })

  describe('canParse', () => {
    it('accepts a sample with every Kik column', () => {
      expect(parser.canParse('kik.csv', `${KIK_HEADER}\n`)).toBe(true)
    })

    it('rejects a sample missing a column', () => {
      expect(parser.canParse('kik.csv', 'msg_id,sender_jid,receiver_jid,msg,sent_at\n')).toBe(false)
    })
  })

  describe('parseText', () => {
    const exchange = [
      '1,A,B,chat,hi,2023-01-05T10:00:00Z',
      '2,B,A,chat,hey,2023-01-05T10:05:00Z'
    ]

    it('folds both directions into one conversation', () => {
      const result = parser.parseText(kikCsv(exchange))

      expect(result.platform).toBe('Kik Messenger')
      expect(result.conversations).toHaveLength(1)
      const conversation = result.conversations[0]
      expect(conversation?.id).toBe('A-B')
      expect(conversation?.participants).toEqual(['A', 'B'])
      expect(conversation?.sourceLineNumber).toBe(2)
      expect(conversation?.metadata).toEqual({ isGroup: false })
      expect(conversation?.messages.map((m) => [m.id, m.senderId, m.text])).toEqual([
        ['1', 'A', 'hi'],
        ['2', 'B', 'hey']
      ])
    })

    it('cites the CSV line of each message', () => {
      const messages = parser.parseText(kikCsv(exchange)).conversations[0]?.messages ?? []
      expect(messages.map((m) => m.sourceLineNumber)).toEqual([2, 3])
    })

    it('is independent of row order', () => {
      const forward = parser.parseText(kikCsv(exchange)).conversations
      const reversed = parser.parseText(kikCsv([...exchange].reverse())).conversations

      expect(reversed.map((c) => c.id)).toEqual(forward.map((c) => c.id))
      expect(reversed[0]?.messages.map((m) => m.id)).toEqual(['1', '2'])
    })

    it('orders conversations by their earliest message', () => {
      const result = parser.parseText(
        kikCsv([
          '1,A,B,chat,later,2023-01-05T10:00:00Z',
          '2,C,A,chat,earlier,2023-01-05T09:00:00Z'
        ])
      )

      expect(result.conversations.map((c) => c.id)).toEqual(['A-C', 'A-B'])
      expect(result.conversations[0]?.participants).toEqual(['C', 'A'])
    })

    it('keeps timestamp ties in file order', () => {
      const result = parser.parseText(
        kikCsv(['1,A,B,chat,first,2023-01-05T10:00:00Z', '2,B,A,chat,second,2023-01-05T10:00:00Z'])
      )
      expect(result.conversations[0]?.messages.map((m) => m.text)).toEqual(['first', 'second'])
    })

    it('marks group chats', () => {
      const result = parser.parseText(kikCsv(['1,A,B,groupchat,hi all,2023-01-05T10:00:00Z']))
      expect(result.conversations[0]?.metadata.isGroup).toBe(true)
    })

    it('reads quoted messages containing commas', () => {
      const result = parser.parseText(kikCsv(['1,A,B,chat,"well, ok",2023-01-05T10:00:00Z']))
      expect(result.conversations[0]?.messages[0]?.text).toBe('well, ok')
    })

    it('skips rows missing columns with a warning', () => {
      const result = parser.parseText(kikCsv([...exchange, '3,A,B,chat']))

      expect(result.conversations[0]?.messages).toHaveLength(2)
      expect(result.warnings).toEqual([
        {
          code: 'missing_column',
          message: 'Skipping row 4 due to missing column: msg, sent_at',
          line: 4
        }
      ])
    })

    it('numbers messages without an id by row', () => {
      const result = parser.parseText(
        kikCsv([
          ',A,B,chat,hi,2023-01-05T10:00:00Z',
          '7,B,A,chat,hey,2023-01-05T10:05:00Z',
          ',A,B,chat,bye,2023-01-05T10:06:00Z'
        ])
      )

      expect(result.conversations[0]?.messages.map((m) => m.id)).toEqual(['0', '7', '2'])
    })

    it('warns about unparseable timestamps', () => {
      const result = parser.parseText(kikCsv(['1,A,B,chat,hi,soon']))

      expect(result.conversations[0]?.messages).toHaveLength(1)
      expect(result.warnings).toEqual([
        { code: 'invalid_timestamp', message: 'Unparseable timestamp "soon" on row 2', line: 2 }
      ])
    })

    it('finds the header below preamble lines', () => {
      const result = parser.parseText(`Kik export\n\n${kikCsv(exchange)}`)

      expect(result.conversations[0]?.sourceLineNumber).toBe(4)
      expect(result.conversations[0]?.messages).toHaveLength(2)
    })

    it('throws FormatError when only prose mentions the columns', () => {
      const prose = `Columns are ${KIK_HEADER.split(',').join(' and ')}\n`
      expect(() => parser.parseText(prose)).toThrow('Could not find CSV header in file')
      expect(() => parser.parseText(prose)).toThrow(FormatError)
    })
  })

  describe('resolvePrimarySender', () => {
    const conversation = () =>
      parser.parseText(
        kikCsv([
          '1,A,B,chat,hi,2023-01-05T10:00:00Z',
          '2,B,A,chat,hey,2023-01-05T10:05:00Z',
          '3,B,A,chat,there?,2023-01-05T10:06:00Z'
        ])
      ).conversations[0]

    it('uses the configured owner when they authored a message', () => {
      const c = conversation()
      expect(c && parser.resolvePrimarySender(c, { ownerId: 'A' })).toEqual({
        senderId: 'A',
        method: 'configured',
        bestEffort: false
      })
    })

    it('falls back to the settings owner', () => {
      const configured = new KikParser({ defaultOwnerId: 'B' })
      const c = conversation()
      expect(c && configured.getPrimarySender(c, { ownerId: 'nobody' })).toBe('B')
    })

    it('guesses the first sender in two-party conversations', () => {
      const c = conversation()
      expect(c && parser.resolvePrimarySender(c)).toEqual({
        senderId: 'A',
        method: 'first-sender',
        bestEffort: true
      })
    })

    it('uses message counts for single-participant conversations', () => {
      const selfChat = parser.parseText(kikCsv(['1,A,A,chat,note,2023-01-05T10:00:00Z'])).conversations[0]
      expect(selfChat?.participants).toEqual(['A'])
      expect(selfChat && parser.resolvePrimarySender(selfChat)).toEqual({
        senderId: 'A',
        method: 'most-messages',
        bestEffort: false
      })
    })
  })

  describe('parseFile', () => {
    let files: TempFiles

    beforeEach(() => {
      files = new TempFiles()
    })

    afterEach(() => {
      files.cleanup()
    })

    it('parses CRLF files', () => {
      const path = files.write(
        'kik.csv',
        [KIK_HEADER, '1,A,B,chat,hi,2023-01-05T10:00:00Z', '2,B,A,chat,hey,2023-01-05T10:05:00Z', ''].join(
          '\r\n'
        )
      )

      const result = parser.parseFile(path)

      expect(result.lines[1]).toBe('1,A,B,chat,hi,2023-01-05T10:00:00Z')
      expect(result.conversations[0]?.messages.map((m) => m.text)).toEqual(['hi', 'hey'])
    })
  })
})
