import { describe, expect, it, vi } from 'vitest'

import { BoundaryScanner, locateBoundaries, locateLastBoundary } from '../src/split/boundary.js'
import { getTextCodec } from '../src/text/encoding.js'

const utf8 = getTextCodec('utf-8')
const gbk = getTextCodec('gbk')

describe('locateLastBoundary', () => {
  it('returns the offset just past the last line ending', () => {
    expect(locateLastBoundary(Buffer.from('a\nb\nc'), '\n', utf8)).toBe(4)
  })

  it('returns undefined when no line ending is present', () => {
    expect(locateLastBoundary(Buffer.from('abc'), '\n', utf8)).toBeUndefined()
    expect(locateLastBoundary(Buffer.alloc(0), '\n', utf8)).toBeUndefined()
  })

  it('matches multi-character terminators', () => {
    expect(locateLastBoundary(Buffer.from('one\r\ntwo\r\n'), '\r\n', utf8)).toBe(10)
    expect(locateLastBoundary(Buffer.from('one\rtwo'), '\r\n', utf8)).toBeUndefined()
  })

  it('measures offsets in bytes, not characters', () => {
    expect(locateLastBoundary(Buffer.from('é\n日本'), '\n', utf8)).toBe(3)
  })

  it('ignores terminator bytes embedded in GBK double-byte characters', () => {
    // 0xBF 0x5C is one GBK character whose trail byte is an ASCII backslash.
    const bytes = Buffer.from([0x61, 0x5c, 0xbf, 0x5c, 0x62])

    expect(bytes.lastIndexOf(0x5c)).toBe(3)
    expect(locateLastBoundary(bytes, '\\', gbk)).toBe(2)
  })

  it('reports decode errors and keeps searching', () => {
    const onDecodeError = vi.fn()

    expect(locateLastBoundary(Buffer.from([0xff, 0x0a]), '\n', utf8, onDecodeError)).toBe(2)
    expect(onDecodeError).toHaveBeenCalledWith(0)
  })

  it('maps offsets onto the original bytes when an invalid byte precedes the match', () => {
    expect(locateLastBoundary(Buffer.from([0x61, 0xff, 0x0a, 0x62]), '\n', utf8)).toBe(3)
  })

  it('takes the rightmost of overlapping terminators', () => {
    expect(locateLastBoundary(Buffer.from('a\n\n\nb'), '\n\n', utf8)).toBe(4)
  })
})

describe('locateBoundaries', () => {
  it('lists every boundary in order', () => {
    expect(locateBoundaries(Buffer.from('ab\ncd\n\ne'), '\n', utf8)).toEqual([3, 6, 7])
  })

  it('lets a run of overlapping terminators end at its last character', () => {
    expect(locateBoundaries(Buffer.from('x\n\ny\n\n\n'), '\n\n', utf8)).toEqual([3, 7])
  })

  it('walks multi-byte characters around an invalid byte', () => {
    const bytes = Buffer.concat([Buffer.from('é'), Buffer.from([0xff]), Buffer.from('\n日\n')])

    expect(locateBoundaries(bytes, '\n', utf8)).toEqual([4, 8])
  })

  it('holds back a trailing match a longer overlap could replace unless final', () => {
    expect(locateBoundaries(Buffer.from('a\n\n'), '\n\n', utf8, { final: false })).toEqual([])
    expect(locateBoundaries(Buffer.from('a\n\n'), '\n\n', utf8)).toEqual([3])
  })
})

describe('BoundaryScanner', () => {
  it('reports absolute offsets across blocks', () => {
    const scanner = new BoundaryScanner('\n', utf8)

    expect(scanner.feed(Buffer.from('a\nbb'))).toEqual([2])
    expect(scanner.feed(Buffer.from('b\ncc\n'))).toEqual([6, 9])
    expect(scanner.end()).toEqual([])
  })

  it('finds a terminator split between two blocks', () => {
    const scanner = new BoundaryScanner('\r\n', utf8)

    expect(scanner.feed(Buffer.from('ab\r'))).toEqual([])
    expect(scanner.feed(Buffer.from('\ncd'))).toEqual([4])
  })

  it('waits for the rest of a multi-byte character', () => {
    const bytes = Buffer.from('日\n')
    const scanner = new BoundaryScanner('\n', utf8)

    expect(scanner.feed(bytes.subarray(0, 2))).toEqual([])
    expect(scanner.feed(bytes.subarray(2))).toEqual([4])
  })

  it('handles two-byte code units split on an odd offset', () => {
    const bytes = Buffer.from('a\nb\n', 'utf16le')
    const scanner = new BoundaryScanner('\n', getTextCodec('utf-16le'))

    expect(scanner.feed(bytes.subarray(0, 3))).toEqual([])
    expect(scanner.feed(bytes.subarray(3))).toEqual([4, 8])
  })

  it('reports the offset of blocks that fail to decode', () => {
    const onDecodeError = vi.fn()
    const scanner = new BoundaryScanner('\n', utf8, onDecodeError)

    scanner.feed(Buffer.from('ok\n'))
    scanner.feed(Buffer.from([0xff, 0x0a]))

    expect(onDecodeError).toHaveBeenCalledTimes(1)
    expect(onDecodeError).toHaveBeenCalledWith(3)
  })

  it('realigns offsets after an invalid byte', () => {
    const scanner = new BoundaryScanner('\n', utf8)

    expect(scanner.feed(Buffer.concat([Buffer.from([0xff, 0x0a]), Buffer.from('ab\n')]))).toEqual([2, 5])
    expect(scanner.feed(Buffer.from('cd\n'))).toEqual([8])
  })

  it('realigns when the invalid byte and its line end arrive in separate blocks', () => {
    const scanner = new BoundaryScanner('\n', utf8)

    expect(scanner.feed(Buffer.from([0x61, 0xff]))).toEqual([])
    expect(scanner.feed(Buffer.from('b'))).toEqual([])
    expect(scanner.feed(Buffer.from('\nc\n'))).toEqual([4, 6])
    expect(scanner.end()).toEqual([])
  })

  it('waits to see whether an overlapping terminator continues', () => {
    const scanner = new BoundaryScanner('\n\n', utf8)

    expect(scanner.feed(Buffer.from('a\n\n'))).toEqual([])
    expect(scanner.feed(Buffer.from('\nb'))).toEqual([4])
    expect(scanner.end()).toEqual([])
  })

  it('confirms a held overlapping terminator at end of input', () => {
    const scanner = new BoundaryScanner('\n\n', utf8)

    expect(scanner.feed(Buffer.from('a\n\n'))).toEqual([])
    expect(scanner.end()).toEqual([3])
  })

  it('rejects an empty line ending', () => {
    expect(() => new BoundaryScanner('', utf8)).toThrow('lineEnding must not be empty')
  })
})
