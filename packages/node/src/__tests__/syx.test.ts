/**
 * @ksynth/node - SysEx File Tests
 */

import * as fs from 'fs'
import * as path from 'path'
import { TooShortError, UnidentifiedError } from '@ksynth/core'
import { decodeMessage, loadDumpFile, splitMessages, unwrapMessage } from '../syx'
import { cleanupTempDir, createTempDir, k4Message, k5000Message } from './helpers'

// The K5000 multi block starts with its checksum
const K5000_MULTI_SIZE = 99

function corrupted(message: Uint8Array): Uint8Array {
  const copy = message.slice()
  const at = copy.length - 1 - K5000_MULTI_SIZE
  copy[at] = copy[at] ^ 0x01
  return copy
}

describe('splitMessages', () => {
  it('cuts messages and skips bytes between them', () => {
    const bytes = Uint8Array.of(0x00, 0xF0, 0x01, 0x02, 0xF7, 0x10, 0xF0, 0x03, 0xF7)
    expect(splitMessages(bytes).map(m => Array.from(m))).toEqual([
      [0xF0, 0x01, 0x02, 0xF7],
      [0xF0, 0x03, 0xF7]
    ])
  })

  it('ignores a stray end byte', () => {
    expect(splitMessages(Uint8Array.of(0xF7, 0xF0, 0x05, 0xF7))).toHaveLength(1)
  })

  it('returns nothing for an empty stream', () => {
    expect(splitMessages(new Uint8Array(0))).toEqual([])
  })

  it('rejects an unterminated message', () => {
    expect(() => splitMessages(Uint8Array.of(0xF0, 0x40, 0x00, 0x20))).toThrow(TooShortError)
  })
})

describe('unwrapMessage', () => {
  it('detects a K4 message and its channel', () => {
    const message = unwrapMessage(k4Message())
    expect(message.dialect).toBe('k4')
    expect(message.channel.value).toBe(3)
    expect(Array.from(message.payload.subarray(0, 6))).toEqual([0x02, 0x20, 0x00, 0x04, 0x00, 0x4C])
  })

  it('detects a K5000 message', () => {
    const message = unwrapMessage(k5000Message())
    expect(message.dialect).toBe('k5000')
    expect(message.channel.value).toBe(1)
    expect(Array.from(message.payload.subarray(0, 4))).toEqual([0x00, 0x20, 0x00, 0x0A])
  })

  it('rejects other manufacturers', () => {
    expect(() => unwrapMessage(Uint8Array.of(0xF0, 0x41, 0x00, 0x20, 0x00, 0x04, 0xF7)))
      .toThrow(UnidentifiedError)
  })

  it('rejects other Kawai machines', () => {
    expect(() => unwrapMessage(Uint8Array.of(0xF0, 0x40, 0x00, 0x20, 0x00, 0x05, 0xF7)))
      .toThrow('header [00 20 00 05] matches no dump kind')
  })

  it('rejects a message too short for a header', () => {
    expect(() => unwrapMessage(Uint8Array.of(0xF0, 0x40, 0xF7))).toThrow(TooShortError)
  })
})

describe('decodeMessage', () => {
  it('decodes a K4 multi', () => {
    const result = decodeMessage(k4Message())
    if (!result.ok || result.value.dialect !== 'k4') {
      throw new Error('expected a decoded K4 message')
    }
    const { dump } = result.value.decoded
    expect(dump.kind).toBe('oneMulti')
    if (dump.kind === 'oneMulti') {
      expect(dump.number.value).toBe(12)
      expect(dump.patch.name.trimEnd()).toBe('NewMulti')
    }
  })

  it('decodes a K5000 multi', () => {
    const result = decodeMessage(k5000Message())
    if (!result.ok || result.value.dialect !== 'k5000') {
      throw new Error('expected a decoded K5000 message')
    }
    const { dump } = result.value.decoded
    expect(dump.kind).toBe('oneMulti')
    if (dump.kind === 'oneMulti') {
      expect(dump.number.value).toBe(2)
    }
    expect(result.warnings).toEqual([])
  })

  it('fails on a bad checksum under the strict policy', () => {
    const result = decodeMessage(corrupted(k5000Message()), { checksum: 'strict' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('checksum-mismatch')
    }
  })

  it('logs a bad checksum under the warn policy', () => {
    const logger = { warn: jest.fn(), debug: jest.fn() }
    const result = decodeMessage(corrupted(k5000Message()), { logger })
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.warnings).toHaveLength(1)
    }
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it('reports framing errors as results', () => {
    const result = decodeMessage(Uint8Array.of(0xF0, 0x43, 0x00, 0x20, 0x00, 0x04, 0xF7))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('unidentified')
    }
  })
})

describe('loadDumpFile', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = createTempDir()
  })

  afterEach(() => {
    cleanupTempDir(tempDir)
  })

  it('decodes every message in a file', async () => {
    const filePath = path.join(tempDir, 'mixed.syx')
    fs.writeFileSync(filePath, Buffer.concat([k4Message(), Uint8Array.of(0x00), k5000Message()]))

    const results = await loadDumpFile(filePath)
    expect(results.map(r => r.ok && r.value.dialect)).toEqual(['k4', 'k5000'])
  })

  it('returns one failure for a truncated file', async () => {
    const filePath = path.join(tempDir, 'cut.syx')
    const message = k5000Message()
    fs.writeFileSync(filePath, message.subarray(0, message.length - 1))

    const results = await loadDumpFile(filePath)
    expect(results).toHaveLength(1)
    expect(results[0].ok).toBe(false)
  })

  it('rejects when the file is missing', async () => {
    await expect(loadDumpFile(path.join(tempDir, 'missing.syx'))).rejects.toThrow('ENOENT')
  })
})
