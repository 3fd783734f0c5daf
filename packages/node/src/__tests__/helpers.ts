/**
 * @ksynth/node - Test Helpers
 */

import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { BoundedValue } from '@ksynth/core'
import { K4, encodeDump as encodeK4Dump, multiPatch as k4Multi } from '@ksynth/k4'
import { K5000, encodeDump as encodeK5000Dump, multiPatch as k5000Multi } from '@ksynth/k5000'
import { frameMessage } from '../syx'

/** K4 internal multi 12 on MIDI channel 3 */
export function k4Message(): Uint8Array {
  return frameMessage(encodeK4Dump(
    {
      kind: 'oneMulti',
      locality: 'internal',
      number: BoundedValue.fromInteger(K4.patchNumber, 12),
      patch: k4Multi()
    },
    BoundedValue.fromInteger(K4.channel, 3)
  ))
}

/** K5000 multi 2 on MIDI channel 1 */
export function k5000Message(): Uint8Array {
  return frameMessage(encodeK5000Dump({
    kind: 'oneMulti',
    number: BoundedValue.fromInteger(K5000.multi, 2),
    patch: k5000Multi()
  }))
}

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'ksynth-node-test-'))
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}

export function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
