/**
 * @ksynth/node
 *
 * Node.js helpers for Kawai SysEx dumps: .syx file loading and watching.
 * Requires Node.js 20+.
 */

export {
  splitMessages,
  unwrapMessage,
  decodeMessage,
  loadDumpFile,
  frameMessage,
  SYSEX_START,
  SYSEX_END,
  KAWAI_ID
} from './syx'
export type { Dialect, MidiChannel, SysexMessage, DecodedMessage } from './syx'

export { DumpWatcher } from './DumpWatcher'
export type { DumpFile, DumpHandler, DumpWatcherOptions } from './DumpWatcher'
