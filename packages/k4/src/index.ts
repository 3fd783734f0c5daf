/**
 * @ksynth/k4
 *
 * Codecs for Kawai K4/K4r SysEx dumps: single, multi, drum and effect
 * patches, banks and dump headers.
 */

// --- Values ---
export { K4, SUBMIX_NAMES } from './categories'
export type {
  Level,
  Depth,
  Coarse,
  Fine,
  Transpose,
  Curve,
  EffectNumber,
  Resonance,
  BenderRange,
  Key,
  PatchNumber,
  Channel,
  Submix,
  DrumDecay,
  SmallEffectParameter,
  BigEffectParameter,
  Pan,
  WaveNumber
} from './categories'
export { waveName, decodeWave, encodeWave } from './wave'

// --- Leaf Blocks ---
export { levelModulation, timeModulation, defaultLevelModulation, defaultTimeModulation } from './modulation'
export type { LevelModulation, TimeModulation } from './modulation'
export { amplifier, ampEnvelope, defaultAmplifier } from './amp'
export type { Amplifier, AmpEnvelope } from './amp'
export { filter, filterEnvelope, defaultFilter } from './filter'
export type { Filter, FilterEnvelope } from './filter'
export { source, defaultSource } from './source'
export type { Source } from './source'

// --- Patches ---
export {
  singlePatch,
  singlePatchCodec,
  SINGLE_NAME_LENGTH,
  SOURCE_MODES,
  POLYPHONY_MODES,
  LFO_SHAPES,
  WHEEL_ASSIGNS
} from './single'
export type { SinglePatch, SourceMode, PolyphonyMode, LfoShape, WheelAssign, Vibrato, AutoBend, Lfo } from './single'
export { multiPatch, multiPatchCodec, section, sectionCodec, MULTI_NAME_LENGTH, VELOCITY_SWITCHES, PLAY_MODES } from './multi'
export type { MultiPatch, Section, VelocitySwitch, PlayMode } from './multi'
export {
  drumPatch,
  drumSource,
  drumPatchCodec,
  drumCommonCodec,
  drumNoteCodec,
  drumSourceCodec,
  DRUM_NOTE_COUNT,
  FIRST_DRUM_KEY
} from './drum'
export type { DrumPatch, DrumCommon, DrumNote, DrumSource } from './drum'
export {
  effectPatch,
  effectPatchCodec,
  submixSettings,
  submixSettingsCodec,
  effectName,
  effectParameterNames,
  EFFECT_TYPES
} from './effect'
export type { EffectPatch, EffectType, SubmixSettings } from './effect'

// --- Bank ---
export {
  bank,
  bankCodec,
  BANK_SIZE,
  BANK_OFFSETS,
  SINGLE_COUNT,
  MULTI_COUNT,
  EFFECT_COUNT,
  singleOffset,
  multiOffset,
  effectOffset
} from './bank'
export type { Bank } from './bank'

// --- Dumps ---
export {
  decodeDump,
  encodeDump,
  decodeHeader,
  encodeHeader,
  identify,
  DUMP_RULES,
  FUNCTION_CODES,
  GROUP_ID,
  MACHINE_ID,
  HEADER_SIZE
} from './sysex'
export type { Dump, DumpKind, DecodedDump, Header, FunctionName } from './sysex'

// --- Text ---
export { formatSingle, formatMulti, formatEffect, formatBank, slotName, keyName, submixName } from './format'
