/**
 * @ksynth/k5000
 *
 * Codecs for Kawai K5000 SysEx dumps: single patches with their additive
 * kits, multis, tone maps and dump headers.
 */

// --- Values ---
export { K5000, ADD_WAVE } from './categories'
export type {
  Level,
  Signed,
  MacroDepth,
  GeqBand,
  Coarse,
  Transpose,
  VelocityCurve,
  Channel,
  EffectPath,
  Resonance,
  FilterLevel,
  Depth,
  EffectDepth,
  BenderPitch,
  BenderCutoff,
  SourceCount,
  VelocityThreshold,
  ToneNumber,
  MultiNumber,
  WaveNumber,
  InstrumentNumber
} from './categories'

// --- Effects ---
export {
  effectDefinition,
  effectSettings,
  effectControl,
  graphicEq,
  effectDefinitionCodec,
  effectSettingsCodec,
  effectControlCodec,
  geqCodec,
  effectName,
  effectParameterNames,
  EFFECT_TYPES,
  EFFECT_ALGORITHMS,
  EFFECT_DESTINATIONS,
  GEQ_BANDS
} from './effect'
export type {
  EffectDefinition,
  EffectSettings,
  EffectControl,
  EffectControlSource,
  EffectType,
  EffectAlgorithm,
  EffectDestination,
  GraphicEq
} from './effect'

// --- Source Blocks ---
export {
  defaultSourceControl,
  sourceControlCodec,
  macroControllerCodec,
  assignableControllerCodec,
  decodeVelocitySwitch,
  encodeVelocitySwitch,
  thresholdVelocity,
  CONTROL_SOURCES,
  CONTROL_DESTINATIONS,
  SWITCH_FUNCTIONS,
  VELOCITY_SWITCH_TYPES,
  VELOCITY_THRESHOLDS,
  PAN_TYPES
} from './control'
export type {
  SourceControl,
  MacroController,
  AssignableController,
  VelocitySwitch,
  VelocitySwitchType,
  ControlSource,
  ControlDestination,
  SwitchFunction,
  PanType
} from './control'
export {
  defaultOscillator,
  oscillatorCodec,
  pitchEnvelopeCodec,
  decodeWaveNumber,
  encodeWaveNumber,
  isAdditive,
  KEY_SCALING_PITCH
} from './oscillator'
export type { Oscillator, PitchEnvelope, KeyScalingPitch } from './oscillator'
export { defaultFilter, filterCodec, FILTER_MODES } from './filter'
export type { Filter, FilterEnvelope, FilterMode } from './filter'
export { defaultAmplifier, amplifierCodec } from './amp'
export type { Amplifier, AmpEnvelope } from './amp'
export { defaultLfo, lfoCodec, LFO_WAVEFORMS } from './lfo'
export type { Lfo, LfoControl, LfoWaveform } from './lfo'
export { pcmSource, additiveSource, isAdditiveSource, sourceCodec, SOURCE_SIZE } from './source'
export type { Source } from './source'

// --- Additive Kit ---
export {
  additiveKit,
  additiveKitCodec,
  harmonicCommonCodec,
  morfCodec,
  formantFilterCodec,
  harmonicEnvelopeCodec,
  ADDITIVE_KIT_SIZE,
  HARMONIC_COUNT,
  BAND_COUNT,
  HARMONIC_GROUPS,
  ENVELOPE_LOOPS,
  FORMANT_MODES,
  FORMANT_LFO_SHAPES
} from './additive'
export type {
  AdditiveKit,
  HarmonicCommon,
  Morf,
  MorfCopy,
  FormantFilter,
  FormantSegment,
  HarmonicEnvelope,
  HarmonicSegment,
  HarmonicGroup,
  EnvelopeLoop,
  FormantMode,
  FormantLfoShape
} from './additive'

// --- Patches ---
export {
  singlePatch,
  singlePatchCodec,
  singleCommonCodec,
  SINGLE_NAME_LENGTH,
  MAX_SOURCES,
  COMMON_SIZE,
  POLYPHONY_MODES,
  AMPLITUDE_MODULATIONS
} from './single'
export type {
  SinglePatch,
  SingleCommon,
  SingleCommonBlock,
  SingleSource,
  Switches,
  VariableCodec,
  PolyphonyMode,
  AmplitudeModulation
} from './single'
export {
  multiPatch,
  multiPatchCodec,
  multiCommonCodec,
  section,
  sectionCodec,
  MULTI_NAME_LENGTH,
  MULTI_SIZE,
  SECTION_COUNT
} from './multi'
export type { MultiPatch, MultiCommon, Section } from './multi'
export { ToneMap, TONE_COUNT, TONE_MAP_SIZE } from './tonemap'

// --- Dumps ---
export {
  decodeDump,
  encodeDump,
  decodeHeader,
  encodeHeader,
  decodeSingles,
  identify,
  DUMP_RULES,
  FUNCTION_CODES,
  PATCH_KINDS,
  BANKS,
  GROUP_ID,
  MACHINE_ID,
  HEADER_SIZE,
  MULTI_COUNT
} from './sysex'
export type { Dump, DumpKind, DecodedDump, Header, FunctionName, PatchKind, Bank, TonePatch } from './sysex'

// --- Text ---
export { formatSingle, formatMulti, formatEffect, formatEffects, formatDump, keyName, toneName } from './format'
