/**
 * Models entrypoint: entity classes, enumerations and the schemas that build them from response payloads.
 * @module
 */

export { idSchema, nullableList } from './common.js';
export {
  FILTER_PATH_LABELS,
  FilterPath,
  filterPathSchema,
  OLIGOMERIZATION_LABELS,
  Oligomerization,
  oligomerizationSchema,
  SPECTRUM_TYPE_LABELS,
  SpectrumType,
  SWITCHING_TYPE_LABELS,
  SwitchingType,
  spectrumTypeSchema,
  switchingTypeSchema,
} from './enums.js';
export {
  dyeSchema,
  Fluorophore,
  type FluorophoreInit,
  type FluorophoreKind,
  normalizeFluorophorePayload,
  Protein,
  type ProteinInit,
  proteinSchema,
  Reference,
  State,
  type StateInit,
  stateSchema,
} from './fluorophore.js';
export {
  FilterPlacement,
  Microscope,
  microscopeSchema,
  normalizeFilterPlacement,
  OpticalConfig,
  type OpticalConfigInit,
} from './microscope.js';
export { parseEntity } from './parse.js';
export {
  dyeDataSchema,
  fluorophoreListDataSchema,
  microscopeDataSchema,
  microscopeListDataSchema,
  ownerSpectraListDataSchema,
  proteinDataSchema,
  spectrumDataSchema,
} from './responses.js';
export {
  Camera,
  cameraSchema,
  type DeviceInit,
  Filter,
  type FilterInit,
  filterSchema,
  LightSource,
  lightSourceSchema,
  Spectrum,
  type SpectrumInit,
  type SpectrumOwner,
  type SpectrumPoint,
  spectrumSchema,
} from './spectrum.js';
