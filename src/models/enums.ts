import { z } from 'zod';

/** Spectrum subtype codes used by the service. */
export const SpectrumType = {
  EXCITATION: 'EX',
  EMISSION: 'EM',
  ABSORPTION: 'AB',
  BANDPASS: 'BP',
  LONGPASS: 'LP',
  SHORTPASS: 'BX',
  BEAMSPLITTER: 'BS',
  TWO_PHOTON_EXCITATION: 'A_2P',
  QUANTUM_EFFICIENCY: 'QE',
  POWER_DENSITY: 'PD',
  BAND_MULTI: 'BM',
} as const;
export type SpectrumType = (typeof SpectrumType)[keyof typeof SpectrumType];

export const SPECTRUM_TYPE_LABELS: Record<SpectrumType, string> = {
  EX: 'excitation',
  EM: 'emission',
  AB: 'absorption',
  BP: 'bandpass',
  LP: 'longpass',
  BX: 'shortpass',
  BS: 'beamsplitter',
  A_2P: 'two-photon excitation',
  QE: 'quantum efficiency',
  PD: 'power density',
  BM: 'band-multi',
};

/** Where a filter sits in an optical configuration's light path. */
export const FilterPath = {
  EXCITATION: 'EX',
  EMISSION: 'EM',
  BEAMSPLITTER: 'BS',
} as const;
export type FilterPath = (typeof FilterPath)[keyof typeof FilterPath];

export const FILTER_PATH_LABELS: Record<FilterPath, string> = {
  EX: 'excitation',
  EM: 'emission',
  BS: 'beamsplitter',
};

/** Oligomeric state of a protein. */
export const Oligomerization = {
  MONOMER: 'M',
  DIMER: 'D',
  TANDEM_DIMER: 'TD',
  WEAK_DIMER: 'WD',
  TETRAMER: 'T',
} as const;
export type Oligomerization = (typeof Oligomerization)[keyof typeof Oligomerization];

export const OLIGOMERIZATION_LABELS: Record<Oligomerization, string> = {
  M: 'monomer',
  D: 'dimer',
  TD: 'tandem dimer',
  WD: 'weak dimer',
  T: 'tetramer',
};

/** Photoswitching behaviour of a protein. */
export const SwitchingType = {
  BASIC: 'B',
  PHOTOACTIVATABLE: 'PA',
  PHOTOSWITCHABLE: 'PS',
  PHOTOCONVERTIBLE: 'PC',
  MULTIPHOTOCHROMIC: 'MP',
  TIMER: 'T',
  OTHER: 'O',
} as const;
export type SwitchingType = (typeof SwitchingType)[keyof typeof SwitchingType];

export const SWITCHING_TYPE_LABELS: Record<SwitchingType, string> = {
  B: 'basic',
  PA: 'photoactivatable',
  PS: 'photoswitchable',
  PC: 'photoconvertible',
  MP: 'multiphotochromic',
  T: 'timer',
  O: 'other',
};

export const spectrumTypeSchema = z.enum(['EX', 'EM', 'AB', 'BP', 'LP', 'BX', 'BS', 'A_2P', 'QE', 'PD', 'BM']);
export const filterPathSchema = z.enum(['EX', 'EM', 'BS']);
export const oligomerizationSchema = z.enum(['M', 'D', 'TD', 'WD', 'T']);
export const switchingTypeSchema = z.enum(['B', 'PA', 'PS', 'PC', 'MP', 'T', 'O']);
