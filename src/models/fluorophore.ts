import { z } from 'zod';
import { isRecord } from '../utils/isRecord.js';
import {
  frozenCopy,
  idReferenceSchema,
  idSchema,
  nullableList,
  optionalNumber,
  optionalString,
  stringOrEmpty,
} from './common.js';
import { type Oligomerization, oligomerizationSchema, type SwitchingType, switchingTypeSchema } from './enums.js';
import { ownedSpectrumSchema, type Spectrum } from './spectrum.js';

export interface StateInit {
  id: string;
  name: string;
  exMax?: number;
  emMax?: number;
  exhex: string;
  emhex: string;
  extCoeff?: number;
  qy?: number;
  lifetime?: number;
  spectra: Spectrum[];
}

/**
 * One photophysical state of a fluorophore.
 * `exMax`/`emMax` are in nm, `extCoeff` in M^-1 cm^-1, `lifetime` in ns.
 */
export class State {
  readonly id: string;
  readonly name: string;
  readonly exMax?: number;
  readonly emMax?: number;
  readonly exhex: string;
  readonly emhex: string;
  readonly extCoeff?: number;
  readonly qy?: number;
  readonly lifetime?: number;
  readonly spectra: ReadonlyArray<Spectrum>;

  constructor(init: StateInit) {
    this.id = init.id;
    this.name = init.name;
    this.exMax = init.exMax;
    this.emMax = init.emMax;
    this.exhex = init.exhex;
    this.emhex = init.emhex;
    this.extCoeff = init.extCoeff;
    this.qy = init.qy;
    this.lifetime = init.lifetime;
    this.spectra = frozenCopy(init.spectra);
    Object.freeze(this);
  }

  /** First excitation spectrum, else the first absorption spectrum. */
  get excitationSpectrum(): Spectrum | undefined {
    return this.spectra.find((s) => s.subtype === 'EX') ?? this.spectra.find((s) => s.subtype === 'AB');
  }

  get emissionSpectrum(): Spectrum | undefined {
    return this.spectra.find((s) => s.subtype === 'EM');
  }

  /** `extCoeff * qy / 1000`, when both are known. */
  get brightness(): number | undefined {
    if (this.extCoeff === undefined || this.qy === undefined) {
      return undefined;
    }

    return (this.extCoeff * this.qy) / 1000;
  }
}

export type FluorophoreKind = 'dye' | 'protein';

export interface FluorophoreInit {
  id: string;
  name: string;
  states: State[];
  defaultState?: { id: string } | null;
}

/**
 * Picks the state referenced by `id`, falling back to the first state.
 */
function resolveDefaultState(states: ReadonlyArray<State>, id: string | undefined): State | undefined {
  const referenced = id === undefined ? undefined : states.find((state) => state.id === id);
  return referenced ?? states[0];
}

/** A dye or protein with its states. */
export class Fluorophore {
  readonly kind: FluorophoreKind;
  readonly id: string;
  readonly name: string;
  readonly states: ReadonlyArray<State>;
  readonly defaultState?: State;

  constructor(init: FluorophoreInit, kind: FluorophoreKind = 'dye') {
    this.kind = kind;
    this.id = init.id;
    this.name = init.name;
    this.states = frozenCopy(init.states);
    this.defaultState = resolveDefaultState(this.states, init.defaultState?.id);
    if (new.target === Fluorophore) {
      Object.freeze(this);
    }
  }
}

/** Literature reference. */
export class Reference {
  readonly doi: string;

  constructor(doi: string) {
    this.doi = doi;
    Object.freeze(this);
  }

  get url(): string {
    return `https://doi.org/${this.doi}`;
  }
}

export interface ProteinInit extends FluorophoreInit {
  seq?: string;
  pdb: string[];
  genbank?: string;
  uniprot?: string;
  weight?: number;
  agg?: Oligomerization;
  switchType?: SwitchingType;
  primaryReference?: Reference;
  references: Reference[];
}

export class Protein extends Fluorophore {
  readonly seq?: string;
  readonly pdb: ReadonlyArray<string>;
  readonly genbank?: string;
  readonly uniprot?: string;
  /** Molecular weight in kDa */
  readonly weight?: number;
  readonly agg?: Oligomerization;
  readonly switchType?: SwitchingType;
  readonly primaryReference?: Reference;
  readonly references: ReadonlyArray<Reference>;

  constructor(init: ProteinInit) {
    super(init, 'protein');
    this.seq = init.seq;
    this.pdb = frozenCopy(init.pdb);
    this.genbank = init.genbank;
    this.uniprot = init.uniprot;
    this.weight = init.weight;
    this.agg = init.agg;
    this.switchType = init.switchType;
    this.primaryReference = init.primaryReference;
    this.references = frozenCopy(init.references);
    Object.freeze(this);
  }
}

/**
 * Rewrites a payload that inlines its spectral fields (no `states`, but an `exMax`)
 * into one holding a single state, named and identified like the fluorophore, that is also the default.
 * Anything else is returned as is.
 */
export function normalizeFluorophorePayload(raw: unknown): unknown {
  if (!isRecord(raw) || 'states' in raw || !('exMax' in raw)) {
    return raw;
  }

  return { ...raw, states: [{ ...raw }], defaultState: { id: raw.id } };
}

export const stateSchema = z
  .object({
    id: idSchema,
    name: z.string(),
    exMax: optionalNumber,
    emMax: optionalNumber,
    exhex: stringOrEmpty,
    emhex: stringOrEmpty,
    extCoeff: optionalNumber,
    qy: optionalNumber,
    lifetime: optionalNumber,
    spectra: nullableList(ownedSpectrumSchema),
  })
  .transform((state) => new State(state));

const referenceSchema = z.object({ doi: z.string() }).transform(({ doi }) => new Reference(doi));

const fluorophoreFields = {
  id: idSchema,
  name: z.string(),
  states: nullableList(stateSchema),
  defaultState: idReferenceSchema.nullish(),
};

export const dyeSchema = z.preprocess(
  normalizeFluorophorePayload,
  z.object(fluorophoreFields).transform((dye) => new Fluorophore(dye, 'dye')),
);

export const proteinSchema = z.preprocess(
  normalizeFluorophorePayload,
  z
    .object({
      ...fluorophoreFields,
      seq: optionalString,
      pdb: nullableList(z.string()),
      genbank: optionalString,
      uniprot: optionalString,
      weight: optionalNumber,
      agg: oligomerizationSchema.nullish().transform((value) => value ?? undefined),
      switchType: switchingTypeSchema.nullish().transform((value) => value ?? undefined),
      primaryReference: referenceSchema.nullish().transform((value) => value ?? undefined),
      references: nullableList(referenceSchema),
    })
    .transform((protein) => new Protein(protein)),
);
