import { z } from 'zod';
import { frozenCopy, idSchema, optionalNumber, stringOrEmpty } from './common.js';
import { type SpectrumType, spectrumTypeSchema } from './enums.js';

/** One `[wavelength (nm), value]` sample. */
export type SpectrumPoint = readonly [wavelength: number, value: number];

/**
 * Something that owns exactly one spectrum: a filter, camera or light source.
 */
export interface SpectrumOwner {
  readonly id: string;
  readonly name: string;
  readonly spectrum: Spectrum;
}

export interface SpectrumInit {
  id: string;
  subtype: SpectrumType;
  data: SpectrumPoint[];
  ownerFilter?: Filter | null;
  ownerCamera?: Camera | null;
  ownerLight?: LightSource | null;
}

/**
 * A wavelength-vs-value curve tagged with its subtype.
 *
 * When fetched on its own, the spectrum also references the filter, camera or light
 * source it belongs to; spectra nested inside their owner do not point back.
 */
export class Spectrum {
  readonly id: string;
  readonly subtype: SpectrumType;
  readonly data: ReadonlyArray<SpectrumPoint>;
  readonly ownerFilter?: Filter;
  readonly ownerCamera?: Camera;
  readonly ownerLight?: LightSource;

  constructor(init: SpectrumInit) {
    this.id = init.id;
    this.subtype = init.subtype;
    this.data = frozenCopy(
      init.data.map((point) => {
        const copy: SpectrumPoint = [point[0], point[1]];
        return Object.freeze(copy);
      }),
    );
    this.ownerFilter = init.ownerFilter ?? undefined;
    this.ownerCamera = init.ownerCamera ?? undefined;
    this.ownerLight = init.ownerLight ?? undefined;
    Object.freeze(this);
  }

  /** Whichever owner is populated, if any. */
  get owner(): SpectrumOwner | undefined {
    return this.ownerFilter ?? this.ownerCamera ?? this.ownerLight;
  }

  /** Wavelength of the highest value; the first one wins a tie. */
  get peakWavelength(): number | undefined {
    let peak: SpectrumPoint | undefined;
    for (const point of this.data) {
      if (!peak || point[1] > peak[1]) {
        peak = point;
      }
    }

    return peak?.[0];
  }
}

export interface FilterInit {
  id: string;
  name: string;
  spectrum: Spectrum;
  manufacturer: string;
  bandcenter?: number;
  bandwidth?: number;
  edge?: number;
}

/** An optical filter. `bandcenter`, `bandwidth` and `edge` are in nm. */
export class Filter implements SpectrumOwner {
  readonly id: string;
  readonly name: string;
  readonly spectrum: Spectrum;
  readonly manufacturer: string;
  readonly bandcenter?: number;
  readonly bandwidth?: number;
  readonly edge?: number;

  constructor(init: FilterInit) {
    this.id = init.id;
    this.name = init.name;
    this.spectrum = init.spectrum;
    this.manufacturer = init.manufacturer;
    this.bandcenter = init.bandcenter;
    this.bandwidth = init.bandwidth;
    this.edge = init.edge;
    Object.freeze(this);
  }
}

export interface DeviceInit {
  id: string;
  name: string;
  spectrum: Spectrum;
  manufacturer: string;
}

export class Camera implements SpectrumOwner {
  readonly id: string;
  readonly name: string;
  readonly spectrum: Spectrum;
  readonly manufacturer: string;

  constructor(init: DeviceInit) {
    this.id = init.id;
    this.name = init.name;
    this.spectrum = init.spectrum;
    this.manufacturer = init.manufacturer;
    Object.freeze(this);
  }
}

export class LightSource implements SpectrumOwner {
  readonly id: string;
  readonly name: string;
  readonly spectrum: Spectrum;
  readonly manufacturer: string;

  constructor(init: DeviceInit) {
    this.id = init.id;
    this.name = init.name;
    this.spectrum = init.spectrum;
    this.manufacturer = init.manufacturer;
    Object.freeze(this);
  }
}

const spectrumDataSchema = z
  .array(z.tuple([z.number(), z.number()]))
  .nullish()
  .transform((data) => data ?? []);

const spectrumFields = {
  id: idSchema,
  subtype: spectrumTypeSchema,
  data: spectrumDataSchema,
};

/** Spectrum nested inside its owner. */
export const ownedSpectrumSchema = z.object(spectrumFields).transform((spectrum) => new Spectrum(spectrum));

const deviceFields = {
  id: idSchema,
  name: z.string(),
  manufacturer: stringOrEmpty,
  spectrum: ownedSpectrumSchema,
};

export const filterSchema = z
  .object({
    ...deviceFields,
    bandcenter: optionalNumber,
    bandwidth: optionalNumber,
    edge: optionalNumber,
  })
  .transform((filter) => new Filter(filter));

export const cameraSchema = z.object(deviceFields).transform((camera) => new Camera(camera));

export const lightSourceSchema = z.object(deviceFields).transform((light) => new LightSource(light));

/** Spectrum with optional owner references; at most one owner may be set. */
export const spectrumSchema = z
  .object({
    ...spectrumFields,
    ownerFilter: filterSchema.nullish(),
    ownerCamera: cameraSchema.nullish(),
    ownerLight: lightSourceSchema.nullish(),
  })
  .superRefine((spectrum, ctx) => {
    const owners = [spectrum.ownerFilter, spectrum.ownerCamera, spectrum.ownerLight].filter(Boolean);
    if (owners.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected at most one owner, got ${owners.length}`,
      });
    }
  })
  .transform((spectrum) => new Spectrum(spectrum));
