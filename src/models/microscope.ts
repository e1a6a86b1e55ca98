import { z } from 'zod';
import { isRecord } from '../utils/isRecord.js';
import { frozenCopy, idSchema, nullableList } from './common.js';
import { type FilterPath, filterPathSchema } from './enums.js';
import {
  type Camera,
  cameraSchema,
  type Filter,
  filterSchema,
  type LightSource,
  lightSourceSchema,
} from './spectrum.js';

/** A filter at one position of a light path. */
export class FilterPlacement {
  readonly path: FilterPath;
  readonly reflects: boolean;
  readonly filter: Filter;

  constructor(init: { path: FilterPath; reflects: boolean; filter: Filter }) {
    this.path = init.path;
    this.reflects = init.reflects;
    this.filter = init.filter;
    Object.freeze(this);
  }
}

export interface OpticalConfigInit {
  name: string;
  filters: FilterPlacement[];
  camera?: Camera;
  light?: LightSource;
  laser?: number;
}

/** One imaging channel: filters, camera and light source. */
export class OpticalConfig {
  readonly name: string;
  readonly filters: ReadonlyArray<FilterPlacement>;
  readonly camera?: Camera;
  readonly light?: LightSource;
  /** Laser line in nm */
  readonly laser?: number;

  constructor(init: OpticalConfigInit) {
    this.name = init.name;
    this.filters = frozenCopy(init.filters);
    this.camera = init.camera;
    this.light = init.light;
    this.laser = init.laser;
    Object.freeze(this);
  }
}

export class Microscope {
  readonly id: string;
  readonly name: string;
  readonly opticalConfigs: ReadonlyArray<OpticalConfig>;

  constructor(init: { id: string; name: string; opticalConfigs: OpticalConfig[] }) {
    this.id = init.id;
    this.name = init.name;
    this.opticalConfigs = frozenCopy(init.opticalConfigs);
    Object.freeze(this);
  }
}

/**
 * The service lists placed filters flat, with the filter's own fields beside `path` and `reflects`.
 * Moves those fields under `filter`; entries that already nest a `filter` pass through.
 */
export function normalizeFilterPlacement(raw: unknown): unknown {
  if (!isRecord(raw) || 'filter' in raw) {
    return raw;
  }

  const { path, reflects, ...filter } = raw;
  return { path, reflects, filter };
}

const filterPlacementSchema = z.preprocess(
  normalizeFilterPlacement,
  z
    .object({
      path: filterPathSchema,
      reflects: z
        .boolean()
        .nullish()
        .transform((value) => value ?? false),
      filter: filterSchema,
    })
    .transform((placement) => new FilterPlacement(placement)),
);

const opticalConfigSchema = z
  .object({
    name: z.string(),
    filters: nullableList(filterPlacementSchema),
    camera: cameraSchema.nullish().transform((value) => value ?? undefined),
    light: lightSourceSchema.nullish().transform((value) => value ?? undefined),
    laser: z
      .number()
      .int()
      .nullish()
      .transform((value) => value ?? undefined),
  })
  .transform((config) => new OpticalConfig(config));

export const microscopeSchema = z
  .object({
    id: idSchema,
    name: z.string(),
    opticalConfigs: nullableList(opticalConfigSchema),
  })
  .transform((microscope) => new Microscope(microscope));
