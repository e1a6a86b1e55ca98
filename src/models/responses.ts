import { z } from 'zod';
import { idSchema, nullableList, stringOrEmpty } from './common.js';
import { dyeSchema, proteinSchema } from './fluorophore.js';
import { microscopeSchema } from './microscope.js';
import { spectrumSchema } from './spectrum.js';

/*
 * Shapes of the `data` member of each query's response.
 */

export const microscopeDataSchema = z.object({ microscope: microscopeSchema });

export const dyeDataSchema = z.object({ dye: dyeSchema });

export const proteinDataSchema = z.object({ protein: proteinSchema });

export const spectrumDataSchema = z.object({ spectrum: spectrumSchema });

const listedFluorophoreSchema = z.object({ id: idSchema, name: z.string(), slug: stringOrEmpty });

export const fluorophoreListDataSchema = z.object({
  dyes: nullableList(listedFluorophoreSchema),
  proteins: nullableList(listedFluorophoreSchema),
});

/** Spectra of one category with their owner's name; orphaned spectra carry `owner: null`. */
export const ownerSpectraListDataSchema = z.object({
  spectra: nullableList(
    z.object({
      id: idSchema,
      owner: z.object({ name: z.string() }).nullish(),
    }),
  ),
});

export const microscopeListDataSchema = z.object({
  microscopes: nullableList(z.object({ id: idSchema, name: z.string() })),
});
