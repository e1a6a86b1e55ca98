import { Hono } from 'hono';
import { z } from 'zod';
import {
  DYE_QUERY,
  FLUOROPHORE_LIST_QUERY,
  MICROSCOPE_LIST_QUERY,
  MICROSCOPE_QUERY,
  OWNER_SPECTRA_LIST_QUERY,
  PROTEIN_QUERY,
  SPECTRUM_QUERY,
} from '../src/graphql/queries.js';
import type { FetchImplementation } from '../src/types/request.js';
import { safeWrapAsync } from '../src/utils/wrap.js';
import { cameras, dyes, filters, lights, microscopes, proteins } from './catalog.js';

/** Endpoint the fake service answers on. */
export const FAKE_ENDPOINT = 'http://fpbase.test/graphql/';

const requestSchema = z.object({
  query: z.string(),
  variables: z.record(z.string(), z.unknown()).default({}),
});

export interface ReceivedRequest {
  query: string;
  variables: Record<string, unknown>;
  headers: Record<string, string>;
}

function respond(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function ownerSpectra(category: unknown) {
  const owners: Array<{ name: string; spectrum: { id: number } }> =
    category === 'F' ? filters : category === 'C' ? cameras : category === 'L' ? lights : [];
  return owners.map((owner) => ({ id: owner.spectrum.id, owner: { name: owner.name } }));
}

function spectrum(id: unknown) {
  const empty = { ownerFilter: null, ownerCamera: null, ownerLight: null };
  const filter = filters.find((owner) => owner.spectrum.id === id);
  if (filter) {
    return { ...filter.spectrum, ...empty, ownerFilter: filter };
  }

  const camera = cameras.find((owner) => owner.spectrum.id === id);
  if (camera) {
    return { ...camera.spectrum, ...empty, ownerCamera: camera };
  }

  const light = lights.find((owner) => owner.spectrum.id === id);
  if (light) {
    return { ...light.spectrum, ...empty, ownerLight: light };
  }

  return null;
}

/**
 * `data` for a known query template, `undefined` for anything else.
 */
function answer(query: string, variables: Record<string, unknown>): unknown {
  switch (query) {
    case FLUOROPHORE_LIST_QUERY:
      return {
        dyes: dyes.map(({ id, name, slug }) => ({ id, name, slug })),
        proteins: proteins.map(({ id, name, slug }) => ({ id, name, slug })),
      };
    case OWNER_SPECTRA_LIST_QUERY:
      return { spectra: ownerSpectra(variables.category) };
    case MICROSCOPE_LIST_QUERY:
      return { microscopes: microscopes.map(({ id, name }) => ({ id, name })) };
    case DYE_QUERY:
      return { dye: dyes.find((dye) => dye.id === variables.id) ?? null };
    case PROTEIN_QUERY:
      return { protein: proteins.find((protein) => protein.id === variables.id) ?? null };
    case SPECTRUM_QUERY:
      return { spectrum: spectrum(variables.id) };
    case MICROSCOPE_QUERY:
      return { microscope: microscopes.find((microscope) => microscope.id === variables.id) ?? null };
    default:
      return undefined;
  }
}

/**
 * In-process stand-in for the GraphQL service, reached through `app.request` so no socket is opened.
 */
export function createFakeService() {
  const received: ReceivedRequest[] = [];
  const failures: number[] = [];
  const app = new Hono();

  app.post('/graphql/', async (c) => {
    const [errJson, json] = await safeWrapAsync(() => c.req.json<unknown>());
    if (errJson) {
      return respond({ errors: [{ message: 'invalid json' }] }, 400);
    }

    const parsed = requestSchema.safeParse(json);
    if (!parsed.success) {
      return respond({ errors: [{ message: 'invalid request' }] }, 400);
    }

    const { query, variables } = parsed.data;
    received.push({ query, variables, headers: c.req.header() });

    const failure = failures.shift();
    if (failure !== undefined) {
      return respond({ errors: [{ message: 'service unavailable' }] }, failure);
    }

    const data = answer(query, variables);
    if (data === undefined) {
      return respond({ data: null, errors: [{ message: 'unknown query' }] });
    }

    return respond({ data });
  });

  const fetch: FetchImplementation = async (input, init) => app.request(input, init);

  return {
    app,
    fetch,
    received,
    /** Requests answered so far, failed ones included. */
    get requestCount() {
      return received.length;
    },
    /** Makes the next requests fail with the given statuses, in order. */
    failNext(...statuses: number[]) {
      failures.push(...statuses);
    },
  };
}

export type FakeService = ReturnType<typeof createFakeService>;
