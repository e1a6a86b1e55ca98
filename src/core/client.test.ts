import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { createFakeService, FAKE_ENDPOINT, type FakeService } from '../../e2e/service.js';
import { GraphQLResponseError } from '../error/graphQLResponseError.js';
import { getHttpError } from '../error/httpError.js';
import { InvalidArgumentError } from '../error/invalidArgumentError.js';
import { NotFoundError } from '../error/notFoundError.js';
import { getTransportError } from '../error/transportError.js';
import { getValidationError, isValidationError, ValidationError } from '../error/validationError.js';
import type { TransportDefinition } from '../fetch/client.js';
import { MICROSCOPE_LIST_QUERY, SPECTRUM_QUERY } from '../graphql/queries.js';
import { Protein } from '../models/fluorophore.js';
import { Filter } from '../models/spectrum.js';
import type { GraphQLPayload } from '../types/graphql.js';
import type { FetchImplementation } from '../types/request.js';
import { FPbaseClient } from './client.js';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

describe('FPbaseClient', () => {
  let service: FakeService;
  let client: FPbaseClient;

  beforeEach(() => {
    service = createFakeService();
    client = new FPbaseClient({ endpoint: FAKE_ENDPOINT, fetch: service.fetch, timeout: false });
  });

  afterEach(() => {
    client.dispose();
    vi.restoreAllMocks();
  });

  describe('Create', () => {
    test('uses the public endpoint by default', () => {
      expect(new FPbaseClient().endpoint).toBe('https://www.fpbase.org/graphql/');
    });

    test('sends through a custom transport', async () => {
      const posted: GraphQLPayload[] = [];
      class RecordingTransport implements TransportDefinition {
        async post(_endpoint: string, payload: GraphQLPayload): Promise<[null, string]> {
          posted.push(payload);
          return [null, JSON.stringify({ data: { microscopes: [{ id: 'm1', name: 'Scope' }] } })];
        }
      }

      const custom = new FPbaseClient({ transportProvider: RecordingTransport });
      const [err, ids] = await custom.listMicroscopes();

      expect(err).toBeNull();
      expect(ids).toEqual(['m1']);
      expect(posted).toEqual([{ query: MICROSCOPE_LIST_QUERY, variables: {} }]);
    });
  });

  describe('getFluorophore', () => {
    test('fetches a single-state dye', async () => {
      const [err, dye] = await client.getFluorophore('alexa fluor 488');

      expect(err).toBeNull();
      expect(dye?.kind).toBe('dye');
      expect(dye?.id).toBe('1');
      expect(dye?.states).toHaveLength(1);
      expect(dye?.defaultState).toBe(dye?.states[0]);
      expect(dye?.defaultState?.excitationSpectrum?.subtype).toBe('AB');
      expect(dye?.defaultState?.emissionSpectrum?.data).toEqual([
        [519, 1],
        [560, 0.18],
      ]);
    });

    test('sends dye ids as integers and protein ids as strings', async () => {
      await client.getFluorophore('Alexa Fluor 488');
      await client.getFluorophore('EGFP');

      expect(service.received.map((request) => request.variables)).toEqual([{}, { id: 1 }, { id: 'R9NL8' }]);
    });

    test('fetches a protein by name, slug or id', async () => {
      const results = await Promise.all(['EGFP', 'egfp', 'r9nl8'].map((name) => client.getFluorophore(name)));

      for (const [err, protein] of results) {
        expect(err).toBeNull();
        expect(protein).toBeInstanceOf(Protein);
        expect(protein?.id).toBe('R9NL8');
      }
    });

    test('fails with a suggestion on a near miss', async () => {
      const [err, fluorophore] = await client.getFluorophore('mScrlet');

      expect(fluorophore).toBeNull();
      expect(err).toBeInstanceOf(NotFoundError);
      expect(err?.message).toBe("error fluorophore 'mScrlet' not found, did you mean 'mscarlet'?");
      expect(service.requestCount).toBe(1);
    });
  });

  describe('getProtein', () => {
    test('fills protein fields', async () => {
      const [err, protein] = await client.getProtein('EGFP');

      expect(err).toBeNull();
      expect(protein?.seq).toBe('MVSKGEELFTGVVPILVELDGDVNGHKF');
      expect(protein?.pdb).toEqual(['0TST']);
      expect(protein?.weight).toBe(26.94);
      expect(protein?.agg).toBe('M');
      expect(protein?.primaryReference?.url).toBe('https://doi.org/10.0000/example.egfp');
      expect(protein?.references.map((reference) => reference.doi)).toEqual([
        '10.0000/example.egfp',
        '10.0000/example.review',
      ]);
      expect(protein?.defaultState?.brightness).toBeCloseTo(33.54);
    });

    test('resolves the referenced default state of a multi-state protein', async () => {
      const [err, protein] = await client.getProtein('test-kaede');

      expect(err).toBeNull();
      expect(protein?.states.map((state) => state.name)).toEqual(['green', 'red']);
      expect(protein?.defaultState?.name).toBe('red');
      expect(protein?.switchType).toBe('PC');
    });

    test('rejects a dye', async () => {
      const [err] = await client.getProtein('Alexa Fluor 488');

      expect(err).toBeInstanceOf(InvalidArgumentError);
      expect(err?.message).toBe("error 'Alexa Fluor 488' is a dye, not a protein");
    });
  });

  describe('getDye', () => {
    test('fetches a dye by slug', async () => {
      const [err, dye] = await client.getDye('alexa-fluor-488');

      expect(err).toBeNull();
      expect(dye?.name).toBe('Alexa Fluor 488');
    });

    test('rejects a protein', async () => {
      const [err] = await client.getDye('mScarlet');

      expect(err).toBeInstanceOf(InvalidArgumentError);
      expect(err?.message).toBe("error 'mScarlet' is a protein, not a dye");
    });
  });

  describe('spectrum owners', () => {
    test('getFilter resolves regardless of case and separators', async () => {
      const [err, filter] = await client.getFilter('chroma et525-50m');

      expect(err).toBeNull();
      expect(filter).toBeInstanceOf(Filter);
      expect(filter?.name).toBe('Chroma ET525/50m');
      expect(filter?.bandcenter).toBe(525);
      expect(filter?.edge).toBeUndefined();
      expect(filter?.spectrum.subtype).toBe('BP');
      expect(service.received.map((request) => request.variables)).toEqual([{ category: 'F' }, { id: 1501 }]);
    });

    test('getCamera and getLight', async () => {
      const [errCamera, camera] = await client.getCamera('Andor Zyla 4.2');
      const [errLight, light] = await client.getLight('lumencor spectrax');

      expect(errCamera).toBeNull();
      expect(camera?.manufacturer).toBe('Andor');
      expect(camera?.spectrum.peakWavelength).toBe(600);
      expect(errLight).toBeNull();
      expect(light?.name).toBe('Lumencor SpectraX');
      expect(light?.manufacturer).toBe('');
    });

    test('suggests the closest normalized name', async () => {
      const [err] = await client.getFilter('Chroma ET525/50');

      expect(err).toBeInstanceOf(NotFoundError);
      expect(err?.message).toBe("error filter 'Chroma ET525/50' not found, did you mean 'chroma-et525-50m'?");
    });

    test('fails when the spectrum has no owner of the family', async () => {
      const fetch: FetchImplementation = async (_input, init) => {
        const body = typeof init.body === 'string' ? init.body : '';
        if (body.includes('listSpectra')) {
          return jsonResponse({ data: { spectra: [{ id: 9, owner: { name: 'Test Filter' } }] } });
        }

        return jsonResponse({ data: { spectrum: { id: 9, subtype: 'BP', data: [] } } });
      };
      const isolated = new FPbaseClient({ fetch, timeout: false });

      const [err, filter] = await isolated.getFilter('Test Filter');

      expect(filter).toBeNull();
      expect(err).toBeInstanceOf(ValidationError);
      expect(err?.message).toBe("error fetching filter 'Test Filter'; issues: [spectrum.ownerFilter: Required]");
    });

    test('getSpectrum returns the owner back-reference', async () => {
      const [err, spectrum] = await client.getSpectrum('1601');

      expect(err).toBeNull();
      expect(spectrum?.owner?.name).toBe('Andor Zyla 4.2');
      expect(spectrum?.ownerCamera?.spectrum.id).toBe('1601');
      expect(service.received[0]).toMatchObject({ query: SPECTRUM_QUERY, variables: { id: 1601 } });
    });

    test('getSpectrum rejects a non-numeric id', async () => {
      const [err] = await client.getSpectrum('abc');

      expect(err).toBeInstanceOf(InvalidArgumentError);
      expect(err?.message).toBe("error expected a numeric id, got 'abc'");
      expect(service.requestCount).toBe(0);
    });
  });

  describe('getMicroscope', () => {
    test('builds optical configs', async () => {
      const [err, microscope] = await client.getMicroscope('wKqWbgApvguSNDSRZNSfpN');

      expect(err).toBeNull();
      expect(microscope?.name).toBe('Example Simple Widefield');

      const config = microscope?.opticalConfigs[0];
      expect(config?.name).toBe('Widefield Green');
      expect(config?.laser).toBeUndefined();
      expect(config?.camera?.name).toBe('Andor Zyla 4.2');
      expect(config?.filters.map((placement) => [placement.path, placement.reflects, placement.filter.name])).toEqual([
        ['EX', false, 'Semrock FF01-520/35'],
        ['BS', true, 'Chroma T495lpxr'],
        ['EM', false, 'Chroma ET525/50m'],
      ]);
      expect(config?.filters[1]?.filter.edge).toBe(495);
    });

    test('fails validation for an unknown id', async () => {
      const [err, microscope] = await client.getMicroscope('missing');

      expect(microscope).toBeNull();
      expect(err?.message).toBe('error fetching microscope missing');
      expect(getValidationError(err)?.issues.map((issue) => issue.path)).toEqual([['microscope']]);
    });
  });

  describe('listing', () => {
    test('lists sorted distinct names per family', async () => {
      expect(await client.listFluorophores()).toEqual([null, ['Alexa Fluor 488', 'EGFP', 'Test Kaede', 'mScarlet']]);
      expect(await client.listProteins()).toEqual([null, ['EGFP', 'Test Kaede', 'mScarlet']]);
      expect(await client.listDyes()).toEqual([null, ['Alexa Fluor 488']]);
      expect(await client.listFilters()).toEqual([
        null,
        ['Chroma ET525/50m', 'Chroma T495lpxr', 'Semrock FF01-520/35'],
      ]);
      expect(await client.listCameras()).toEqual([null, ['Andor Zyla 4.2']]);
      expect(await client.listLights()).toEqual([null, ['Lumencor SpectraX']]);
    });

    test('lists microscope ids', async () => {
      expect(await client.listMicroscopes()).toEqual([null, ['aTestScope2', 'wKqWbgApvguSNDSRZNSfpN']]);
    });

    test('shares one listing query between the fluorophore lists', async () => {
      await Promise.all([client.listFluorophores(), client.listProteins(), client.listDyes()]);

      expect(service.requestCount).toBe(1);
    });
  });

  describe('Caching', () => {
    test('repeated lookups reuse cached responses', async () => {
      const [, first] = await client.getFluorophore('EGFP');
      const [, second] = await client.getFluorophore('egfp');

      expect(second).toEqual(first);
      expect(service.requestCount).toBe(2);
    });

    test('concurrent identical queries share one request', async () => {
      await Promise.all([client.getMicroscope('aTestScope2'), client.getMicroscope('aTestScope2')]);

      expect(service.requestCount).toBe(1);
    });

    test('failures are not cached', async () => {
      service.failNext(503);

      const [err] = await client.listMicroscopes();
      expect(getHttpError(err)?.status).toBe(503);

      const [errRetry, ids] = await client.listMicroscopes();
      expect(errRetry).toBeNull();
      expect(ids).toHaveLength(2);
      expect(service.requestCount).toBe(2);
    });
  });

  describe('query', () => {
    test('returns data without validation', async () => {
      const [err, data] = await client.query(MICROSCOPE_LIST_QUERY);

      expect(err).toBeNull();
      expect(data).toEqual({
        microscopes: [
          { id: 'wKqWbgApvguSNDSRZNSfpN', name: 'Example Simple Widefield' },
          { id: 'aTestScope2', name: 'Test Confocal' },
        ],
      });
    });

    test('surfaces graphql errors', async () => {
      const [err] = await client.query('{ organisms { id } }');

      expect(err).toBeInstanceOf(GraphQLResponseError);
      expect(err?.message).toBe('error in graphql response: unknown query');
    });
  });

  describe('config', () => {
    test('sends default headers and merges configured ones', async () => {
      await client.listMicroscopes();
      client.config({ headers: { 'X-Trace': 'test-trace' } });
      await client.query(MICROSCOPE_LIST_QUERY, { unused: true });

      const [first, second] = service.received;
      expect(first?.headers['user-agent']).toBe('fpbase-ts');
      expect(first?.headers['content-type']).toBe('application/json');
      expect(first?.headers['x-trace']).toBeUndefined();
      expect(second?.headers['x-trace']).toBe('test-trace');
    });
  });

  describe('Lifecycle', () => {
    test('dispose aborts further requests', async () => {
      const fetch = vi.fn<FetchImplementation>(async (_input, init) => {
        if (init.signal?.aborted) {
          throw new Error('aborted');
        }

        return jsonResponse({ data: { microscopes: [] } });
      });
      const isolated = new FPbaseClient({ fetch, timeout: false });

      expect(await isolated.listMicroscopes()).toEqual([null, []]);

      isolated.dispose();
      const [err] = await isolated.listMicroscopes();

      expect(getTransportError(err)?.cause).toBe('client was disposed');
      expect(fetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('Logging', () => {
    test('writes debug lines when enabled', async () => {
      const logger = { debug: vi.fn() };
      const verbose = new FPbaseClient({ endpoint: FAKE_ENDPOINT, fetch: service.fetch, debug: true, logger });

      await verbose.getFluorophore('egfp');

      const lines = logger.debug.mock.calls.map(([line]) => line);
      expect(lines).toContain('[fpbase] built fluorophore lookup table with 9 keys');
      expect(lines).toContain('[fpbase] POST http://fpbase.test/graphql/');
      expect(lines.filter((line) => String(line).startsWith('[fpbase] cache miss '))).toHaveLength(2);
      verbose.dispose();
    });

    test('stays quiet by default', async () => {
      const logger = { debug: vi.fn() };
      const quiet = new FPbaseClient({ endpoint: FAKE_ENDPOINT, fetch: service.fetch, logger });

      await quiet.listMicroscopes();

      expect(logger.debug).not.toHaveBeenCalled();
      quiet.dispose();
    });
  });

  test('validation errors keep the payload path', async () => {
    const fetch: FetchImplementation = async () =>
      jsonResponse({ data: { microscopes: [{ id: 'm1', name: 'Scope' }, { id: 'm2' }] } });
    const [err] = await new FPbaseClient({ fetch, timeout: false }).listMicroscopes();

    expect(isValidationError(err)).toBe(true);
    expect(getValidationError(err)?.issues.map((issue) => issue.path)).toEqual([['microscopes', 1, 'name']]);
  });
});
