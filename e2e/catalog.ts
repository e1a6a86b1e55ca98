/*
 * Made-up records served by the fake service. Shapes follow the service's responses,
 * with placed filters listed flat the way the microscope query returns them.
 */

const chromaEmitter = {
  id: 501,
  name: 'Chroma ET525/50m',
  manufacturer: 'Chroma',
  bandcenter: 525,
  bandwidth: 50,
  edge: null,
  spectrum: {
    id: 1501,
    subtype: 'BP',
    data: [
      [495, 0.01],
      [500, 0.9],
      [525, 0.97],
      [550, 0.9],
      [555, 0.01],
    ],
  },
};

const semrockExciter = {
  id: 502,
  name: 'Semrock FF01-520/35',
  manufacturer: 'Semrock',
  bandcenter: 520,
  bandwidth: 35,
  edge: null,
  spectrum: {
    id: 1502,
    subtype: 'BP',
    data: [
      [500, 0.02],
      [503, 0.93],
      [537, 0.93],
      [540, 0.02],
    ],
  },
};

const chromaDichroic = {
  id: 503,
  name: 'Chroma T495lpxr',
  manufacturer: 'Chroma',
  bandcenter: null,
  bandwidth: null,
  edge: 495,
  spectrum: {
    id: 1503,
    subtype: 'LP',
    data: [
      [480, 0.05],
      [495, 0.5],
      [510, 0.95],
    ],
  },
};

const zyla = {
  id: 601,
  name: 'Andor Zyla 4.2',
  manufacturer: 'Andor',
  spectrum: {
    id: 1601,
    subtype: 'QE',
    data: [
      [400, 0.55],
      [600, 0.82],
      [800, 0.35],
    ],
  },
};

const spectraX = {
  id: 701,
  name: 'Lumencor SpectraX',
  manufacturer: null,
  spectrum: {
    id: 1701,
    subtype: 'PD',
    data: [
      [470, 0.8],
      [550, 1],
    ],
  },
};

export const filters = [chromaEmitter, semrockExciter, chromaDichroic];
export const cameras = [zyla];
export const lights = [spectraX];

export const dyes = [
  {
    id: 1,
    name: 'Alexa Fluor 488',
    slug: 'alexa-fluor-488',
    exMax: 495,
    emMax: 519,
    extCoeff: 71000,
    qy: 0.92,
    spectra: [
      {
        id: 11,
        subtype: 'AB',
        data: [
          [450, 0.31],
          [495, 1],
        ],
      },
      {
        id: 12,
        subtype: 'EM',
        data: [
          [519, 1],
          [560, 0.18],
        ],
      },
    ],
  },
];

export const proteins = [
  {
    id: 'R9NL8',
    name: 'EGFP',
    slug: 'egfp',
    seq: 'MVSKGEELFTGVVPILVELDGDVNGHKF',
    pdb: ['0TST'],
    genbank: null,
    uniprot: null,
    weight: 26.94,
    agg: 'M',
    switchType: 'B',
    primaryReference: { doi: '10.0000/example.egfp' },
    references: [{ doi: '10.0000/example.egfp' }, { doi: '10.0000/example.review' }],
    states: [
      {
        id: 100,
        name: 'default',
        exMax: 488,
        emMax: 507,
        exhex: '#00f7ff',
        emhex: '#00ff00',
        extCoeff: 55900,
        qy: 0.6,
        lifetime: 2.6,
        spectra: [
          {
            id: 101,
            subtype: 'EX',
            data: [
              [450, 0.25],
              [488, 1],
            ],
          },
          {
            id: 102,
            subtype: 'EM',
            data: [
              [507, 1],
              [550, 0.3],
            ],
          },
        ],
      },
    ],
    defaultState: { id: 100 },
  },
  {
    id: 'ZERB6',
    name: 'mScarlet',
    slug: 'mscarlet',
    seq: null,
    pdb: null,
    genbank: null,
    uniprot: null,
    weight: null,
    agg: 'M',
    switchType: 'B',
    primaryReference: null,
    references: null,
    states: [
      {
        id: 110,
        name: 'default',
        exMax: 569,
        emMax: 594,
        exhex: '',
        emhex: '',
        extCoeff: 100000,
        qy: 0.7,
        lifetime: null,
        spectra: null,
      },
    ],
    defaultState: { id: 110 },
  },
  {
    id: 'KAED1',
    name: 'Test Kaede',
    slug: 'test-kaede',
    seq: null,
    pdb: null,
    genbank: null,
    uniprot: null,
    weight: null,
    agg: 'T',
    switchType: 'PC',
    primaryReference: null,
    references: [],
    states: [
      {
        id: 201,
        name: 'green',
        exMax: 508,
        emMax: 518,
        exhex: '',
        emhex: '',
        extCoeff: 98800,
        qy: 0.88,
        lifetime: null,
        spectra: [],
      },
      {
        id: 202,
        name: 'red',
        exMax: 572,
        emMax: 580,
        exhex: '',
        emhex: '',
        extCoeff: 60400,
        qy: 0.33,
        lifetime: null,
        spectra: [],
      },
    ],
    defaultState: { id: 202 },
  },
];

function placed<F extends object>(filter: F, path: 'EX' | 'EM' | 'BS', reflects: boolean) {
  return { ...filter, path, reflects };
}

export const microscopes = [
  {
    id: 'wKqWbgApvguSNDSRZNSfpN',
    name: 'Example Simple Widefield',
    opticalConfigs: [
      {
        name: 'Widefield Green',
        filters: [
          placed(semrockExciter, 'EX', false),
          placed(chromaDichroic, 'BS', true),
          placed(chromaEmitter, 'EM', false),
        ],
        camera: zyla,
        light: spectraX,
        laser: null,
      },
    ],
  },
  {
    id: 'aTestScope2',
    name: 'Test Confocal',
    opticalConfigs: [{ name: '488 line', filters: null, camera: null, light: null, laser: 488 }],
  },
];
