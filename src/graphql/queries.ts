/*
 * Query templates sent to the service. Every nested record asks for its `id`
 * so entities can be told apart after decoding.
 */

const SPECTRUM_FIELDS = 'spectrum { id subtype data }';

export const MICROSCOPE_QUERY = `
query getMicroscope($id: String!) {
  microscope(id: $id) {
    id
    name
    opticalConfigs {
      name
      filters {
        id
        name
        path
        reflects
        manufacturer
        bandcenter
        bandwidth
        edge
        ${SPECTRUM_FIELDS}
      }
      camera { id name manufacturer ${SPECTRUM_FIELDS} }
      light { id name manufacturer ${SPECTRUM_FIELDS} }
      laser
    }
  }
}
`;

export const DYE_QUERY = `
query getDye($id: Int!) {
  dye(id: $id) {
    id
    name
    exMax
    emMax
    extCoeff
    qy
    spectra { id subtype data }
  }
}
`;

export const PROTEIN_QUERY = `
query getProtein($id: String!) {
  protein(id: $id) {
    id
    name
    seq
    pdb
    genbank
    uniprot
    weight
    agg
    switchType
    primaryReference { doi }
    references { doi }
    states {
      id
      name
      exMax
      emMax
      emhex
      exhex
      extCoeff
      qy
      lifetime
      spectra { id subtype data }
    }
    defaultState { id }
  }
}
`;

/** There is no top-level filter, camera or light query; they are reached through the spectrum they own. */
export const SPECTRUM_QUERY = `
query getSpectrum($id: Int!) {
  spectrum(id: $id) {
    id
    subtype
    data
    ownerFilter { id name manufacturer bandcenter bandwidth edge ${SPECTRUM_FIELDS} }
    ownerCamera { id name manufacturer ${SPECTRUM_FIELDS} }
    ownerLight { id name manufacturer ${SPECTRUM_FIELDS} }
  }
}
`;

export const FLUOROPHORE_LIST_QUERY = '{ dyes { id name slug } proteins { id name slug } }';

/** Takes `category`: `F` filters, `C` cameras, `L` light sources. */
export const OWNER_SPECTRA_LIST_QUERY =
  'query listSpectra($category: String) { spectra(category: $category) { id owner { name } } }';

export const MICROSCOPE_LIST_QUERY = '{ microscopes { id name } }';
