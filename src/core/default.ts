import type { GraphQLVariables } from '../types/graphql.js';
import { FPbaseClient } from './client.js';

let defaultClient: FPbaseClient | null = null;

/**
 * Shared client, constructed on first use with default options.
 */
export function getDefaultClient(): FPbaseClient {
  if (!defaultClient) {
    defaultClient = new FPbaseClient();
  }

  return defaultClient;
}

/**
 * Disposes the shared client; the next {@link getDefaultClient} call builds a fresh one.
 */
export function resetDefaultClient(): void {
  defaultClient?.dispose();
  defaultClient = null;
}

export const getFluorophore = (name: string) => getDefaultClient().getFluorophore(name);
export const getProtein = (name: string) => getDefaultClient().getProtein(name);
export const getDye = (name: string) => getDefaultClient().getDye(name);
export const getFilter = (name: string) => getDefaultClient().getFilter(name);
export const getCamera = (name: string) => getDefaultClient().getCamera(name);
export const getLight = (name: string) => getDefaultClient().getLight(name);
export const getSpectrum = (id: string) => getDefaultClient().getSpectrum(id);
export const getMicroscope = (id: string) => getDefaultClient().getMicroscope(id);
export const listFluorophores = () => getDefaultClient().listFluorophores();
export const listProteins = () => getDefaultClient().listProteins();
export const listDyes = () => getDefaultClient().listDyes();
export const listFilters = () => getDefaultClient().listFilters();
export const listCameras = () => getDefaultClient().listCameras();
export const listLights = () => getDefaultClient().listLights();
export const listMicroscopes = () => getDefaultClient().listMicroscopes();
export const query = (text: string, variables?: GraphQLVariables) => getDefaultClient().query(text, variables);
