/**
 * Descriptor source: drug name → canonical SMILES → raw descriptor map.
 * The structure comes from the NCI resolver; descriptors from the configured descriptor
 * service, or PubChem when none is configured.
 */

import type { PredictorConfig } from "./config.js";
import { fetchServiceDescriptors } from "./descriptorService.js";
import { fetchCanonicalSmiles } from "./nci.js";
import { fetchPubChemDescriptors } from "./pubchem.js";

export interface DrugDescriptorRecord {
  drug_name: string;
  canonical_smiles: string;
  descriptors: Record<string, unknown>;
}

export interface DescriptorSource {
  resolveSmiles(drugName: string): Promise<string>;
  fetchDescriptors(drugName: string): Promise<DrugDescriptorRecord>;
}

export function createDescriptorSource(
  config: Pick<PredictorConfig, "NCI_TIMEOUT_MS" | "PUBCHEM_TIMEOUT_MS" | "DESCRIPTOR_SERVICE_URL">
): DescriptorSource {
  const resolveSmiles = (drugName: string) => fetchCanonicalSmiles(drugName, { timeoutMs: config.NCI_TIMEOUT_MS });
  const serviceUrl = config.DESCRIPTOR_SERVICE_URL;
  const describe = (smiles: string) =>
    serviceUrl
      ? fetchServiceDescriptors(serviceUrl, smiles, { timeoutMs: config.PUBCHEM_TIMEOUT_MS })
      : fetchPubChemDescriptors(smiles, { timeoutMs: config.PUBCHEM_TIMEOUT_MS });

  return {
    resolveSmiles,
    async fetchDescriptors(drugName) {
      const canonical_smiles = await resolveSmiles(drugName);
      const descriptors = await describe(canonical_smiles);
      return { drug_name: drugName, canonical_smiles, descriptors };
    },
  };
}
