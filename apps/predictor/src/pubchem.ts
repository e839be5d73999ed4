/**
 * PubChem descriptors for a SMILES structure.
 * PUG REST: https://pubchem.ncbi.nlm.nih.gov/rest/pug/compound/...
 *
 * PubChem has no RingCount, FractionCSP3 or BalabanJ, and its CACTVS substructure keys are
 * not the Morgan bits behind FP_i; all of those stay absent and normalize to 0.
 */

import { z } from "zod";
import { UpstreamUnavailableError, toUpstreamError } from "./errors.js";
import { fetchWithRetry } from "./fetchWithRetry.js";

const PUG_BASE = "https://pubchem.ncbi.nlm.nih.gov/rest/pug/compound";

const PROPERTIES = [
  "ExactMass",
  "XLogP",
  "HBondDonorCount",
  "HBondAcceptorCount",
  "TPSA",
  "RotatableBondCount",
  "Complexity",
] as const;

const CidResponse = z.object({
  IdentifierList: z.object({ CID: z.array(z.number()) }).optional(),
});

const PropertyResponse = z.object({
  PropertyTable: z.object({
    Properties: z.array(z.record(z.unknown())).min(1),
  }),
});

async function lookupCid(smiles: string, timeoutMs: number): Promise<number> {
  const res = await fetchWithRetry(
    `${PUG_BASE}/smiles/cids/JSON`,
    {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({ smiles }).toString(),
    },
    { maxRetries: 2, initialMs: 500, timeoutMs }
  );
  if (res.status === 404) {
    throw new UpstreamUnavailableError("pubchem", "not_found", "Structure not found in PubChem");
  }
  if (!res.ok) throw new UpstreamUnavailableError("pubchem", "upstream_error", `PubChem returned HTTP ${res.status}`);
  const parsed = CidResponse.safeParse(await res.json());
  if (!parsed.success) {
    throw new UpstreamUnavailableError("pubchem", "upstream_error", "Unexpected PubChem CID response");
  }
  // CID 0 means PubChem parsed the structure but has no record for it.
  const cid = parsed.data.IdentifierList?.CID.find((c) => c > 0);
  if (cid === undefined) throw new UpstreamUnavailableError("pubchem", "not_found", "Structure not found in PubChem");
  return cid;
}

/** Raw descriptor map keyed by PubChem property names. */
export async function fetchPubChemDescriptors(
  smiles: string,
  opts: { timeoutMs: number }
): Promise<Record<string, unknown>> {
  try {
    const cid = await lookupCid(smiles, opts.timeoutMs);
    const res = await fetchWithRetry(
      `${PUG_BASE}/cid/${cid}/property/${PROPERTIES.join(",")}/JSON`,
      {},
      { maxRetries: 2, initialMs: 500, timeoutMs: opts.timeoutMs }
    );
    if (!res.ok) {
      throw new UpstreamUnavailableError("pubchem", "upstream_error", `PubChem returned HTTP ${res.status}`);
    }
    const parsed = PropertyResponse.safeParse(await res.json());
    if (!parsed.success) {
      throw new UpstreamUnavailableError("pubchem", "upstream_error", "Unexpected PubChem property response");
    }

    const { CID: _cid, ...properties } = parsed.data.PropertyTable.Properties[0];
    return properties;
  } catch (err) {
    throw toUpstreamError("pubchem", err);
  }
}
