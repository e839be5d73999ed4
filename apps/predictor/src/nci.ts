/**
 * NCI/CADD Chemical Identifier Resolver: drug name → SMILES.
 * https://cactus.nci.nih.gov/chemical/structure/{name}/smiles
 */

import { UpstreamUnavailableError, toUpstreamError } from "./errors.js";
import { fetchWithRetry } from "./fetchWithRetry.js";

const NCI_BASE = "https://cactus.nci.nih.gov/chemical/structure";

export async function fetchCanonicalSmiles(drugName: string, opts: { timeoutMs: number }): Promise<string> {
  const name = drugName.trim();
  if (!name) throw new UpstreamUnavailableError("nci", "not_found", "Drug name is empty");
  const url = `${NCI_BASE}/${encodeURIComponent(name)}/smiles`;
  try {
    const res = await fetchWithRetry(
      url,
      { headers: { Accept: "text/plain" } },
      { maxRetries: 1, initialMs: 500, timeoutMs: opts.timeoutMs }
    );
    if (res.status === 404) {
      throw new UpstreamUnavailableError("nci", "not_found", `Drug '${name}' not found in NCI database`);
    }
    if (!res.ok) {
      throw new UpstreamUnavailableError("nci", "upstream_error", `NCI resolver returned HTTP ${res.status}`);
    }
    // The resolver may list several structures, one per line; the first is its best match.
    const smiles = (await res.text())
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find(Boolean);
    if (!smiles) throw new UpstreamUnavailableError("nci", "not_found", `Drug '${name}' not found in NCI database`);
    return smiles;
  } catch (err) {
    throw toUpstreamError("nci", err);
  }
}
