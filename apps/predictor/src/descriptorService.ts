/**
 * Client for a descriptor service (e.g. an RDKit microservice) that computes the full
 * descriptor set and 2048-bit fingerprint for a SMILES string.
 * POST {baseUrl}/descriptors { smiles } → { descriptors: { MolWt, …, FP_0, … } }
 */

import { z } from "zod";
import { UpstreamUnavailableError, toUpstreamError } from "./errors.js";
import { fetchWithRetry } from "./fetchWithRetry.js";

const DescriptorResponse = z.object({
  descriptors: z.record(z.union([z.number(), z.string(), z.null()])),
});

export async function fetchServiceDescriptors(
  baseUrl: string,
  smiles: string,
  opts: { timeoutMs: number }
): Promise<Record<string, unknown>> {
  const url = new URL("descriptors", baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  try {
    const res = await fetchWithRetry(
      url.toString(),
      {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({ smiles }),
      },
      { maxRetries: 1, initialMs: 500, timeoutMs: opts.timeoutMs }
    );
    if (res.status === 404 || res.status === 422) {
      throw new UpstreamUnavailableError("descriptor-service", "not_found", `No descriptors for '${smiles}'`);
    }
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new UpstreamUnavailableError(
        "descriptor-service",
        "upstream_error",
        `Descriptor service HTTP ${res.status}: ${text.slice(0, 200)}`
      );
    }
    const parsed = DescriptorResponse.safeParse(await res.json());
    if (!parsed.success) {
      throw new UpstreamUnavailableError("descriptor-service", "upstream_error", "Unexpected descriptor service response");
    }
    return parsed.data.descriptors;
  } catch (err) {
    throw toUpstreamError("descriptor-service", err);
  }
}
