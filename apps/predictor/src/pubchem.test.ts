import { afterEach, describe, it, expect, vi } from "vitest";
import { normalizeDrugAttributes } from "interaction-core";
import { fetchPubChemDescriptors } from "./pubchem.js";
import { json, mockFetch } from "./__fixtures__/http.js";

const ASPIRIN = "CC(=O)OC1=CC=CC=C1C(=O)O";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("fetchPubChemDescriptors", () => {
  it("looks up the CID by SMILES and returns its properties", async () => {
    const fetchMock = mockFetch((url) => {
      if (url.endsWith("/compound/smiles/cids/JSON")) return json({ IdentifierList: { CID: [2244] } });
      if (url.includes("/compound/cid/2244/property/")) {
        return json({
          PropertyTable: {
            Properties: [
              {
                CID: 2244,
                ExactMass: "180.04225873",
                XLogP: 1.2,
                HBondDonorCount: 1,
                HBondAcceptorCount: 4,
                TPSA: 63.6,
                RotatableBondCount: 3,
                Complexity: 212,
              },
            ],
          },
        });
      }
      return json({}, 404);
    });

    const raw = await fetchPubChemDescriptors(ASPIRIN, { timeoutMs: 8000 });
    expect(raw).toEqual({
      ExactMass: "180.04225873",
      XLogP: 1.2,
      HBondDonorCount: 1,
      HBondAcceptorCount: 4,
      TPSA: 63.6,
      RotatableBondCount: 3,
      Complexity: 212,
    });

    const [, init] = fetchMock.mock.calls[0];
    expect(init?.method).toBe("POST");
    expect(new URLSearchParams(String(init?.body)).get("smiles")).toBe(ASPIRIN);
    expect(String(fetchMock.mock.calls[1][0])).toBe(
      "https://pubchem.ncbi.nlm.nih.gov/rest/pug/compound/cid/2244/property/ExactMass,XLogP,HBondDonorCount,HBondAcceptorCount,TPSA,RotatableBondCount,Complexity/JSON"
    );
  });

  it("leaves every fingerprint column unset", async () => {
    mockFetch((url) =>
      url.endsWith("/cids/JSON")
        ? json({ IdentifierList: { CID: [2244] } })
        : json({ PropertyTable: { Properties: [{ CID: 2244, ExactMass: 180.04, Fingerprint2D: "AAADcQ==" }] } })
    );
    const raw = await fetchPubChemDescriptors(ASPIRIN, { timeoutMs: 8000 });
    expect(Object.keys(raw).filter((key) => key.startsWith("FP_"))).toEqual([]);
    const attributes = normalizeDrugAttributes(raw);
    expect(attributes.fingerprint.every((bit) => bit === 0)).toBe(true);
    expect(attributes.descriptors.MolWt).toBe(180.04);
  });

  it("treats CID 0 as not found", async () => {
    mockFetch(() => json({ IdentifierList: { CID: [0] } }));
    await expect(fetchPubChemDescriptors("C1CC1X", { timeoutMs: 8000 })).rejects.toMatchObject({
      source: "pubchem",
      reason: "not_found",
    });
  });

  it("rejects malformed property payloads", async () => {
    mockFetch((url) =>
      url.endsWith("/cids/JSON") ? json({ IdentifierList: { CID: [2244] } }) : json({ PropertyTable: { Properties: [] } })
    );
    await expect(fetchPubChemDescriptors(ASPIRIN, { timeoutMs: 8000 })).rejects.toMatchObject({
      source: "pubchem",
      reason: "upstream_error",
      message: "Unexpected PubChem property response",
    });
  });
});
