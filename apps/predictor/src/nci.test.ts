import { afterEach, describe, it, expect, vi } from "vitest";
import { UpstreamUnavailableError } from "./errors.js";
import { fetchCanonicalSmiles } from "./nci.js";
import { mockFetch, text, timeoutError } from "./__fixtures__/http.js";

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllGlobals();
});

describe("fetchCanonicalSmiles", () => {
  it("returns the first structure for the name", async () => {
    const fetchMock = mockFetch(() => text("CC(=O)OC1=CC=CC=C1C(O)=O\nCC(=O)Oc1ccccc1C(O)=O\n"));
    await expect(fetchCanonicalSmiles(" aspirin ", { timeoutMs: 5000 })).resolves.toBe("CC(=O)OC1=CC=CC=C1C(O)=O");
    expect(fetchMock.mock.calls[0][0]).toBe("https://cactus.nci.nih.gov/chemical/structure/aspirin/smiles");
  });

  it("encodes names with spaces", async () => {
    const fetchMock = mockFetch(() => text("C"));
    await fetchCanonicalSmiles("folic acid", { timeoutMs: 5000 });
    expect(fetchMock.mock.calls[0][0]).toBe("https://cactus.nci.nih.gov/chemical/structure/folic%20acid/smiles");
  });

  it("reports unknown drugs as not found", async () => {
    mockFetch(() => text("Page not found (404)", 404));
    await expect(fetchCanonicalSmiles("notadrug", { timeoutMs: 5000 })).rejects.toMatchObject({
      source: "nci",
      reason: "not_found",
      message: "Drug 'notadrug' not found in NCI database",
    });
  });

  it("maps timeouts", async () => {
    vi.useFakeTimers();
    mockFetch(() => {
      throw timeoutError();
    });
    const result = fetchCanonicalSmiles("aspirin", { timeoutMs: 5000 }).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(500);
    const err = await result;
    expect(err).toBeInstanceOf(UpstreamUnavailableError);
    expect(err).toMatchObject({ source: "nci", reason: "timeout", message: "nci request timed out" });
  });

  it("maps server errors", async () => {
    vi.useFakeTimers();
    mockFetch(() => text("", 502));
    const result = fetchCanonicalSmiles("aspirin", { timeoutMs: 5000 }).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(1000);
    expect(await result).toMatchObject({ reason: "upstream_error", message: "NCI resolver returned HTTP 502" });
  });
});
