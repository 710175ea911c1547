import { describe, expect, it } from "vitest";
import { ExchangeClient } from "./exchangeClient";

const API_BASE = "https://exchange.example.test";
const ADDRESS = "0x00000000000000000000000000000000000000AA";

interface RecordedRequest {
  url: string;
  method: string | undefined;
  body: unknown;
}

const fakeFetch = (respond: () => Response | Promise<Response>) => {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      method: init?.method,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return respond();
  };
  return { fetchImpl, requests };
};

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

describe("ExchangeClient", () => {
  it("posts a user state query and returns the validated payload", async () => {
    const payload = {
      marginSummary: { accountValue: "1520.75", totalMarginUsed: "10.0" },
      assetPositions: [
        { type: "oneWay", position: { coin: "ETH", szi: "-0.5", entryPx: "3100.0" } },
      ],
      withdrawable: "1400.0",
      time: 1_700_000_000_000,
      crossMaintenanceMarginUsed: "3.1",
    };
    const { fetchImpl, requests } = fakeFetch(() => json(payload));
    const client = new ExchangeClient(API_BASE, 1000, fetchImpl);

    const state = await client.getUserState(ADDRESS);

    expect(requests).toEqual([
      {
        url: `${API_BASE}/info`,
        method: "POST",
        body: { type: "clearinghouseState", user: ADDRESS.toLowerCase() },
      },
    ]);
    expect(state).toEqual(payload);
  });

  it("defaults missing positions to an empty list", async () => {
    const { fetchImpl } = fakeFetch(() => json({ marginSummary: { accountValue: "0.0" } }));
    const client = new ExchangeClient(API_BASE, 1000, fetchImpl);

    await expect(client.getUserState(ADDRESS)).resolves.toEqual({
      marginSummary: { accountValue: "0.0" },
      assetPositions: [],
    });
  });

  it("returns null for an unknown user", async () => {
    const { fetchImpl } = fakeFetch(() => json(null));
    const client = new ExchangeClient(API_BASE, 1000, fetchImpl);

    await expect(client.getUserState(ADDRESS)).resolves.toBeNull();
  });

  it("rejects payloads of the wrong shape as validation failures", async () => {
    const { fetchImpl } = fakeFetch(() => json({ marginSummary: { accountValue: 12 } }));
    const client = new ExchangeClient(API_BASE, 1000, fetchImpl);

    await expect(client.getUserState(ADDRESS)).rejects.toMatchObject({
      kind: "Validation",
    });
  });

  it("rejects non-JSON bodies as validation failures", async () => {
    const { fetchImpl } = fakeFetch(() => new Response("<html>", { status: 200 }));
    const client = new ExchangeClient(API_BASE, 1000, fetchImpl);

    await expect(client.getUserState(ADDRESS)).rejects.toMatchObject({
      kind: "Validation",
      message: "Exchange returned a non-JSON body",
    });
  });

  it.each([
    [429, "TransientNetwork"],
    [502, "TransientNetwork"],
    [404, "DataUnavailable"],
  ])("maps HTTP %i to %s", async (status, kind) => {
    const { fetchImpl } = fakeFetch(() => json({ error: "nope" }, status));
    const client = new ExchangeClient(API_BASE, 1000, fetchImpl);

    await expect(client.getUserState(ADDRESS)).rejects.toMatchObject({
      kind,
      message: `Exchange info request failed with status ${status}`,
    });
  });

  it("maps transport failures to transient network errors", async () => {
    const { fetchImpl } = fakeFetch(() => {
      throw new TypeError("fetch failed");
    });
    const client = new ExchangeClient(API_BASE, 1000, fetchImpl);

    await expect(client.getUserState(ADDRESS)).rejects.toMatchObject({
      kind: "TransientNetwork",
    });
  });
});
