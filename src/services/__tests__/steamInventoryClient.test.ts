import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { FetchError, RateLimitedError } from "../../domain/errors";
import { SteamInventoryClient } from "../inventory/steamInventoryClient";

const logger = pino({ level: "silent" });

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

const request = {
  accountId: "76561198000000001",
  appId: 730,
  contextId: 2,
  cursor: null,
  pageSize: 1000,
};

const inventoryBody = {
  success: 1,
  total_inventory_count: 5,
  assets: [
    { appid: 730, contextid: "2", assetid: "1001", classid: "10", instanceid: "0", amount: "1" },
    { appid: 730, contextid: "2", assetid: "1002", classid: "20", instanceid: "188530139", amount: "1" },
    { appid: 730, contextid: "2", assetid: "1003", classid: "10", instanceid: "0", amount: "3" },
    { appid: 730, contextid: "2", assetid: "1004", classid: "30", instanceid: "0", amount: "1" },
    { appid: 730, contextid: "2", assetid: "1005", classid: "99", instanceid: "0", amount: "1" },
  ],
  descriptions: [
    { classid: "10", instanceid: "0", market_hash_name: "Chroma 2 Case", name: "Chroma 2 Case", marketable: 1 },
    {
      classid: "20",
      instanceid: "188530139",
      market_hash_name: "AK-47 | Redline (Field-Tested)",
      name: "AK-47 | Redline",
      marketable: 1,
    },
    { classid: "30", instanceid: "0", market_hash_name: "Service Medal", name: "2023 Service Medal", marketable: 0 },
  ],
};

function createClient(response: Response | Error) {
  const fetchFn = vi.fn<typeof fetch>();
  if (response instanceof Error) {
    fetchFn.mockRejectedValue(response);
  } else {
    fetchFn.mockResolvedValue(response);
  }
  const client = new SteamInventoryClient({ baseUrl: "https://community.test", timeoutMs: 1000 }, logger, fetchFn);
  return { client, fetchFn };
}

describe("SteamInventoryClient", () => {
  it("requests the first page without a start asset id", async () => {
    const { client, fetchFn } = createClient(jsonResponse(inventoryBody));

    await client.fetchPage(request);

    expect(String(fetchFn.mock.calls[0][0])).toBe(
      "https://community.test/inventory/76561198000000001/730/2?l=english&count=1000",
    );
  });

  it("passes the cursor as start_assetid", async () => {
    const { client, fetchFn } = createClient(jsonResponse(inventoryBody));

    await client.fetchPage({ ...request, cursor: "1005", pageSize: 500 });

    expect(String(fetchFn.mock.calls[0][0])).toBe(
      "https://community.test/inventory/76561198000000001/730/2?l=english&count=500&start_assetid=1005",
    );
  });

  it("joins assets to descriptions and keeps only marketable items", async () => {
    const { client } = createClient(jsonResponse(inventoryBody));

    const page = await client.fetchPage(request);

    expect(page.records).toEqual([
      {
        assetId: "1001",
        classId: "10",
        instanceId: "0",
        displayName: "Chroma 2 Case",
        classificationKey: "Chroma 2 Case",
        quantity: 1,
      },
      {
        assetId: "1002",
        classId: "20",
        instanceId: "188530139",
        displayName: "AK-47 | Redline",
        classificationKey: "AK-47 | Redline (Field-Tested)",
        quantity: 1,
      },
      {
        assetId: "1003",
        classId: "10",
        instanceId: "0",
        displayName: "Chroma 2 Case",
        classificationKey: "Chroma 2 Case",
        quantity: 3,
      },
    ]);
    expect(page.nextCursor).toBeUndefined();
  });

  it("returns last_assetid as the next cursor while more items remain", async () => {
    const { client } = createClient(jsonResponse({ ...inventoryBody, more_items: 1, last_assetid: "1005" }));

    const page = await client.fetchPage(request);

    expect(page.nextCursor).toBe("1005");
  });

  it("raises RateLimitedError on HTTP 429", async () => {
    const { client } = createClient(jsonResponse(null, 429));

    await expect(client.fetchPage(request)).rejects.toBeInstanceOf(RateLimitedError);
  });

  it("raises FetchError on other HTTP failures", async () => {
    const { client } = createClient(jsonResponse(null, 400));

    await expect(client.fetchPage(request)).rejects.toBeInstanceOf(FetchError);
  });

  it("raises FetchError when the service reports failure", async () => {
    const { client } = createClient(jsonResponse({ success: false }));

    await expect(client.fetchPage(request)).rejects.toThrow("Inventory endpoint reported failure");
  });

  it("raises FetchError for a body that is not JSON", async () => {
    const { client } = createClient(new Response("<html>busy</html>", { status: 200 }));

    await expect(client.fetchPage(request)).rejects.toBeInstanceOf(FetchError);
  });

  it("raises FetchError when the request fails", async () => {
    const { client } = createClient(new TypeError("fetch failed"));

    await expect(client.fetchPage(request)).rejects.toThrow("Inventory request failed: fetch failed");
  });
});
