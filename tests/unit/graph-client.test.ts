import { describe, it, expect } from "vitest";
import { GraphClient } from "../../src/platforms/facebook/graph-client";
import { UpstreamError } from "../../src/core/errors";
import { stubHttp } from "../helpers/fakes";

const BASE = "https://graph.test/v1/";

describe("GraphClient", () => {
  it("requests the group feed with limit, order and token", async () => {
    const { http, requests } = stubHttp(() => ({
      status: 200,
      data: {
        data: [{ id: "900_111", message: "Hello", updated_time: "2024-01-01T00:00:00+0000" }],
        paging: { cursors: { before: "b", after: "a" } },
      },
    }));
    const client = new GraphClient(() => BASE, http);

    const page = await client.fetchGroupFeed("900", { limit: 20 }, "test-token");

    expect(page.data).toEqual([{ id: "900_111", message: "Hello", updated_time: "2024-01-01T00:00:00+0000" }]);
    expect(page.paging?.cursors?.after).toBe("a");
    expect(requests[0]?.url).toBe("https://graph.test/v1/900/feed");
    expect(requests[0]?.params).toEqual({ limit: 20, order: "chronological", access_token: "test-token" });
  });

  it("requests post comments", async () => {
    const { http, requests } = stubHttp(() => ({
      status: 200,
      data: { data: [{ id: "111_c1", message: "Nice", from: { id: "5001", name: "Ann" } }] },
    }));
    const client = new GraphClient(() => BASE, http);

    const page = await client.fetchPostComments("111", { limit: 10 }, "test-token");

    expect(page.data[0]?.from).toEqual({ id: "5001", name: "Ann" });
    expect(requests[0]?.url).toBe("https://graph.test/v1/111/comments");
  });

  it("turns a remote error body into an UpstreamError", async () => {
    const { http } = stubHttp(() => ({
      status: 400,
      data: { error: { message: "Invalid OAuth access token", code: 190 } },
    }));
    const client = new GraphClient(() => BASE, http);

    const error = await client.fetchGroupFeed("900", { limit: 20 }, "test-token").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ code: "graph_190", message: "Graph API request failed: Invalid OAuth access token" });
  });

  it("rejects payloads that do not match the schema", async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { data: [{ message: "no id" }] } }));
    const client = new GraphClient(() => BASE, http);

    await expect(client.fetchGroupFeed("900", { limit: 20 }, "test-token")).rejects.toMatchObject({
      code: "graph_invalid_payload",
    });
  });
});
