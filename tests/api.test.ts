// CHANGE: Cover cursor pagination, all-or-nothing listing and update outcome classification.

import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchAllProjects, toProjectPage, updateProjectFrequency } from "../src/api.js";
import { FetchError, UpdateError } from "../src/errors.js";
import { FIRST_PAGE_URL, HOST, httpError, networkError, newClient, ok, pageBody, testSettings } from "./helpers.js";

describe("fetchAllProjects", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requests the first page with version and limit and stops without a next link", async () => {
    const client = newClient();
    const get = vi.spyOn(client, "get").mockResolvedValueOnce(ok(pageBody(["a", "b"])));
    const pause = vi.fn(async (_delayMs: number) => undefined);

    const projects = await fetchAllProjects(client, testSettings, "org-1", [], pause);

    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith(FIRST_PAGE_URL);
    expect(projects.map(item => item.id)).toEqual(["a", "b"]);
    expect(projects[0]).toEqual({
      id: "a",
      name: "Project a",
      type: "npm",
      attributes: { name: "Project a", type: "npm" }
    });
    expect(pause).not.toHaveBeenCalled();
  });

  it("sends the type filter as one comma-separated parameter", async () => {
    const client = newClient();
    const get = vi.spyOn(client, "get").mockResolvedValueOnce(ok(pageBody([])));

    await fetchAllProjects(client, testSettings, "org-1", ["npm", "maven"], async () => undefined);

    expect(get).toHaveBeenCalledWith(`${FIRST_PAGE_URL}&types=npm,maven`);
  });

  it("follows host-relative and absolute continuation links in order", async () => {
    const client = newClient();
    const relative = "/rest/orgs/org-1/projects?version=2024-05-23&limit=100&starting_after=b";
    const absolute = `${HOST}/rest/orgs/org-1/projects?version=2024-05-23&limit=100&starting_after=c`;
    const get = vi
      .spyOn(client, "get")
      .mockResolvedValueOnce(ok(pageBody(["a", "b"], relative)))
      .mockResolvedValueOnce(ok(pageBody(["c"], absolute)))
      .mockResolvedValueOnce(ok(pageBody(["d"])));
    const pause = vi.fn(async (_delayMs: number) => undefined);

    const projects = await fetchAllProjects(client, testSettings, "org-1", [], pause);

    expect(projects.map(item => item.id)).toEqual(["a", "b", "c", "d"]);
    expect(get.mock.calls.map(call => call[0])).toEqual([FIRST_PAGE_URL, `${HOST}${relative}`, absolute]);
    expect(pause.mock.calls).toEqual([[5], [5]]);
  });

  it("refuses a continuation link to another host without requesting it", async () => {
    const client = newClient();
    const get = vi.spyOn(client, "get").mockResolvedValueOnce(ok(pageBody(["a"], "https://elsewhere.test/rest/x")));

    const result = fetchAllProjects(client, testSettings, "org-1", [], async () => undefined);

    await expect(result).rejects.toBeInstanceOf(FetchError);
    await expect(result).rejects.toThrow("Continuation link leaves the API host: https://elsewhere.test");
    expect(get).toHaveBeenCalledTimes(1);
  });

  it("keeps projects listed on two pages and warns once", async () => {
    const client = newClient();
    vi.spyOn(client, "get")
      .mockResolvedValueOnce(ok(pageBody(["a"], "/rest/orgs/org-1/projects?starting_after=a")))
      .mockResolvedValueOnce(ok(pageBody(["a", "b"])));
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const projects = await fetchAllProjects(client, testSettings, "org-1", [], async () => undefined);

    expect(projects.map(item => item.id)).toEqual(["a", "a", "b"]);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain("[WARN] Project a listed more than once.");
  });

  it("fails the whole listing when a later page returns an HTTP error", async () => {
    const client = newClient();
    vi.spyOn(client, "get")
      .mockResolvedValueOnce(ok(pageBody(["a"], "/rest/orgs/org-1/projects?starting_after=a")))
      .mockRejectedValueOnce(httpError(500, "Internal Server Error", { errors: [{ detail: "boom" }] }));

    const result = fetchAllProjects(client, testSettings, "org-1", [], async () => undefined);

    await expect(result).rejects.toBeInstanceOf(FetchError);
    await expect(result).rejects.toMatchObject({
      status: 500,
      body: '{"errors":[{"detail":"boom"}]}',
      message: "Error fetching projects (page 2): HTTP 500 Internal Server Error"
    });
  });

  it("fails on a network error", async () => {
    const client = newClient();
    vi.spyOn(client, "get").mockRejectedValueOnce(networkError());

    await expect(fetchAllProjects(client, testSettings, "org-1", [], async () => undefined)).rejects.toThrow(
      "Error fetching projects (page 1): ECONNRESET: socket hang up"
    );
  });

  it("fails when the body has no data array", async () => {
    const client = newClient();
    vi.spyOn(client, "get").mockResolvedValueOnce(ok({ errors: [] }));

    await expect(fetchAllProjects(client, testSettings, "org-1", [], async () => undefined)).rejects.toBeInstanceOf(
      FetchError
    );
  });
});

describe("toProjectPage", () => {
  it("keeps entries without identifier and drops non-object entries", () => {
    const page = toProjectPage({ data: [{ attributes: {} }, "junk", { id: "", attributes: { name: "Blank" } }] }, "/p");
    expect(page.items).toEqual([
      { id: undefined, name: "Unknown Name", type: undefined, attributes: {} },
      { id: undefined, name: "Blank", type: undefined, attributes: { name: "Blank" } }
    ]);
    expect(page.next).toBeUndefined();
  });

  it("treats an empty next link as the last page", () => {
    expect(toProjectPage({ data: [], links: { next: "" } }, "/p").next).toBeUndefined();
  });
});

describe("updateProjectFrequency", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("patches the project with the frequency attribute", async () => {
    const client = newClient();
    const patch = vi.spyOn(client, "patch").mockResolvedValueOnce(ok({}));

    const outcome = await updateProjectFrequency(client, testSettings.api, "org-1", "p-1", "weekly");

    expect(outcome).toEqual({ kind: "success", status: 200 });
    expect(patch).toHaveBeenCalledWith(`${HOST}/rest/orgs/org-1/projects/p-1?version=2024-05-23`, {
      data: {
        type: "project",
        id: "p-1",
        relationships: {},
        attributes: { test_frequency: "weekly" }
      }
    });
  });

  it("reports 429 as rate limited", async () => {
    const client = newClient();
    vi.spyOn(client, "patch").mockRejectedValueOnce(httpError(429, "Too Many Requests"));

    const outcome = await updateProjectFrequency(client, testSettings.api, "org-1", "p-1", "daily");

    expect(outcome).toEqual({ kind: "rate-limited", status: 429 });
  });

  it("reports other HTTP errors as failed", async () => {
    const client = newClient();
    vi.spyOn(client, "patch").mockRejectedValueOnce(httpError(404, "Not Found"));

    const outcome = await updateProjectFrequency(client, testSettings.api, "org-1", "p-1", "never");

    expect(outcome.kind).toBe("failed");
    if (outcome.kind === "failed") {
      expect(outcome.error).toBeInstanceOf(UpdateError);
      expect(outcome.error.message).toBe("Error updating project: HTTP 404 Not Found");
      expect(outcome.error.status).toBe(404);
      expect(outcome.error.projectId).toBe("p-1");
    }
  });

  it("reports network errors as failed", async () => {
    const client = newClient();
    vi.spyOn(client, "patch").mockRejectedValueOnce(networkError());

    const outcome = await updateProjectFrequency(client, testSettings.api, "org-1", "p-1", "weekly");

    expect(outcome).toMatchObject({ kind: "failed", error: { message: "Error updating project: ECONNRESET: socket hang up" } });
  });
});
