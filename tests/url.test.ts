// CHANGE: Cover endpoint URL building and continuation-link resolution.
// WHY: Continuation links must stay on the API host whatever form the server sends them in.

import { describe, expect, it } from "vitest";
import { FetchError } from "../src/errors.js";
import { displayPath, projectUrl, projectsUrl, resolveNextUrl } from "../src/utils/url.js";
import { HOST, testSettings } from "./helpers.js";

describe("projectsUrl", () => {
  it("encodes the organisation id", () => {
    expect(projectsUrl(testSettings.api, "org/1", [])).toBe(
      `${HOST}/rest/orgs/org%2F1/projects?version=2024-05-23&limit=100`
    );
  });
});

describe("projectUrl", () => {
  it("carries the version parameter", () => {
    expect(projectUrl(testSettings.api, "org-1", "p 1")).toBe(`${HOST}/rest/orgs/org-1/projects/p%201?version=2024-05-23`);
  });
});

describe("resolveNextUrl", () => {
  const current = `${HOST}/rest/orgs/org-1/projects?version=2024-05-23&limit=100`;

  it("prefixes host-relative links with the host", () => {
    expect(resolveNextUrl("/rest/orgs/org-1/projects?starting_after=x", current, HOST)).toBe(
      `${HOST}/rest/orgs/org-1/projects?starting_after=x`
    );
  });

  it("keeps absolute links on the API host", () => {
    expect(resolveNextUrl(`${HOST}/rest/orgs/org-1/projects?starting_after=z`, current, HOST)).toBe(
      `${HOST}/rest/orgs/org-1/projects?starting_after=z`
    );
  });

  it("rejects absolute links to another host", () => {
    expect(() => resolveNextUrl("https://other.example.test/rest/x", current, HOST)).toThrow(FetchError);
    expect(() => resolveNextUrl("https://other.example.test/rest/x", current, HOST)).toThrow(
      "Continuation link leaves the API host: https://other.example.test"
    );
  });

  it("rejects protocol-relative links to another host", () => {
    expect(() => resolveNextUrl("//other.example.test/rest/x", current, HOST)).toThrow(
      "Continuation link leaves the API host: https://other.example.test"
    );
  });

  it("rejects a plain-http link to the API host name", () => {
    expect(() => resolveNextUrl("http://api.example.test/rest/x", current, HOST)).toThrow(FetchError);
  });

  it("resolves other relative links against the current page", () => {
    expect(resolveNextUrl("projects?starting_after=y", current, HOST)).toBe(
      `${HOST}/rest/orgs/org-1/projects?starting_after=y`
    );
  });
});

describe("displayPath", () => {
  it("drops host and query", () => {
    expect(displayPath(`${HOST}/rest/orgs/org-1/projects?version=1`, HOST)).toBe("/rest/orgs/org-1/projects");
  });
});
