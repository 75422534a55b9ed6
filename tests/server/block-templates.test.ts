import { describe, expect, it } from "vitest";

import {
  extractJsonPath,
  hasHeader,
  lookupPath,
  parseHeaderJson,
  renderTemplate,
  escapeJsonString,
  toItemList
} from "../../server/blocks/templates.js";

describe("template rendering", () => {
  const item = { user: { name: "Ada" }, tags: ["a"], note: null, list: [{ id: 7 }] };

  it("looks up nested keys and array indices", () => {
    expect(lookupPath(item, "user.name")).toBe("Ada");
    expect(lookupPath(item, "list.0.id")).toBe(7);
    expect(lookupPath(item, "list.3.id")).toBeUndefined();
    expect(lookupPath(item, "user.email")).toBeUndefined();
  });

  it("handles missing values according to the mode", () => {
    const template = "Hi {{ user.name }} {{nope}}";
    expect(renderTemplate(template, item, { missing: "marker" })).toBe("Hi Ada {missing:nope}");
    expect(renderTemplate(template, item, { missing: "empty" })).toBe("Hi Ada ");
    expect(renderTemplate(template, item, { missing: "keep" })).toBe("Hi Ada {{nope}}");
  });

  it("renders null as an empty string and objects as JSON", () => {
    expect(renderTemplate("[{{note}}]", item, { missing: "marker" })).toBe("[]");
    expect(renderTemplate("{{tags}}", item, { missing: "keep" })).toBe('["a"]');
    expect(renderTemplate("{{tags}}", item, { missing: "keep", objectFormat: "pretty" })).toBe('[\n  "a"\n]');
  });

  it("escapes substituted values when asked", () => {
    expect(renderTemplate('{"q": "{{q}}"}', { q: 'say "hi"' }, { missing: "empty", escape: escapeJsonString })).toBe(
      '{"q": "say \\"hi\\""}'
    );
  });
});

describe("payload helpers", () => {
  it("extracts a json path or falls back to an empty object", () => {
    const payload = { data: { items: [1, 2] } };
    expect(extractJsonPath(payload, "data.items")).toEqual([1, 2]);
    expect(extractJsonPath(payload, "data.none")).toEqual({});
    expect(extractJsonPath(payload, " ")).toBe(payload);
  });

  it("coerces payloads into item lists", () => {
    expect(toItemList({ a: 1 })).toEqual([{ a: 1 }]);
    expect(toItemList([{ a: 1 }, 2, "x"])).toEqual([{ a: 1 }, { value: 2 }, { value: "x" }]);
    expect(toItemList("x")).toEqual([]);
  });

  it("parses header JSON with single quotes", () => {
    expect(parseHeaderJson("{'X-Key': 'test-secret', 'Retry': 3}")).toEqual({ "X-Key": "test-secret", Retry: "3" });
    expect(parseHeaderJson("  ")).toEqual({});
  });

  it("logs and ignores headers that are not an object", () => {
    const logs: string[] = [];
    expect(parseHeaderJson("[1]", (message) => logs.push(message))).toEqual({});
    expect(parseHeaderJson("{bad", (message) => logs.push(message))).toEqual({});
    expect(logs).toEqual(["Headers must be a JSON object; sending no custom headers.", "Invalid headers JSON: {bad"]);
  });

  it("matches header names case-insensitively", () => {
    expect(hasHeader({ "content-type": "text/plain" }, "Content-Type")).toBe(true);
    expect(hasHeader({}, "Accept")).toBe(false);
  });
});
