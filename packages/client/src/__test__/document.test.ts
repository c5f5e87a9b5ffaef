import { describe, expect, test } from "vitest";
import { AttributeSet } from "../attribute-tuple.js";
import { Catalog } from "../catalog.js";
import { Entity } from "../entity.js";
import { ErrAttributeNotFound, ErrDocumentNotLocated, ErrParseFailed } from "../errors.js";
import { View } from "../view.js";
import { rejectionOf, StubbedSession } from "./stubs.js";

const E1 = "https://x/e1/";
const C1 = "https://x/c1/";
const V1 = "https://x/v1/";

describe("resolution", () => {
  test("a local member wins without any request", async () => {
    const stub = StubbedSession();
    const entity = Entity.from(stub.session, {
      element: "shoji:entity",
      self: E1,
      body: {},
      catalogs: { k: C1 },
      k: "local",
    });

    expect(await entity.resolve("k")).toBe("local");
    expect(stub.calls).toEqual([]);
  });

  test("a local null is a value, not a miss", async () => {
    const stub = StubbedSession();
    const view = View.from(stub.session, { element: "shoji:view", nothing: null, urls: { nothing: V1 } });

    expect(await view.lookup("nothing")).toEqual({ kind: "local", value: null });
    expect(stub.calls).toEqual([]);
  });

  test("falls back to a navigation link with exactly one GET", async () => {
    const stub = StubbedSession();
    stub.respond("get", C1, { body: { element: "shoji:catalog", self: C1, index: {} } });
    const view = View.from(stub.session, { element: "shoji:view", views: { k: C1 } });

    const value = await view.resolve("k");

    expect(value).toBeInstanceOf(Catalog);
    expect(stub.calls).toEqual([{ method: "get", url: C1 }]);
  });

  test("collections are searched in declared order", async () => {
    const stub = StubbedSession();
    stub.respond("get", C1, { body: { from: "fragments" } });
    const entity = Entity.from(stub.session, {
      element: "shoji:entity",
      self: E1,
      urls: { t: V1 },
      fragments: { t: C1 },
    });

    const resolution = await entity.lookup("t");

    expect(resolution).toEqual({ kind: "remote", collection: "fragments", url: C1, value: { from: "fragments" } });
    expect(stub.calls).toEqual([{ method: "get", url: C1 }]);
  });

  test("collections outside the variant are not followed", async () => {
    const stub = StubbedSession();
    const view = View.from(stub.session, { element: "shoji:view", catalogs: { k: C1 } });

    expect(await view.lookup("k")).toEqual({ kind: "missing" });
    expect(await view.resolve("catalogs")).toEqual({ k: C1 });
    expect(stub.calls).toEqual([]);
  });

  test("a miss fails with ErrAttributeNotFound naming the key", async () => {
    const stub = StubbedSession();
    const catalog = Catalog.from(stub.session, { element: "shoji:catalog", self: C1, index: {} });

    const err = await rejectionOf(catalog.resolve("nope"));

    expect(ErrAttributeNotFound.is(err)).toBe(true);
    if (!ErrAttributeNotFound.is(err)) return;
    expect(err.data.key).toBe("nope");
    expect(err.data.document).toBe("catalog");
    expect(err.message).toBe("catalog has no attribute nope");
  });

  test("a navigation target without a parseable body resolves to undefined", async () => {
    const stub = StubbedSession();
    const EXPORT = "https://x/export.csv";
    stub.respond("get", EXPORT, { status: 200 });
    const view = View.from(stub.session, { element: "shoji:view", urls: { export: EXPORT } });

    expect(await view.resolve("export")).toBeUndefined();
    expect(await view.lookup("export")).toEqual({ kind: "remote", collection: "urls", url: EXPORT, value: undefined });
    expect(stub.calls).toEqual([
      { method: "get", url: EXPORT },
      { method: "get", url: EXPORT },
    ]);
  });

  test("protocol fields resolve locally", async () => {
    const { session } = StubbedSession();
    const catalog = Catalog.from(session, { element: "shoji:catalog", self: C1, index: {} });
    const entity = Entity.from(session, { element: "shoji:entity", self: E1, body: { n: 1 } });

    expect(await catalog.resolve("index")).toBe(catalog.index);
    const body = await entity.resolve("body");
    expect(body).toBeInstanceOf(AttributeSet);
    expect(body).toBe(entity.body);
  });

  test("element answers the variant tag", async () => {
    const stub = StubbedSession();
    const view = View.from(stub.session, { element: "shoji:view", urls: { element: V1 } });

    expect(await view.resolve("element")).toBe("shoji:view");
    expect(await view.lookup("element")).toEqual({ kind: "local", value: "shoji:view" });
    expect(stub.calls).toEqual([]);
  });
});

describe("collection", () => {
  test("keeps string links only", () => {
    const { session } = StubbedSession();
    const view = View.from(session, { element: "shoji:view", urls: { a: V1, b: 3 } });

    expect(view.collection("urls")).toEqual(new Map([["a", V1]]));
    expect(view.collection("views")).toBeUndefined();
  });
});

describe("post / patch", () => {
  test("post goes to self with a JSON content type by default", async () => {
    const stub = StubbedSession();
    stub.respond("post", E1, { status: 204 });
    const entity = Entity.from(stub.session, { element: "shoji:entity", self: E1, body: {} });

    const response = await entity.post('{"a":1}');

    expect(response.status).toBe(204);
    expect(stub.calls).toEqual([
      { method: "post", url: E1, options: { data: '{"a":1}', headers: { "Content-Type": "application/json" } } },
    ]);
  });

  test("a caller's content type is kept, whatever its case", async () => {
    const stub = StubbedSession();
    stub.respond("patch", E1, { status: 204 });
    const entity = Entity.from(stub.session, { element: "shoji:entity", self: E1, body: {} });

    await entity.patch("x=1", { headers: { "content-type": "text/plain" } });

    expect(stub.calls[0].options).toEqual({ data: "x=1", headers: { "content-type": "text/plain" } });
  });

  test("an unlocated document cannot post", () => {
    const { session } = StubbedSession();
    const entity = Entity.stub(session);

    let caught: unknown;
    try {
      void entity.post("{}");
    } catch (err) {
      caught = err;
    }

    expect(ErrDocumentNotLocated.is(caught)).toBe(true);
    if (!ErrDocumentNotLocated.is(caught)) return;
    expect(caught.message).toBe("Cannot post: entity has no self URL");
  });
});

describe("refresh", () => {
  test("GETs self", async () => {
    const stub = StubbedSession();
    stub.respond("get", V1, { body: { element: "shoji:view", self: V1, value: 42 } });
    const view = View.from(stub.session, { element: "shoji:view", self: V1 });

    const fresh = await view.refresh();

    expect(fresh).toBeInstanceOf(View);
    if (!(fresh instanceof View)) return;
    expect(fresh.value).toBe(42);
    expect(fresh).not.toBe(view);
  });

  test("a response without a parseable body fails with ErrParseFailed", async () => {
    const stub = StubbedSession();
    stub.respond("get", V1, { status: 204 });
    const view = View.from(stub.session, { element: "shoji:view", self: V1 });

    const err = await rejectionOf(view.refresh());

    expect(ErrParseFailed.is(err)).toBe(true);
    if (!ErrParseFailed.is(err)) return;
    expect(err.data).toEqual({ url: V1, status: 204 });
  });
});

describe("toJSON", () => {
  test("writes the element tag, members and protocol fields", () => {
    const { session } = StubbedSession();
    const catalog = Catalog.from(session, {
      element: "shoji:catalog",
      self: C1,
      index: { [E1]: { name: "a" } },
      description: "things",
    });

    expect(catalog.toJSON()).toEqual({
      element: "shoji:catalog",
      self: C1,
      description: "things",
      index: { [E1]: { name: "a" } },
    });
  });
});
