import { describe, test, expect } from "vitest";
import util from "node-inspect-extracted";
import { ShojiError, ErrFacet } from "../shoji-error.js";

// -- Test facets and error definitions -----------------------------------------

const NotFound = ErrFacet.marker("NotFound");
const Retryable = ErrFacet.marker("Retryable");

const HasUrl = ErrFacet.data<{ url: string }>("HasUrl");
const HasStatus = ErrFacet.data<{ method: string; status: number }>("HasStatus");

const CatalogBoundary = ShojiError.boundary("catalog");
const TransportBoundary = ShojiError.boundary("transport");

const ErrMemberNotFound = CatalogBoundary.define("member_not_found", {
  facets: [NotFound, HasUrl],
  message: (d) => `No member at ${d.url}`,
});

const ErrTimedOut = TransportBoundary.define("timed_out", {
  facets: [Retryable],
  message: () => "Timed out",
});

const ErrRejected = TransportBoundary.define("rejected", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [HasUrl, HasStatus],
  message: (d) => `${d.method} ${d.url} rejected (${d.status}): ${d.reason}`,
});

const U1 = "https://x/u1/";

// -- Tests ---------------------------------------------------------------------

describe("Facet", () => {
  test("marker() and data() create frozen shapes", () => {
    expect(NotFound).toEqual({ kind: "marker", name: "NotFound" });
    expect(HasUrl).toEqual({ kind: "data", name: "HasUrl" });
    expect(Object.isFrozen(NotFound)).toBe(true);
    expect(Object.isFrozen(HasUrl)).toBe(true);
  });
});

describe("ShojiError.boundary()", () => {
  test("define() prefixes the code with the domain", () => {
    expect(CatalogBoundary.domain).toBe("catalog");
    expect(ErrMemberNotFound.code).toBe("catalog.member_not_found");
    expect(ErrMemberNotFound.domain).toBe("catalog");
    expect(ErrMemberNotFound.facets).toEqual([NotFound, HasUrl]);
  });
});

describe("ErrorDef.create()", () => {
  test("carries code, message and data", () => {
    const err = ErrMemberNotFound.create({ url: U1 });

    expect(err.code).toBe("catalog.member_not_found");
    expect(err.domain).toBe("catalog");
    expect(err.message).toBe(`No member at ${U1}`);
    expect(err.data.url).toBe(U1);
    expect(err.name).toBe("ShojiError[catalog.member_not_found]");
    expect(err).toBeInstanceOf(Error);
  });

  test("context supplements the message", () => {
    const err = ErrMemberNotFound.create({ url: U1 }, "while grouping");

    expect(err.message).toBe(`No member at ${U1} — while grouping`);
    expect(err.context).toBe("while grouping");
  });

  test("custom props merge with facet data", () => {
    const err = ErrRejected.create({ url: U1, method: "PATCH", status: 409, reason: "conflict" });

    expect(err.message).toBe(`PATCH ${U1} rejected (409): conflict`);
    expect(err.data).toEqual({ url: U1, method: "PATCH", status: 409, reason: "conflict" });
  });

  test("data is a shallow copy", () => {
    const data = { url: U1 };
    const err = ErrMemberNotFound.create(data);
    data.url = "mutated";

    expect(err.data.url).toBe(U1);
  });
});

describe("ErrorDef.is()", () => {
  test("matches its own definition only", () => {
    const err = ErrMemberNotFound.create({ url: U1 });

    expect(ErrMemberNotFound.is(err)).toBe(true);
    expect(ErrTimedOut.is(err)).toBe(false);
    expect(ErrMemberNotFound.is(new Error("nope"))).toBe(false);
    expect(ErrMemberNotFound.is(undefined)).toBe(false);
  });

  test("narrows data", () => {
    const err: unknown = ErrRejected.create({ url: U1, method: "GET", status: 500, reason: "boom" });

    if (ErrRejected.is(err)) {
      const reason: string = err.data.reason;
      expect(reason).toBe("boom");
    } else {
      throw new Error("Expected is() to match");
    }
  });
});

describe("ErrorDef.wrap()", () => {
  test("wraps a rejection as this error, keeping the cause", async () => {
    const wrapped = ErrMemberNotFound.wrap({ url: U1 }, async () => {
      throw new Error("socket closed");
    });

    let caught: unknown;
    try {
      await wrapped;
    } catch (err) {
      caught = err;
    }

    expect(ErrMemberNotFound.is(caught)).toBe(true);
    if (!ErrMemberNotFound.is(caught)) return;
    expect(caught.cause?.code).toBe("unknown");
    expect(caught.cause?.message).toBe("socket closed");
  });

  test("passes the value through on success", async () => {
    expect(await ErrTimedOut.wrap({}, async () => 7)).toBe(7);
  });
});

describe("ShojiError.has()", () => {
  test("detects facets by name", () => {
    const err = ErrMemberNotFound.create({ url: U1 });

    expect(ShojiError.has(err, NotFound)).toBe(true);
    expect(ShojiError.has(err, HasUrl)).toBe(true);
    expect(ShojiError.has(err, Retryable)).toBe(false);
    expect(ShojiError.has(new Error("x"), NotFound)).toBe(false);
  });

  test("has() narrows data for data facets", () => {
    const err: unknown = ErrRejected.create({ url: U1, method: "GET", status: 503, reason: "busy" });

    if (ShojiError.has(err, HasStatus)) {
      const status: number = err.data.status;
      expect(status).toBe(503);
    } else {
      throw new Error("Expected has() to match");
    }
  });
});

describe("ShojiError.wrap()", () => {
  test("returns ShojiErrors unchanged", () => {
    const err = ErrTimedOut.create({});
    expect(ShojiError.wrap(err)).toBe(err);
  });

  test("wraps plain errors and strings as unknown", () => {
    const original = new Error("boom");
    const wrapped = ShojiError.wrap(original);

    expect(wrapped.code).toBe("unknown");
    expect(wrapped.domain).toBe("unknown");
    expect(wrapped.message).toBe("boom");
    expect(wrapped.stack).toBe(original.stack);
    expect(ShojiError.wrap("broke").message).toBe("broke");
  });
});

describe("toJSON()", () => {
  test("is JSON-safe and includes the cause", () => {
    const cause = ErrTimedOut.create({});
    const err = ErrMemberNotFound.create({ url: U1 }, "while fetching", cause);

    const json = JSON.parse(JSON.stringify(err.toJSON()));

    expect(json.code).toBe("catalog.member_not_found");
    expect(json.context).toBe("while fetching");
    expect(json.data).toEqual({ url: U1 });
    expect(json.facets).toEqual(["NotFound", "HasUrl"]);
    expect(json.cause.code).toBe("transport.timed_out");
  });

  test("omits context when not provided", () => {
    expect(ErrTimedOut.create({}).toJSON().context).toBeUndefined();
  });
});

describe("prettyPrint()", () => {
  test("data on a tree line under the header", () => {
    const err = ErrMemberNotFound.create({ url: U1 });

    expect(err.prettyPrint()).toBe(
      `ShojiError: catalog.member_not_found: No member at ${U1}\n  └ data: {"url":"${U1}"}`,
    );
  });

  test("causes nest below", () => {
    const err = ErrMemberNotFound.create({ url: U1 }, undefined, ErrTimedOut.create({}));

    expect(err.prettyPrint().split("\n")).toEqual([
      `ShojiError: catalog.member_not_found: No member at ${U1}`,
      `  ├ data: {"url":"${U1}"}`,
      `  └ caused by: transport.timed_out: Timed out`,
    ]);
  });

  test("color styles the code and dims the tree", () => {
    const err = ErrMemberNotFound.create({ url: U1 });

    expect(err.prettyPrint({ color: true }).split("\n")).toEqual([
      `ShojiError: \x1b[31mcatalog.member_not_found\x1b[0m: No member at ${U1}`,
      `  \x1b[2m└ data: {"url":"${U1}"}\x1b[0m`,
    ]);
  });

  test("inspect renders the pretty print with stack", () => {
    const err = ErrTimedOut.create({});
    const lines = util.inspect(err).split("\n");

    expect(lines[0]).toBe("ShojiError: transport.timed_out: Timed out");
    expect(lines[1]).toBe("  ➝ Stack trace:");
  });
});
