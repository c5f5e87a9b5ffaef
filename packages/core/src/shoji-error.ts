/**
 * ShojiError — errors described by facets rather than subclasses.
 *
 * Each package opens a boundary (its domain) and defines its errors there, so
 * every code reads `domain.name`. Facets say what kind of failure an error is
 * (NotFound, BadInput) and which fields its `data` carries (HasUrl).
 *
 * Callers match on one definition with `ErrX.is(e)`, or on a facet with
 * `ShojiError.has(e, Facet)`, which also narrows `e.data`.
 */

import {StaticTypeCompanion} from "./companion.js";
import {Fmt} from "./fmt.js";
import {Inspect} from "./inspect.js";

type Fields = Record<string, unknown>;

// -- Facets -------------------------------------------------------------------

/** A trait an error can carry. Data facets add `TData` to the error's data. */
export interface ErrFacet<TData extends Fields = {}> {
  readonly kind: "marker" | "data";
  readonly name: string;
  /** Type-level only; never set */
  readonly fields?: TData;
}

export type AnyFacet = ErrFacet<Fields>;

/** Fields a single definition adds on top of its facets (type-level only) */
export interface ErrProps<T extends Fields = {}> {
  readonly _kind: "props";
  readonly fields?: T;
}

export type PropsOf<P> = P extends ErrProps<infer T extends Fields> ? T : {};

export type UnionToIntersection<U> = (U extends unknown ? (x: U) => void : never) extends (x: infer I) => void
  ? I
  : never;

export type FieldsOf<F> = F extends ErrFacet<infer D> ? D : never;

/** Every data facet's fields, intersected */
export type FacetFields<Fs extends readonly AnyFacet[]> = UnionToIntersection<FieldsOf<Fs[number]>>;

export type ErrorData<Fs extends readonly AnyFacet[]> = FacetFields<Fs> & Fields;

export const ErrFacet = StaticTypeCompanion({
  marker(name: string): ErrFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  data<TData extends Fields>(name: string): ErrFacet<TData> {
    return Object.freeze({ kind: "data" as const, name });
  },

  props<T extends Fields>(): ErrProps<T> {
    return { _kind: "props" };
  },
});

// -- Errors -------------------------------------------------------------------

export interface PrettyPrintOptions {
  readonly color?: boolean;
  /** Append the stack frames of the outermost error */
  readonly includeStackTrace?: boolean;
}

export interface ShojiError<Fs extends readonly AnyFacet[] = readonly AnyFacet[]> extends Error {
  readonly code: string;
  readonly domain: string;
  /** Caller-supplied detail, appended to the message */
  readonly context?: string;
  readonly data: ErrorData<Fs>;
  readonly facetNames: ReadonlySet<string>;
  readonly cause?: ShojiError;
  toJSON(): ShojiErrorJSON;
  prettyPrint(opts?: PrettyPrintOptions): string;
}

export interface ShojiErrorJSON {
  code: string;
  domain: string;
  message: string;
  context?: string;
  data: Fields;
  facets: string[];
  stack?: string;
  cause?: ShojiErrorJSON;
}

/** What a definition stamps on every error it creates */
interface Identity {
  readonly code: string;
  readonly domain: string;
  readonly facetNames: ReadonlySet<string>;
}

const UNKNOWN: Identity = Object.freeze({ code: "unknown", domain: "unknown", facetNames: new Set<string>() });

class FacetedError<Fs extends readonly AnyFacet[] = readonly AnyFacet[]> extends Error implements ShojiError<Fs> {
  readonly #identity: Identity;
  readonly context?: string;
  readonly data: ErrorData<Fs>;
  override readonly cause?: ShojiError;

  static {
    Inspect(this, (self, opts) => ({
      format: "%s",
      params: [self.prettyPrint({ color: opts.colors ?? false, includeStackTrace: true })],
    }));
  }

  constructor(identity: Identity, message: string, data: ErrorData<Fs>, context?: string, cause?: ShojiError) {
    super(context === undefined ? message : `${message} — ${context}`);
    this.#identity = identity;
    this.name = `ShojiError[${identity.code}]`;
    this.data = { ...data };
    if (context !== undefined) this.context = context;
    if (cause !== undefined) this.cause = cause;
  }

  get code(): string {
    return this.#identity.code;
  }

  get domain(): string {
    return this.#identity.domain;
  }

  get facetNames(): ReadonlySet<string> {
    return this.#identity.facetNames;
  }

  toJSON(): ShojiErrorJSON {
    return {
      code: this.code,
      domain: this.domain,
      message: this.message,
      ...(this.context === undefined ? {} : { context: this.context }),
      data: this.data,
      facets: [...this.facetNames],
      stack: this.stack,
      ...(this.cause === undefined ? {} : { cause: this.cause.toJSON() }),
    };
  }

  prettyPrint(opts: PrettyPrintOptions = {}): string {
    return render(this, Fmt.usingColor(opts.color ?? false), opts.includeStackTrace ?? false);
  }
}

function* causeChain(err: ShojiError): Generator<ShojiError> {
  for (let current: ShojiError | undefined = err; current !== undefined; current = current.cause) {
    yield current;
  }
}

/**
 * Header line, then each cause one level deeper. An error's data sits on a
 * branch under it: `├` when a cause follows, `└` otherwise.
 */
function render(err: ShojiError, fmt: Fmt, withStack: boolean): string {
  const lines: string[] = [];

  [...causeChain(err)].forEach((current, depth) => {
    const summary = `${fmt.red(current.code)}: ${current.message}`;
    lines.push(depth === 0 ? `ShojiError: ${summary}` : `${"  ".repeat(depth)}${fmt.dim("└ caused by:")} ${summary}`);

    if (Object.keys(current.data).length > 0) {
      const branch = current.cause === undefined ? "└" : "├";
      lines.push(`${"  ".repeat(depth + 1)}${fmt.dim(`${branch} data: ${JSON.stringify(current.data)}`)}`);
    }
  });

  const frames = withStack ? stackFrames(err.stack) : [];
  if (frames.length > 0) {
    lines.push(`  ${fmt.dim("➝ Stack trace:")}`, ...frames.map((frame) => fmt.dim(frame)));
  }
  return lines.join("\n");
}

/** The `at ...` lines of a V8 stack, without the message that heads it */
function stackFrames(stack: string | undefined): string[] {
  return (stack ?? "").split("\n").filter((line) => line.trimStart().startsWith("at "));
}

function toShojiError(thrown: unknown): ShojiError {
  if (thrown instanceof FacetedError) return thrown;
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  const err = new FacetedError(UNKNOWN, message, {});
  if (thrown instanceof Error && thrown.stack !== undefined) err.stack = thrown.stack;
  return err;
}

// -- Definitions and boundaries -------------------------------------------------

export interface ErrorDef<Fs extends readonly AnyFacet[] = readonly AnyFacet[], D extends Fields = {}> {
  readonly code: string;
  readonly domain: string;
  readonly facets: Fs;
  create(data: FacetFields<Fs> & D, context?: string, cause?: ShojiError): ShojiError<Fs>;
  is(err: unknown): err is ShojiError<Fs> & { readonly data: FacetFields<Fs> & D };
  /** Run `fn`; if it rejects, reject with this error instead, keeping the original as its cause */
  wrap<T>(data: FacetFields<Fs> & D, fn: () => Promise<T>): Promise<T>;
}

export interface ErrorBoundary {
  readonly domain: string;
  /** Define an error under this domain: `define("x", ...)` has code `domain.x` */
  define<const Fs extends readonly AnyFacet[], P extends ErrProps = ErrProps>(
    name: string,
    opts: { customProps?: P; facets: Fs; message: (data: FacetFields<Fs> & PropsOf<P>) => string },
  ): ErrorDef<Fs, PropsOf<P>>;
}

function defineError<const Fs extends readonly AnyFacet[], D extends Fields>(
  identity: Identity,
  facets: Fs,
  message: (data: FacetFields<Fs> & D) => string,
): ErrorDef<Fs, D> {
  const create = (data: FacetFields<Fs> & D, context?: string, cause?: ShojiError): ShojiError<Fs> => {
    const err = new FacetedError<Fs>(identity, message(data), data, context, cause);
    Error.captureStackTrace(err, create);
    return err;
  };

  return Object.freeze({
    code: identity.code,
    domain: identity.domain,
    facets,
    create,
    is: (err: unknown): err is ShojiError<Fs> & { readonly data: FacetFields<Fs> & D } =>
      err instanceof FacetedError && err.code === identity.code,
    async wrap<T>(data: FacetFields<Fs> & D, fn: () => Promise<T>): Promise<T> {
      try {
        return await fn();
      } catch (thrown) {
        throw create(data, undefined, toShojiError(thrown));
      }
    },
  });
}

export const ShojiError = StaticTypeCompanion({
  /** Open the error domain a package defines its errors in */
  boundary(domain: string): ErrorBoundary {
    return Object.freeze({
      domain,
      define<const Fs extends readonly AnyFacet[], P extends ErrProps = ErrProps>(
        name: string,
        opts: { customProps?: P; facets: Fs; message: (data: FacetFields<Fs> & PropsOf<P>) => string },
      ): ErrorDef<Fs, PropsOf<P>> {
        const identity: Identity = Object.freeze({
          code: `${domain}.${name}`,
          domain,
          facetNames: new Set(opts.facets.map((facet) => facet.name)),
        });
        return defineError<Fs, PropsOf<P>>(identity, opts.facets, opts.message);
      },
    });
  },

  /** Whether `err` carries `facet`; a data facet also narrows `err.data` */
  has<F extends AnyFacet>(err: unknown, facet: F): err is ShojiError & { readonly data: FieldsOf<F> } {
    return err instanceof FacetedError && err.facetNames.has(facet.name);
  },

  /** `err` itself when it is a ShojiError, else an `unknown`-coded one with its message and stack */
  wrap(err: unknown): ShojiError {
    return toShojiError(err);
  },
});
