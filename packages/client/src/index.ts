/**
 * @shoji/client - Object model for Shoji hypermedia APIs
 */

// JSON
export { isJsonObject, parseJson } from "./json.js";
export type { JsonPrimitive, JsonValue, JsonObject } from "./json.js";

// Transport contract (ShojiResponse and RequestOptions are both type and value)
export { ShojiResponse, RequestOptions } from "./session.js";
export type { Session, Payload, ResponseHeaders } from "./session.js";
export { HttpSession, isJsonMediaType, withParams } from "./http-session.js";
export type { HttpMethod, HttpSessionOptions } from "./http-session.js";

// Attribute bags
export { AttributeSet, AttributeTuple } from "./attribute-tuple.js";

// Documents
export { Document } from "./document.js";
export type { DocumentKind, DocumentVariant, Member, Resolution } from "./document.js";
export { Catalog } from "./catalog.js";
export type { GroupKey } from "./catalog.js";
export { Entity } from "./entity.js";
export { View } from "./view.js";
export { Element } from "./element.js";
export type { ShojiDocument } from "./element.js";

// Errors
export * from "./errors.js";
